import { pino, type Logger } from "pino";

export type { Logger };

/**
 * Root logger for a component. Level comes from LOG_LEVEL unless given;
 * the loop, dispatcher and replayer log through children of this.
 */
export function createLogger(name: string, level?: string): Logger {
  return pino({ name, level: level ?? process.env.LOG_LEVEL ?? "info" });
}
