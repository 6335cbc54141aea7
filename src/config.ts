import { z } from "zod";

// ── Config schema ────────────────────────────────────────────

export const logLevelSchema = z.enum([
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
]);

export const configSchema = z.object({
  model: z.string().min(1).default("gpt-4o-mini"),
  apiKey: z.string().min(1).optional(),
  baseURL: z.string().url().optional(),
  logLevel: logLevelSchema.default("info"),
  maxIterations: z.coerce.number().int().positive().default(20),
  toolTimeoutMs: z.coerce.number().int().positive().optional(),
  reasoningTimeoutMs: z.coerce.number().int().positive().optional(),
});

export type TaskpilotConfig = z.infer<typeof configSchema>;

// ── Env loader ───────────────────────────────────────────────

/** Empty variables count as unset */
function read(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key];
  return value === undefined || value.trim() === "" ? undefined : value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): TaskpilotConfig {
  return configSchema.parse({
    model: read(env, "LLM_MODEL"),
    apiKey: read(env, "OPENAI_API_KEY"),
    baseURL: read(env, "OPENAI_BASE_URL"),
    logLevel: read(env, "LOG_LEVEL"),
    maxIterations: read(env, "MAX_ITERATIONS"),
    toolTimeoutMs: read(env, "TOOL_TIMEOUT_MS"),
    reasoningTimeoutMs: read(env, "REASONING_TIMEOUT_MS"),
  });
}
