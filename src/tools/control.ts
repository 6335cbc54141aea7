import { z } from "zod";
import { defineTool } from "./registry.js";
import type { Tool } from "../types.js";

/**
 * Control tools — how the model tells the loop it is done.
 *
 * A fresh pair is built for every loop run, bound to that run's signal holder.
 * Their output is validated by the loop, not by the tool schema, so a bad
 * `output` gets one correction round instead of a plain argument failure.
 */

export const COMPLETE_WORK = "complete_work";
export const ABORT_WORK = "abort_work";
export const CONTROL_TOOL_NAMES: ReadonlySet<string> = new Set([COMPLETE_WORK, ABORT_WORK]);

export type ControlSignal =
  | { type: "complete"; feedback: string; output?: unknown }
  | { type: "abort"; reason: string };

export class SignalHolder {
  private current: ControlSignal | null = null;

  set(signal: ControlSignal): void {
    this.current = signal;
  }

  /** Return the pending signal, if any, and clear it */
  take(): ControlSignal | null {
    const signal = this.current;
    this.current = null;
    return signal;
  }
}

function describeOutput(outputSchema?: z.ZodType): string {
  if (!outputSchema) {
    return "Optional structured data to return (e.g. extracted information)";
  }
  const shape = JSON.stringify(z.toJSONSchema(outputSchema, { unrepresentable: "any" }));
  return `Structured output data. It MUST match this JSON Schema: ${shape}`;
}

function stringifyOutput(output: unknown): string {
  try {
    return JSON.stringify(output, null, 2);
  } catch {
    // circular or BigInt payloads
    return String(output);
  }
}

export function createControlTools(holder: SignalHolder, outputSchema?: z.ZodType): Tool[] {
  const completeWork = defineTool(
    {
      name: COMPLETE_WORK,
      description:
        "Signal that you have successfully completed the task. " +
        "Optionally provide structured output data.",
      parameters: z.object({
        feedback: z.string().describe("Brief 1-2 sentence summary of what you accomplished"),
        output: z.unknown().optional().describe(describeOutput(outputSchema)),
      }),
    },
    (args) => {
      let description = `Completed: ${args.feedback}`;
      if (args.output !== undefined) {
        description += `\nOutput data:\n${stringifyOutput(args.output)}`;
      }
      holder.set({ type: "complete", feedback: args.feedback, output: args.output });
      return description;
    },
  );

  const abortWork = defineTool(
    {
      name: ABORT_WORK,
      description: "Signal that you cannot proceed (stuck, blocked, error, or impossible)",
      parameters: z.object({
        reason: z.string().describe("Explain why you cannot continue and what went wrong"),
      }),
    },
    (args) => {
      holder.set({ type: "abort", reason: args.reason });
      return `Aborted: ${args.reason}`;
    },
  );

  return [completeWork, abortWork];
}
