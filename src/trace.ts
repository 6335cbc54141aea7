import { z } from "zod";
import { CONTROL_TOOL_NAMES } from "./tools/control.js";
import type { InvocationRequest, Trace, TraceStep } from "./types.js";

/**
 * Collects the actions a loop actually dispatched, in dispatch order, with the
 * arguments as the tool's schema parsed them. Control tools are not recorded:
 * a replay never needs the model's completion signal.
 */
export class TraceRecorder {
  private steps: TraceStep[] = [];

  constructor(private readonly goal: string) {}

  record(request: InvocationRequest, args: unknown): void {
    if (CONTROL_TOOL_NAMES.has(request.name)) return;
    this.steps.push({ name: request.name, arguments: args });
  }

  get length(): number {
    return this.steps.length;
  }

  toTrace(): Trace {
    return { goal: this.goal, steps: this.steps.map((s) => ({ ...s })) };
  }
}

// ── Wire format ──────────────────────────────────────────────

const TRACE_FORMAT_VERSION = 1;

export const traceFileSchema = z.object({
  version: z.literal(TRACE_FORMAT_VERSION),
  goal: z.string(),
  steps: z.array(
    z.object({
      name: z.string().min(1),
      arguments: z.unknown(),
    }),
  ),
});

export function serializeTrace(trace: Trace): string {
  return JSON.stringify(
    { version: TRACE_FORMAT_VERSION, goal: trace.goal, steps: trace.steps },
    null,
    2,
  );
}

/** Parse a serialized trace; throws on malformed JSON or a schema mismatch */
export function parseTrace(json: string): Trace {
  const parsed = traceFileSchema.parse(JSON.parse(json));
  return {
    goal: parsed.goal,
    steps: parsed.steps.map((s) => ({ name: s.name, arguments: s.arguments })),
  };
}
