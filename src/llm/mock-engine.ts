import type {
  ReasoningEngine,
  ReasoningStep,
  ToolDefinition,
  Turn,
} from "../types.js";

/** A scripted step: a fixed step, an error to throw, or a step computed from the transcript */
export type ScriptedStep = ReasoningStep | Error | ((transcript: readonly Turn[]) => ReasoningStep);

/**
 * Mock reasoning engine for testing.
 * Returns pre-configured steps in sequence.
 */
export class MockReasoningEngine implements ReasoningEngine {
  private steps: ScriptedStep[];
  private callIndex = 0;
  /** Records all calls for assertion */
  public calls: Array<{ transcript: Turn[]; tools: ToolDefinition[] }> = [];

  constructor(steps: ScriptedStep[]) {
    this.steps = steps;
  }

  async reason(
    transcript: readonly Turn[],
    tools: readonly ToolDefinition[],
  ): Promise<ReasoningStep> {
    this.calls.push({ transcript: [...transcript], tools: [...tools] });
    if (this.callIndex >= this.steps.length) {
      return { type: "final", answer: "No more mock steps configured." };
    }
    const step = this.steps[this.callIndex++];
    if (step instanceof Error) throw step;
    return typeof step === "function" ? step(transcript) : step;
  }

  /** Reset call counter (reuse same steps) */
  reset(): void {
    this.callIndex = 0;
    this.calls = [];
  }
}

/** An engine that never finishes: every step requests the same tool call */
export function loopingEngine(name: string, args: unknown): MockReasoningEngine {
  const step = (): ReasoningStep => ({
    type: "actions",
    requests: [{ name, arguments: args }],
  });
  return new MockReasoningEngine(Array.from({ length: 100 }, () => step));
}
