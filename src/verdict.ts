import { z } from "zod";

/** Output shape `check` asks the model for */
export const verdictSchema = z.object({
  passed: z.boolean(),
  reason: z.string().optional(),
});

export type VerdictOutput = z.infer<typeof verdictSchema>;

/**
 * Result of `agent.check()`.
 *
 * An object is always truthy in JavaScript, so branch on `passed` (or
 * `valueOf()`, which returns it). `reason` is only filled in when the
 * condition did not hold.
 */
export class Verdict {
  readonly passed: boolean;
  readonly reason: string;

  constructor(passed: boolean, reason = "") {
    this.passed = passed;
    this.reason = passed ? "" : reason;
  }

  /** Build from validated check output, falling back to the model's feedback for the reason */
  static from(output: VerdictOutput, feedback: string): Verdict {
    return new Verdict(output.passed, output.reason ?? feedback);
  }

  valueOf(): boolean {
    return this.passed;
  }

  toString(): string {
    return this.passed ? "Verdict(PASSED)" : `Verdict(FAILED: ${this.reason})`;
  }
}
