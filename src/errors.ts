import type { Outcome, Turn } from "./types.js";

/**
 * Errors that cross the agent's public boundary.
 *
 * Dispatch-level faults (unknown action, bad arguments, a throwing tool) never
 * show up here: they become failure results in the transcript instead.
 */

export interface FailureContext {
  goal: string;
  iterations: number;
  /** Last few transcript entries, for diagnosis */
  recentTurns: Turn[];
}

export class AgentError extends Error {
  readonly goal: string;
  readonly iterations: number;
  readonly recentTurns: Turn[];

  constructor(message: string, context: FailureContext, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.goal = context.goal;
    this.iterations = context.iterations;
    this.recentTurns = context.recentTurns;
  }
}

/** The loop ended without completing: budget exhausted or abort_work */
export class TaskAbortedError extends AgentError {
  readonly outcome: Outcome;

  constructor(outcome: Outcome, recentTurns: Turn[]) {
    super(
      `Task "${outcome.goal}" aborted after ${outcome.iterations} iteration(s): ${outcome.feedback}`,
      { goal: outcome.goal, iterations: outcome.iterations, recentTurns },
    );
    this.outcome = outcome;
  }
}

export class ReasoningEngineError extends AgentError {}

/** The observe function failed while seeding or refreshing the environment snapshot */
export class ObservationError extends AgentError {}

export class OutputValidationError extends AgentError {
  readonly issues: string;

  constructor(issues: string, context: FailureContext) {
    super(
      `Task "${context.goal}" produced output that does not match the schema: ${issues}`,
      context,
    );
    this.issues = issues;
  }
}

export class ReplayError extends AgentError {}

/** A second call reached the agent while one was still running */
export class AgentBusyError extends Error {
  constructor() {
    super("Agent is already running a task; use a separate agent instance for concurrent work");
    this.name = "AgentBusyError";
  }
}

export class TimeoutError extends Error {
  constructor(label: string, ms: number) {
    super(`${label} timed out after ${ms}ms`);
    this.name = "TimeoutError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
