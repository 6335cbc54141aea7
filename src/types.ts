import type { z } from "zod";

/**
 * Core type definitions for the task loop.
 *
 * Layered the same way the runtime is: Content → Tool → Turn → Step → Outcome.
 */

// ---------------------------------------------------------------------------
// Observation content
// ---------------------------------------------------------------------------

interface ContentBase {
  /** Free-form label, e.g. "screenshot" or "page-text" */
  tag?: string;
  /**
   * How many iterations the item stays visible to the reasoning engine.
   * Unset means it never expires. The transcript itself keeps every item.
   */
  lifespan?: number;
}

export interface TextContent extends ContentBase {
  type: "text";
  text: string;
}

export interface ImageContent extends ContentBase {
  type: "image";
  /** base64-encoded image bytes */
  data: string;
  mimeType: "image/png" | "image/jpeg" | "image/webp" | "image/gif";
}

export type ContentItem = TextContent | ImageContent;

/** Supplies a fresh snapshot of the environment */
export type ObserveFn = () => Promise<ContentItem[]>;

/**
 * - "start": observe once when the goal is seeded
 * - "every-step": also observe after each dispatch, before the next reasoning step
 */
export type ObserveMode = "start" | "every-step";

// ---------------------------------------------------------------------------
// Tools
// ---------------------------------------------------------------------------

export interface ToolDefinition {
  name: string;
  description: string;
  parameters: z.ZodType;
}

export type InvocationStatus = "success" | "failure";

/** What a tool hands back after running */
export interface ToolOutput {
  status: InvocationStatus;
  description: string;
  payload?: unknown;
}

/** Arguments accepted by a tool, bound to a ready-to-run invocation */
export interface BoundInvocation {
  ok: true;
  arguments: unknown;
  run: () => Promise<ToolOutput>;
}

export interface RejectedArguments {
  ok: false;
  message: string;
}

export interface Tool {
  definition: ToolDefinition;
  /** Validate raw arguments against the parameter schema */
  bind(args: unknown): BoundInvocation | RejectedArguments;
}

// ---------------------------------------------------------------------------
// Invocations
// ---------------------------------------------------------------------------

export interface InvocationRequest {
  id: string;
  name: string;
  /** Untyped until the dispatcher validates it */
  arguments: unknown;
}

export type FailureKind =
  | "unknown_action"
  | "invalid_arguments"
  | "tool_execution_fault"
  | "tool_failure"
  | "timeout";

export interface InvocationResult {
  requestId: string;
  name: string;
  status: InvocationStatus;
  description: string;
  payload?: unknown;
  /** Present when status === "failure" */
  failure?: { kind: FailureKind; message: string };
}

// ---------------------------------------------------------------------------
// Conversation
// ---------------------------------------------------------------------------

export type LoopMode = "do" | "tell" | "check" | "redo";

interface TurnBase {
  /** Index of the do/tell/check/redo call that produced the turn */
  session: number;
  /** 0 for seeding turns, 1..n for loop iterations */
  iteration: number;
}

export type Turn =
  | (TurnBase & { kind: "system"; text: string })
  | (TurnBase & { kind: "goal"; mode: LoopMode; text: string })
  | (TurnBase & { kind: "observation"; content: ContentItem[] })
  | (TurnBase & { kind: "reasoning"; text: string })
  | (TurnBase & { kind: "invocation"; request: InvocationRequest })
  | (TurnBase & { kind: "result"; result: InvocationResult })
  | (TurnBase & { kind: "answer"; text: string; output?: unknown })
  | (TurnBase & { kind: "note"; text: string });

export type TurnKind = Turn["kind"];

// ---------------------------------------------------------------------------
// Reasoning engine (thin boundary so we can swap providers or mock in tests)
// ---------------------------------------------------------------------------

/** A request as the engine produces it; the loop assigns missing ids */
export interface RequestedInvocation {
  id?: string;
  name: string;
  arguments: unknown;
}

export interface ActionStep {
  type: "actions";
  requests: RequestedInvocation[];
  /** Requests do not depend on each other and may run concurrently */
  independent?: boolean;
  thinking?: string;
}

export interface FinalStep {
  type: "final";
  answer: string;
  output?: unknown;
  thinking?: string;
}

export type ReasoningStep = ActionStep | FinalStep;

export interface ReasoningEngine {
  reason(
    transcript: readonly Turn[],
    tools: readonly ToolDefinition[],
  ): Promise<ReasoningStep>;
}

// ---------------------------------------------------------------------------
// Results
// ---------------------------------------------------------------------------

export interface TraceStep {
  name: string;
  arguments: unknown;
}

/** Replayable record of the actions a completed loop dispatched */
export interface Trace {
  goal: string;
  steps: TraceStep[];
}

export type OutcomeStatus = "completed" | "aborted";

export interface Outcome {
  goal: string;
  status: OutcomeStatus;
  feedback: string;
  output?: unknown;
  /** Iterations actually used */
  iterations: number;
  maxIterations: number;
  trace: Trace;
  /** Human-readable action log */
  summary: string;
}

/** Record the conversation keeps for every do/tell/check/redo call */
export interface SessionRecord {
  index: number;
  mode: LoopMode;
  goal: string;
  status?: OutcomeStatus;
  feedback?: string;
}

/** Callback fired after each iteration, useful for logging/debugging */
export type OnStepCallback = (step: {
  iteration: number;
  requests: InvocationRequest[];
  results: InvocationResult[];
  thinking: string | null;
}) => void;
