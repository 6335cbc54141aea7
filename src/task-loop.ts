import type { Logger } from "pino";
import { z } from "zod";
import type { ContextBuilder } from "./context-builder.js";
import { summarizeActions, type Conversation } from "./conversation.js";
import {
  ObservationError,
  OutputValidationError,
  ReasoningEngineError,
  errorMessage,
} from "./errors.js";
import { SignalHolder, createControlTools } from "./tools/control.js";
import { ToolDispatcher } from "./tools/dispatcher.js";
import { formatIssues, type ToolRegistry } from "./tools/registry.js";
import { TraceRecorder } from "./trace.js";
import { withTimeout } from "./utils/timeout.js";
import { verdictSchema } from "./verdict.js";
import type {
  ContentItem,
  InvocationRequest,
  InvocationResult,
  LoopMode,
  ObserveFn,
  ObserveMode,
  OnStepCallback,
  Outcome,
  OutcomeStatus,
  ReasoningEngine,
  ReasoningStep,
  ToolDefinition,
} from "./types.js";

/**
 * TaskLoop — the do/tell/check state machine.
 *
 *   SEEDED → REASONING → DISPATCHING → (REASONING | TERMINATED)
 *
 * Each iteration is one reasoning call plus the dispatch of whatever it asked
 * for. The loop ends on a completion signal (a final step or `complete_work`),
 * on `abort_work`, when the iteration budget runs out, or on a fatal engine or
 * output-validation fault. Tool faults never end it; they go back to the
 * model as failure results.
 */

export type TaskMode = Exclude<LoopMode, "redo">;

export interface LoopRequest {
  mode: TaskMode;
  goal: string;
  maxIterations: number;
  /** Schema the completion output must satisfy (check always uses the verdict schema) */
  outputSchema?: z.ZodType;
}

export interface TaskLoopOptions {
  engine: ReasoningEngine;
  registry: ToolRegistry;
  conversation: Conversation;
  contextBuilder: ContextBuilder;
  logger: Logger;
  observe?: ObserveFn;
  observeMode?: ObserveMode;
  toolTimeoutMs?: number;
  reasoningTimeoutMs?: number;
  /** Extra attempts for a failing engine call after the first iteration */
  engineRetries?: number;
  onStep?: OnStepCallback;
}

interface Completion {
  feedback: string;
  output?: unknown;
}

interface Settled {
  status: OutcomeStatus;
  feedback: string;
  output?: unknown;
}

type OutputCheck = { ok: true; output: unknown } | { ok: false; issues: string };

// ---------------------------------------------------------------------------
// Engine reply shape
// ---------------------------------------------------------------------------

const requestedInvocationSchema = z.object({
  id: z.string().min(1).optional(),
  name: z.string().min(1),
  arguments: z.unknown(),
});

export const reasoningStepSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("actions"),
    requests: z.array(requestedInvocationSchema),
    independent: z.boolean().optional(),
    thinking: z.string().optional(),
  }),
  z.object({
    type: z.literal("final"),
    answer: z.string(),
    output: z.unknown().optional(),
    thinking: z.string().optional(),
  }),
]);

/** Engines are external code; a reply that is not a step counts as an engine fault */
function parseStep(raw: unknown): ReasoningStep {
  const parsed = reasoningStepSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Malformed reasoning step: ${formatIssues(parsed.error)}`);
  }
  const step = parsed.data;
  if (step.type === "final") {
    return { type: "final", answer: step.answer, output: step.output, thinking: step.thinking };
  }
  return {
    type: "actions",
    requests: step.requests.map((r) => ({ id: r.id, name: r.name, arguments: r.arguments })),
    independent: step.independent,
    thinking: step.thinking,
  };
}

const DEFAULT_ENGINE_RETRIES = 2;
const DIAGNOSTIC_TURNS = 5;

export class TaskLoop {
  private engine: ReasoningEngine;
  private registry: ToolRegistry;
  private conversation: Conversation;
  private contextBuilder: ContextBuilder;
  private logger: Logger;
  private observe?: ObserveFn;
  private observeMode: ObserveMode;
  private toolTimeoutMs?: number;
  private reasoningTimeoutMs?: number;
  private engineRetries: number;
  private onStep?: OnStepCallback;

  constructor(options: TaskLoopOptions) {
    this.engine = options.engine;
    this.registry = options.registry;
    this.conversation = options.conversation;
    this.contextBuilder = options.contextBuilder;
    this.logger = options.logger.child({ component: "task-loop" });
    this.observe = options.observe;
    this.observeMode = options.observeMode ?? "every-step";
    this.toolTimeoutMs = options.toolTimeoutMs;
    this.reasoningTimeoutMs = options.reasoningTimeoutMs;
    this.engineRetries = options.engineRetries ?? DEFAULT_ENGINE_RETRIES;
    this.onStep = options.onStep;
  }

  /**
   * Run one goal to an outcome. Returns aborted outcomes (budget exhausted,
   * abort_work) rather than throwing; throws only for fatal engine and
   * output-validation faults.
   */
  async run(request: LoopRequest): Promise<Outcome> {
    const { mode, goal, maxIterations } = request;
    if (!Number.isInteger(maxIterations) || maxIterations < 1) {
      throw new RangeError(`maxIterations must be a positive integer, got ${maxIterations}`);
    }

    const session = this.conversation.beginSession(mode, goal);
    const log = this.logger.child({ session, mode });
    log.info({ goal, maxIterations }, "task start");

    try {
      const { settled, iterations, recorder } = await this.execute(request, session, log);
      this.conversation.closeSession(session, settled.status, settled.feedback);
      log.info({ status: settled.status, iterations }, "task end");

      return Object.freeze({
        goal,
        status: settled.status,
        feedback: settled.feedback,
        output: settled.output,
        iterations,
        maxIterations,
        trace: recorder.toTrace(),
        summary: summarizeActions(this.conversation.sessionTurns(session)),
      });
    } catch (err) {
      this.conversation.closeSession(session, "aborted", errorMessage(err));
      log.error({ err }, "task failed");
      throw err;
    }
  }

  private async execute(
    request: LoopRequest,
    session: number,
    log: Logger,
  ): Promise<{ settled: Settled; iterations: number; recorder: TraceRecorder }> {
    const { mode, goal, maxIterations, outputSchema } = request;

    // SEEDED
    this.conversation.append({ kind: "goal", session, iteration: 0, mode, text: goal });
    await this.observeInto(goal, session, 0);

    const signals = new SignalHolder();
    const schema = mode === "check" ? verdictSchema : outputSchema;
    const registry = this.registry.with(createControlTools(signals, schema));
    const tools = registry.definitions();
    const recorder = new TraceRecorder(goal);
    const dispatcher = new ToolDispatcher(registry, {
      logger: log,
      toolTimeoutMs: this.toolTimeoutMs,
      onInvoked: (req, args) => recorder.record(req, args),
    });

    let settled: Settled | null = null;
    let correctionUsed = false;
    let iteration = 0;

    while (!settled && iteration < maxIterations) {
      iteration++;
      log.debug({ iteration }, "iteration start");

      // REASONING
      const step = await this.reason(goal, session, iteration, tools);
      const thinking = step.thinking?.trim() || null;
      if (thinking) {
        this.conversation.append({ kind: "reasoning", session, iteration, text: thinking });
        log.info({ iteration, thinking }, "reasoning");
      }

      let completion: Completion | null = null;
      let requests: InvocationRequest[] = [];
      let results: InvocationResult[] = [];

      if (step.type === "final") {
        this.conversation.append({
          kind: "answer",
          session,
          iteration,
          text: step.answer,
          output: step.output,
        });
        completion = { feedback: step.answer, output: step.output };
      } else {
        // DISPATCHING
        // ids must be unique within a batch; missing or repeated ones get a fresh id
        const used = new Set<string>();
        requests = step.requests.map((r, i) => {
          const id = r.id && !used.has(r.id) ? r.id : `call-${session}-${iteration}-${i + 1}`;
          used.add(id);
          return { id, name: r.name, arguments: r.arguments };
        });
        log.info({ iteration, tools: requests.map((r) => r.name) }, "dispatching");
        for (const req of requests) {
          this.conversation.append({ kind: "invocation", session, iteration, request: req });
        }
        results = await dispatcher.dispatchAll(requests, { concurrent: step.independent === true });
        for (const result of results) {
          this.conversation.append({ kind: "result", session, iteration, result });
        }

        const signal = signals.take();
        if (signal?.type === "abort") {
          settled = { status: "aborted", feedback: signal.reason };
        } else if (signal?.type === "complete") {
          completion = { feedback: signal.feedback, output: signal.output };
        }
      }

      this.onStep?.({ iteration, requests, results, thinking });

      if (completion) {
        const checked = this.checkOutput(completion, schema);
        if (checked.ok) {
          settled = { status: "completed", feedback: completion.feedback, output: checked.output };
        } else if (correctionUsed) {
          throw new OutputValidationError(checked.issues, {
            goal,
            iterations: iteration,
            recentTurns: this.conversation.tail(DIAGNOSTIC_TURNS),
          });
        } else {
          correctionUsed = true;
          log.warn({ iteration, issues: checked.issues }, "output rejected, requesting correction");
          this.conversation.append({
            kind: "note",
            session,
            iteration,
            text:
              `Your final output does not match the required schema: ${checked.issues}. ` +
              "Call complete_work again with corrected output.",
          });
        }
      }

      if (!settled && this.observeMode === "every-step" && iteration < maxIterations) {
        await this.observeInto(goal, session, iteration);
      }
    }

    if (!settled) {
      log.warn({ iterations: iteration }, "max iterations reached");
      settled = { status: "aborted", feedback: "Reached maximum iterations" };
    }
    return { settled, iterations: iteration, recorder };
  }

  /**
   * Ask the engine for the next step. A failure on the first iteration is
   * fatal; later ones are retried `engineRetries` times first.
   */
  private async reason(
    goal: string,
    session: number,
    iteration: number,
    tools: readonly ToolDefinition[],
  ): Promise<ReasoningStep> {
    const transcript = this.contextBuilder.build(this.conversation, session, iteration);
    for (let attempt = 0; ; attempt++) {
      try {
        const raw: unknown = await withTimeout(
          Promise.resolve().then(() => this.engine.reason(transcript, tools)),
          this.reasoningTimeoutMs,
          "Reasoning engine",
        );
        return parseStep(raw);
      } catch (err) {
        if (iteration === 1 || attempt >= this.engineRetries) {
          throw new ReasoningEngineError(
            `Reasoning engine failed on iteration ${iteration} of task "${goal}": ${errorMessage(err)}`,
            { goal, iterations: iteration, recentTurns: this.conversation.tail(DIAGNOSTIC_TURNS) },
            { cause: err },
          );
        }
        this.logger.warn({ err, iteration, attempt: attempt + 1 }, "reasoning engine failed, retrying");
      }
    }
  }

  private checkOutput(completion: Completion, schema?: z.ZodType): OutputCheck {
    if (!schema) return { ok: true, output: completion.output };
    const parsed = schema.safeParse(completion.output);
    return parsed.success
      ? { ok: true, output: parsed.data }
      : { ok: false, issues: formatIssues(parsed.error) };
  }

  private async observeInto(goal: string, session: number, iteration: number): Promise<void> {
    if (!this.observe) return;
    let content: ContentItem[];
    try {
      content = await this.observe();
    } catch (err) {
      throw new ObservationError(
        `Observation failed at iteration ${iteration} of task "${goal}": ${errorMessage(err)}`,
        { goal, iterations: iteration, recentTurns: this.conversation.tail(DIAGNOSTIC_TURNS) },
        { cause: err },
      );
    }
    if (content.length > 0) {
      this.conversation.append({ kind: "observation", session, iteration, content });
    }
  }
}
