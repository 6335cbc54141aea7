import type { Logger } from "pino";
import type { z } from "zod";
import { ContextBuilder, type MemoryConfig } from "./context-builder.js";
import { Conversation } from "./conversation.js";
import { AgentBusyError, TaskAbortedError } from "./errors.js";
import { createLogger } from "./logger.js";
import { Replayer, type ReplayPolicy } from "./replay.js";
import { TaskLoop, type LoopRequest } from "./task-loop.js";
import { CONTROL_TOOL_NAMES } from "./tools/control.js";
import { ToolRegistry } from "./tools/registry.js";
import { Verdict, verdictSchema } from "./verdict.js";
import type {
  ObserveFn,
  ObserveMode,
  OnStepCallback,
  Outcome,
  ReasoningEngine,
  Tool,
  Trace,
  Turn,
} from "./types.js";

/**
 * Agent — public surface over the task loop.
 *
 *   do(goal)         → Outcome   act until the goal is reached
 *   tell(question)   → answer    act, then return an answer (typed with a schema)
 *   check(condition) → Verdict   act, then judge whether a condition holds
 *   redo(trace)      → Outcome   replay recorded actions without the engine
 *
 * One call at a time per agent. By default the conversation carries over
 * between calls, so later goals see earlier ones as "Previous tasks".
 */

export interface AgentOptions {
  engine: ReasoningEngine;
  tools?: Tool[] | ToolRegistry;
  /** Snapshot of the environment, appended when a goal is seeded and (by default) after each step */
  observe?: ObserveFn;
  observeMode?: ObserveMode;
  systemPrompt?: string;
  /** When false, the conversation is cleared at the start of every call (default true) */
  stateful?: boolean;
  memory?: Partial<MemoryConfig>;
  toolTimeoutMs?: number;
  reasoningTimeoutMs?: number;
  engineRetries?: number;
  logger?: Logger;
  onStep?: OnStepCallback;
}

export interface DoOptions {
  maxIterations?: number;
  /** Schema the `complete_work` output must satisfy */
  outputSchema?: z.ZodType;
}

export interface TellOptions {
  maxIterations?: number;
}

export interface TellWithSchemaOptions<S extends z.ZodType> extends TellOptions {
  schema: S;
}

export interface CheckOptions {
  maxIterations?: number;
}

export interface RedoOptions {
  policy?: ReplayPolicy;
}

const DEFAULT_DO_ITERATIONS = 20;
const DEFAULT_QUERY_ITERATIONS = 10;
const DIAGNOSTIC_TURNS = 5;

export class Agent {
  private registry: ToolRegistry;
  private conversation = new Conversation();
  private loop: TaskLoop;
  private replayer: Replayer;
  private stateful: boolean;
  private logger: Logger;
  private busy = false;

  constructor(options: AgentOptions) {
    this.registry =
      options.tools instanceof ToolRegistry ? options.tools : new ToolRegistry(options.tools ?? []);
    this.registry.reserve(CONTROL_TOOL_NAMES, "the task loop");

    this.stateful = options.stateful ?? true;
    this.logger = options.logger ?? createLogger("taskpilot");

    this.loop = new TaskLoop({
      engine: options.engine,
      registry: this.registry,
      conversation: this.conversation,
      contextBuilder: new ContextBuilder({
        systemPrompt: options.systemPrompt,
        memory: options.memory,
      }),
      logger: this.logger,
      observe: options.observe,
      observeMode: options.observeMode,
      toolTimeoutMs: options.toolTimeoutMs,
      reasoningTimeoutMs: options.reasoningTimeoutMs,
      engineRetries: options.engineRetries,
      onStep: options.onStep,
    });

    this.replayer = new Replayer({
      registry: this.registry,
      conversation: this.conversation,
      logger: this.logger,
      toolTimeoutMs: options.toolTimeoutMs,
    });
  }

  /** Work toward `goal`; throws TaskAbortedError if the loop gives up */
  async do(goal: string, options: DoOptions = {}): Promise<Outcome> {
    return this.runLoop({
      mode: "do",
      goal,
      maxIterations: options.maxIterations ?? DEFAULT_DO_ITERATIONS,
      outputSchema: options.outputSchema,
    });
  }

  /** Answer a question; with a schema the answer is the validated structured output */
  tell(question: string, options?: TellOptions): Promise<string>;
  tell<S extends z.ZodType>(question: string, options: TellWithSchemaOptions<S>): Promise<z.output<S>>;
  async tell(
    question: string,
    options: TellOptions & { schema?: z.ZodType } = {},
  ): Promise<unknown> {
    const outcome = await this.runLoop({
      mode: "tell",
      goal: question,
      maxIterations: options.maxIterations ?? DEFAULT_QUERY_ITERATIONS,
      outputSchema: options.schema,
    });
    return options.schema ? outcome.output : outcome.feedback;
  }

  /** Judge whether `condition` holds; branch on `verdict.passed` */
  async check(condition: string, options: CheckOptions = {}): Promise<Verdict> {
    const outcome = await this.runLoop({
      mode: "check",
      goal: condition,
      maxIterations: options.maxIterations ?? DEFAULT_QUERY_ITERATIONS,
    });
    return Verdict.from(verdictSchema.parse(outcome.output), outcome.feedback);
  }

  /** Replay a recorded trace against the current tools, without the reasoning engine */
  async redo(trace: Trace, options: RedoOptions = {}): Promise<Outcome> {
    return this.exclusive(() => this.replayer.replay(trace, options.policy));
  }

  /** Clear the conversation; registered tools stay */
  reset(): void {
    this.conversation.reset();
  }

  /** Copy of the transcript */
  getHistory(): Turn[] {
    return this.conversation.entries();
  }

  get tools(): ToolRegistry {
    return this.registry;
  }

  private async runLoop(request: LoopRequest): Promise<Outcome> {
    return this.exclusive(async () => {
      const outcome = await this.loop.run(request);
      if (outcome.status === "aborted") {
        throw new TaskAbortedError(outcome, this.conversation.tail(DIAGNOSTIC_TURNS));
      }
      return outcome;
    });
  }

  private async exclusive<T>(work: () => Promise<T>): Promise<T> {
    if (this.busy) throw new AgentBusyError();
    this.busy = true;
    try {
      if (!this.stateful) this.conversation.reset();
      return await work();
    } finally {
      this.busy = false;
    }
  }
}
