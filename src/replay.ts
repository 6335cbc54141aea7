import type { Logger } from "pino";
import { summarizeActions, type Conversation } from "./conversation.js";
import { ReplayError } from "./errors.js";
import { ToolDispatcher } from "./tools/dispatcher.js";
import type { ToolRegistry } from "./tools/registry.js";
import { TraceRecorder } from "./trace.js";
import type { Outcome, OutcomeStatus, Trace } from "./types.js";

/**
 * - "tolerant": a failing step is recorded and the replay carries on
 * - "strict": an unknown action aborts before anything runs; the first failing step throws
 */
export type ReplayPolicy = "tolerant" | "strict";

export interface ReplayerOptions {
  registry: ToolRegistry;
  conversation: Conversation;
  logger: Logger;
  toolTimeoutMs?: number;
}

const DIAGNOSTIC_TURNS = 5;

/**
 * Replayer — runs a recorded trace through the dispatcher again, against the
 * current registry, without asking the reasoning engine anything.
 */
export class Replayer {
  private registry: ToolRegistry;
  private conversation: Conversation;
  private logger: Logger;
  private toolTimeoutMs?: number;

  constructor(options: ReplayerOptions) {
    this.registry = options.registry;
    this.conversation = options.conversation;
    this.logger = options.logger.child({ component: "replayer" });
    this.toolTimeoutMs = options.toolTimeoutMs;
  }

  async replay(trace: Trace, policy: ReplayPolicy = "tolerant"): Promise<Outcome> {
    const { goal, steps } = trace;
    const session = this.conversation.beginSession("redo", goal);
    this.conversation.append({ kind: "goal", session, iteration: 0, mode: "redo", text: goal });
    this.logger.info({ goal, steps: steps.length, policy }, "replay start");

    if (policy === "strict") {
      const missing = steps.filter((s) => !this.registry.has(s.name)).map((s) => s.name);
      if (missing.length > 0) {
        const message = `Replay of "${goal}" needs tools that are not registered: ${[...new Set(missing)].join(", ")}`;
        this.conversation.closeSession(session, "aborted", message);
        throw new ReplayError(message, {
          goal,
          iterations: 0,
          recentTurns: this.conversation.tail(DIAGNOSTIC_TURNS),
        });
      }
    }

    const recorder = new TraceRecorder(goal);
    const dispatcher = new ToolDispatcher(this.registry, {
      logger: this.logger,
      toolTimeoutMs: this.toolTimeoutMs,
      onInvoked: (request, args) => recorder.record(request, args),
    });

    const failures: string[] = [];
    for (const [index, step] of steps.entries()) {
      const iteration = index + 1;
      const request = { id: `replay-${session}-${iteration}`, name: step.name, arguments: step.arguments };
      this.conversation.append({ kind: "invocation", session, iteration, request });
      const result = await dispatcher.dispatch(request);
      this.conversation.append({ kind: "result", session, iteration, result });

      if (result.status === "success") continue;

      const message = `${step.name}: ${result.failure?.message ?? result.description}`;
      if (policy === "strict") {
        const feedback = `Replay of "${goal}" failed at step ${iteration}: ${message}`;
        this.conversation.closeSession(session, "aborted", feedback);
        throw new ReplayError(feedback, {
          goal,
          iterations: iteration,
          recentTurns: this.conversation.tail(DIAGNOSTIC_TURNS),
        });
      }
      this.logger.warn({ goal, iteration, tool: step.name }, "replay step failed, continuing");
      failures.push(`step ${iteration} ${message}`);
    }

    const status: OutcomeStatus = failures.length === 0 ? "completed" : "aborted";
    const feedback =
      status === "completed"
        ? `Replayed ${steps.length} action(s)`
        : `Replay finished with ${failures.length} failed step(s): ${failures.join("; ")}`;
    this.conversation.closeSession(session, status, feedback);
    this.logger.info({ goal, status }, "replay end");

    return Object.freeze({
      goal,
      status,
      feedback,
      iterations: steps.length,
      maxIterations: steps.length,
      trace: recorder.toTrace(),
      summary: summarizeActions(this.conversation.sessionTurns(session)),
    });
  }
}
