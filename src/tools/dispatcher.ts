import type { Logger } from "pino";
import { TimeoutError, errorMessage } from "../errors.js";
import { withTimeout } from "../utils/timeout.js";
import type {
  BoundInvocation,
  FailureKind,
  InvocationRequest,
  InvocationResult,
  RejectedArguments,
  ToolOutput,
} from "../types.js";
import type { ToolRegistry } from "./registry.js";

export interface DispatcherOptions {
  logger: Logger;
  /** Per-invocation limit; unset means no limit */
  toolTimeoutMs?: number;
  /** Fired for every request whose arguments validated, before it runs */
  onInvoked?: (request: InvocationRequest, args: unknown) => void;
}

/**
 * ToolDispatcher — turns invocation requests into results.
 *
 * `dispatch` never throws. Unknown names, rejected arguments, thrown errors and
 * timeouts all come back as failure results so the reasoning engine can read
 * them and try again.
 */
export class ToolDispatcher {
  private registry: ToolRegistry;
  private logger: Logger;
  private toolTimeoutMs?: number;
  private onInvoked?: (request: InvocationRequest, args: unknown) => void;

  constructor(registry: ToolRegistry, options: DispatcherOptions) {
    this.registry = registry;
    this.logger = options.logger.child({ component: "dispatcher" });
    this.toolTimeoutMs = options.toolTimeoutMs;
    this.onInvoked = options.onInvoked;
  }

  async dispatch(request: InvocationRequest): Promise<InvocationResult> {
    const tool = this.registry.get(request.name);
    if (!tool) {
      this.logger.warn({ tool: request.name }, "unknown tool requested");
      return failure(request, "unknown_action", `Unknown tool: ${request.name}`);
    }

    // a throwing transform/refine, or an async one under a sync parse, lands here
    let bound: BoundInvocation | RejectedArguments;
    try {
      bound = tool.bind(request.arguments);
    } catch (err) {
      bound = { ok: false, message: errorMessage(err) };
    }
    if (!bound.ok) {
      this.logger.warn({ tool: request.name, issues: bound.message }, "invalid tool arguments");
      return failure(request, "invalid_arguments", `Invalid arguments: ${bound.message}`);
    }

    let output: ToolOutput;
    try {
      this.onInvoked?.(request, bound.arguments);
      this.logger.info({ tool: request.name, args: bound.arguments }, "executing tool");
      output = await withTimeout(
        Promise.resolve().then(bound.run),
        this.toolTimeoutMs,
        `Tool "${request.name}"`,
      );
    } catch (err) {
      const kind: FailureKind = err instanceof TimeoutError ? "timeout" : "tool_execution_fault";
      this.logger.error({ tool: request.name, err }, "tool execution failed");
      return failure(request, kind, errorMessage(err));
    }

    this.logger.info({ tool: request.name, status: output.status }, output.description);
    const result: InvocationResult = {
      requestId: request.id,
      name: request.name,
      status: output.status,
      description: output.description,
      payload: output.payload,
    };
    if (output.status === "failure") {
      result.failure = { kind: "tool_failure", message: output.description };
    }
    return Object.freeze(result);
  }

  /**
   * Dispatch a batch. Results come back in request order either way;
   * `concurrent` only changes whether the invocations overlap in time.
   */
  async dispatchAll(
    requests: readonly InvocationRequest[],
    options: { concurrent?: boolean } = {},
  ): Promise<InvocationResult[]> {
    if (options.concurrent) {
      return Promise.all(requests.map((r) => this.dispatch(r)));
    }
    const results: InvocationResult[] = [];
    for (const request of requests) {
      results.push(await this.dispatch(request));
    }
    return results;
  }
}

function failure(
  request: InvocationRequest,
  kind: FailureKind,
  message: string,
): InvocationResult {
  const result: InvocationResult = {
    requestId: request.id,
    name: request.name,
    status: "failure",
    description: `${request.name} (${kind})`,
    failure: { kind, message },
  };
  return Object.freeze(result);
}
