import type { z } from "zod";
import type {
  BoundInvocation,
  RejectedArguments,
  Tool,
  ToolDefinition,
  ToolOutput,
} from "../types.js";

/**
 * Central action registry.
 *
 * Responsibilities:
 * 1. Register tools with schema + handler (names are unique)
 * 2. Resolve a tool by name for dispatch
 * 3. Export definitions for the reasoning engine
 */
export class ToolRegistry {
  private tools = new Map<string, Tool>();
  /** Names `register` refuses, mapped to who reserved them */
  private reserved = new Map<string, string>();

  constructor(tools: Iterable<Tool> = []) {
    for (const tool of tools) this.register(tool);
  }

  register(tool: Tool): void {
    const { name } = tool.definition;
    const owner = this.reserved.get(name);
    if (owner !== undefined) {
      throw new Error(`Tool name "${name}" is reserved for ${owner}`);
    }
    if (this.tools.has(name)) {
      throw new Error(`Tool "${name}" is already registered`);
    }
    this.tools.set(name, tool);
  }

  /**
   * Refuse these names from now on; throws if one is already registered.
   * Copies made with `with()` do not inherit reservations.
   */
  reserve(names: Iterable<string>, owner: string): void {
    for (const name of names) {
      if (this.tools.has(name)) {
        throw new Error(`Tool name "${name}" is reserved for ${owner}`);
      }
      this.reserved.set(name, owner);
    }
  }

  unregister(name: string): boolean {
    return this.tools.delete(name);
  }

  get(name: string): Tool | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  /** New registry holding these tools plus `extra`; this one is untouched */
  with(extra: Iterable<Tool>): ToolRegistry {
    const copy = new ToolRegistry(this.tools.values());
    for (const tool of extra) copy.register(tool);
    return copy;
  }

  /** Return definitions for all registered tools */
  definitions(): ToolDefinition[] {
    return [...this.tools.values()].map((t) => t.definition);
  }

  /** Number of registered tools */
  get size(): number {
    return this.tools.size;
  }

  /** All registered tool names, in registration order */
  names(): string[] {
    return [...this.tools.keys()];
  }
}

// ---------------------------------------------------------------------------
// Helpers to build a Tool from a function or a stateful object
// ---------------------------------------------------------------------------

export type ToolReturn = string | ToolOutput;

export interface ToolSpec<S extends z.ZodType> {
  name: string;
  description: string;
  parameters: S;
}

/** Object-shaped tool: keeps its own state, `run` is called as a method */
export interface Capability<S extends z.ZodType> extends ToolSpec<S> {
  run(args: z.output<S>): Promise<ToolReturn> | ToolReturn;
}

export function formatIssues<T>(error: z.ZodError<T>): string {
  return error.issues
    .map((i) => `${i.path.map(String).join(".") || "<root>"}: ${i.message}`)
    .join("; ");
}

export function toToolOutput(value: ToolReturn): ToolOutput {
  return typeof value === "string" ? { status: "success", description: value } : value;
}

export function defineTool<S extends z.ZodType>(
  options: ToolSpec<S>,
  handler: (args: z.output<S>) => Promise<ToolReturn> | ToolReturn,
): Tool {
  const definition: ToolDefinition = {
    name: options.name,
    description: options.description,
    parameters: options.parameters,
  };
  return {
    definition,
    bind(args: unknown): BoundInvocation | RejectedArguments {
      const parsed = options.parameters.safeParse(args);
      if (!parsed.success) {
        return { ok: false, message: formatIssues(parsed.error) };
      }
      const data = parsed.data;
      return {
        ok: true,
        arguments: data,
        run: async () => toToolOutput(await handler(data)),
      };
    },
  };
}

export function capabilityTool<S extends z.ZodType>(capability: Capability<S>): Tool {
  return defineTool(
    {
      name: capability.name,
      description: capability.description,
      parameters: capability.parameters,
    },
    (args) => capability.run(args),
  );
}
