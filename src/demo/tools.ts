import { z } from "zod";
import { capabilityTool, defineTool, type ToolReturn } from "../tools/registry.js";
import type { Tool } from "../types.js";

/**
 * Demo tool set: two pure calculator tools and a stateful notepad, so the
 * interactive demo has something to act on.
 */

const operands = z.object({
  a: z.number().describe("First operand"),
  b: z.number().describe("Second operand"),
});

export const addTool = defineTool(
  { name: "add", description: "Add two numbers", parameters: operands },
  ({ a, b }) => ({ status: "success", description: `${a} + ${b} = ${a + b}`, payload: a + b }),
);

export const multiplyTool = defineTool(
  { name: "multiply", description: "Multiply two numbers", parameters: operands },
  ({ a, b }) => ({ status: "success", description: `${a} * ${b} = ${a * b}`, payload: a * b }),
);

const noteArgs = z.object({
  action: z.enum(["write", "read", "clear"]),
  text: z.string().optional().describe("Line to append; required for write"),
});

/** Line-oriented scratchpad the model can write to and read back */
export class Notepad {
  readonly name = "notepad";
  readonly description = "Keep notes between steps: write appends a line, read returns all lines, clear empties it";
  readonly parameters = noteArgs;
  private lines: string[] = [];

  run(args: z.output<typeof noteArgs>): ToolReturn {
    switch (args.action) {
      case "write":
        if (!args.text) {
          return { status: "failure", description: "write needs text" };
        }
        this.lines.push(args.text);
        return `Noted (${this.lines.length} line(s))`;
      case "read":
        return {
          status: "success",
          description: this.lines.length > 0 ? this.lines.join("\n") : "(empty)",
          payload: [...this.lines],
        };
      case "clear":
        this.lines = [];
        return "Notepad cleared";
    }
  }

  get contents(): readonly string[] {
    return this.lines;
  }
}

export function createDemoTools(notepad = new Notepad()): Tool[] {
  return [addTool, multiplyTool, capabilityTool(notepad)];
}
