import type { LoopMode, SessionRecord } from "../types.js";

/**
 * Prompt text the context builder and engine adapters put in front of the model.
 *
 * Tool schemas are not rendered here: adapters hand them to the provider's
 * native function-calling API.
 */

export const DEFAULT_SYSTEM_PROMPT = [
  "You are an autonomous agent that completes tasks using the available tools.",
  "",
  "## How to work",
  "",
  "1. Read the current task and the latest observation of the environment",
  "2. Decide which tool(s) to call",
  "3. Call them and read their results",
  "4. Repeat until the task is done",
  "",
  "## Rules",
  "",
  "- Use tools to interact with the environment; never invent their results.",
  "- A failed tool call is reported back to you. Fix the arguments and retry, or choose another tool.",
  "- When the task is complete, call `complete_work` with a brief summary.",
  "- If you cannot proceed (stuck, blocked, or impossible), call `abort_work` with an explanation.",
  "- Be concise in your reasoning.",
].join("\n");

const GOAL_HEADINGS: Record<LoopMode, string> = {
  do: "## Current task:",
  tell: "## Question:",
  check: "## Condition to check:",
  redo: "## Replayed task:",
};

const GOAL_INSTRUCTIONS: Partial<Record<LoopMode, string>> = {
  tell:
    "Find the answer using the tools if needed, then call `complete_work` " +
    "with the answer as feedback and, when a schema is given, as output.",
  check:
    "Determine whether the condition holds, then call `complete_work` with " +
    'output {"passed": true} or {"passed": false, "reason": "<why not>"}.',
};

export function renderGoal(mode: LoopMode, text: string): string {
  const lines = [GOAL_HEADINGS[mode], text];
  const instructions = GOAL_INSTRUCTIONS[mode];
  if (instructions) lines.push("", instructions);
  return lines.join("\n");
}

export function formatPreviousTasks(records: readonly SessionRecord[]): string {
  const lines = ["## Previous tasks:", ""];
  records.forEach((record, i) => {
    lines.push(`### Task ${i + 1}`);
    lines.push(`Task: ${record.goal}`);
    if (record.status) {
      lines.push(`Status: ${record.status[0].toUpperCase()}${record.status.slice(1)}`);
    }
    if (record.feedback) lines.push(`Feedback: ${record.feedback}`);
    lines.push("");
  });
  return lines.join("\n").trimEnd();
}
