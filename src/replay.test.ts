import { describe, it, expect } from "vitest";
import { z } from "zod";
import { Conversation } from "./conversation.js";
import { ReplayError } from "./errors.js";
import { createLogger } from "./logger.js";
import { Replayer } from "./replay.js";
import { ToolRegistry, defineTool } from "./tools/registry.js";

const logger = createLogger("replay-test", "silent");

function setup() {
  const calls: number[] = [];
  const registry = new ToolRegistry([
    defineTool(
      {
        name: "add",
        description: "Add two numbers",
        parameters: z.object({ a: z.number(), b: z.number() }),
      },
      ({ a, b }) => {
        calls.push(a + b);
        return `${a} + ${b} = ${a + b}`;
      },
    ),
  ]);
  const conversation = new Conversation();
  return { calls, conversation, replayer: new Replayer({ registry, conversation, logger }) };
}

describe("Replayer", () => {
  it("re-runs every step and completes", async () => {
    const { calls, conversation, replayer } = setup();
    const outcome = await replayer.replay({
      goal: "Add twice",
      steps: [
        { name: "add", arguments: { a: 2, b: 3 } },
        { name: "add", arguments: { a: 1, b: 1 } },
      ],
    });

    expect(calls).toEqual([5, 2]);
    expect(outcome).toMatchObject({
      goal: "Add twice",
      status: "completed",
      feedback: "Replayed 2 action(s)",
      iterations: 2,
      maxIterations: 2,
    });
    expect(outcome.trace.steps).toHaveLength(2);
    expect(outcome.summary).toBe("  - 2 + 3 = 5\n  - 1 + 1 = 2");
    expect(conversation.sessionRecords()[0]).toMatchObject({ mode: "redo", status: "completed" });
  });

  it("tolerant policy records failures and keeps going", async () => {
    const { calls, replayer } = setup();
    const outcome = await replayer.replay({
      goal: "Mixed",
      steps: [
        { name: "fly", arguments: {} },
        { name: "add", arguments: { a: 1, b: 2 } },
      ],
    });

    expect(calls).toEqual([3]);
    expect(outcome.status).toBe("aborted");
    expect(outcome.feedback).toBe(
      "Replay finished with 1 failed step(s): step 1 fly: Unknown tool: fly",
    );
  });

  it("strict policy refuses unknown actions before running anything", async () => {
    const { calls, conversation, replayer } = setup();
    const run = replayer.replay(
      {
        goal: "Mixed",
        steps: [
          { name: "add", arguments: { a: 1, b: 2 } },
          { name: "fly", arguments: {} },
          { name: "fly", arguments: {} },
        ],
      },
      "strict",
    );

    await expect(run).rejects.toThrow(
      'Replay of "Mixed" needs tools that are not registered: fly',
    );
    await expect(run).rejects.toBeInstanceOf(ReplayError);
    expect(calls).toEqual([]);
    expect(conversation.sessionRecords()[0].status).toBe("aborted");
  });

  it("strict policy stops at the first failing step", async () => {
    const { calls, replayer } = setup();
    const run = replayer.replay(
      {
        goal: "Bad args",
        steps: [
          { name: "add", arguments: { a: 1, b: 1 } },
          { name: "add", arguments: { a: "x", b: 1 } },
          { name: "add", arguments: { a: 4, b: 4 } },
        ],
      },
      "strict",
    );

    await expect(run).rejects.toThrow('Replay of "Bad args" failed at step 2: add: Invalid arguments: a: ');
    expect(calls).toEqual([2]);
  });

  it("replays an empty trace as a completed no-op", async () => {
    const { replayer } = setup();
    const outcome = await replayer.replay({ goal: "Nothing", steps: [] });
    expect(outcome).toMatchObject({ status: "completed", iterations: 0, feedback: "Replayed 0 action(s)" });
  });
});
