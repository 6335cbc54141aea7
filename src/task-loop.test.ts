import { describe, it, expect } from "vitest";
import { z } from "zod";
import { ContextBuilder } from "./context-builder.js";
import { Conversation } from "./conversation.js";
import { ObservationError, ReasoningEngineError } from "./errors.js";
import { MockReasoningEngine, loopingEngine } from "./llm/mock-engine.js";
import { createLogger } from "./logger.js";
import { TaskLoop, type TaskLoopOptions } from "./task-loop.js";
import { ToolRegistry, defineTool } from "./tools/registry.js";
import type { ContentItem, OnStepCallback, ReasoningEngine, ReasoningStep, Turn } from "./types.js";

const logger = createLogger("task-loop-test", "silent");

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

function makeRegistry(events: string[] = []): ToolRegistry {
  return new ToolRegistry([
    defineTool(
      {
        name: "add",
        description: "Add two numbers",
        parameters: z.object({ a: z.number(), b: z.number() }),
      },
      ({ a, b }) => `${a} + ${b} = ${a + b}`,
    ),
    defineTool(
      {
        name: "wait",
        description: "Sleep, then report",
        parameters: z.object({ ms: z.number(), label: z.string() }),
      },
      async ({ ms, label }) => {
        events.push(`start ${label}`);
        await sleep(ms);
        events.push(`end ${label}`);
        return label;
      },
    ),
  ]);
}

function makeLoop(engine: ReasoningEngine, overrides: Partial<TaskLoopOptions> = {}) {
  const conversation = new Conversation();
  const loop = new TaskLoop({
    engine,
    registry: makeRegistry(),
    conversation,
    contextBuilder: new ContextBuilder(),
    logger,
    ...overrides,
  });
  return { loop, conversation };
}

function observationTexts(transcript: readonly Turn[]): string[] {
  return transcript.flatMap((t) =>
    t.kind === "observation" ? t.content.flatMap((c) => (c.type === "text" ? [c.text] : [])) : [],
  );
}

function counter(): { observe: () => Promise<ContentItem[]>; count: () => number } {
  let n = 0;
  return {
    observe: async () => [{ type: "text", text: `screen ${++n}` }],
    count: () => n,
  };
}

const addStep = {
  type: "actions" as const,
  requests: [{ name: "add", arguments: { a: 1, b: 2 } }],
};

describe("TaskLoop observation", () => {
  it("observes at seeding and after every dispatch by default", async () => {
    const screens = counter();
    const engine = new MockReasoningEngine([addStep, { type: "final", answer: "done" }]);
    const { loop } = makeLoop(engine, { observe: screens.observe });

    await loop.run({ mode: "do", goal: "g", maxIterations: 5 });

    expect(screens.count()).toBe(2);
    expect(observationTexts(engine.calls[0].transcript)).toEqual(["screen 1"]);
    expect(observationTexts(engine.calls[1].transcript)).toEqual(["screen 1", "screen 2"]);
  });

  it("does not observe after the last iteration of the budget", async () => {
    for (const [maxIterations, expected] of [
      [1, 1],
      [2, 2],
    ]) {
      const screens = counter();
      const { loop } = makeLoop(loopingEngine("add", { a: 1, b: 1 }), { observe: screens.observe });

      const outcome = await loop.run({ mode: "do", goal: "g", maxIterations });

      expect(outcome.status).toBe("aborted");
      expect(screens.count()).toBe(expected);
    }
  });

  it("wraps an observer failure with the goal and iteration reached", async () => {
    let calls = 0;
    const observe = async (): Promise<ContentItem[]> => {
      if (++calls === 2) throw new Error("observer down");
      return [{ type: "text", text: "screen" }];
    };
    const engine = new MockReasoningEngine([addStep, { type: "final", answer: "done" }]);
    const { loop, conversation } = makeLoop(engine, { observe });

    const error = await loop.run({ mode: "do", goal: "g", maxIterations: 5 }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ObservationError);
    if (!(error instanceof ObservationError)) return;
    expect(error.message).toBe('Observation failed at iteration 1 of task "g": observer down');
    expect(error.goal).toBe("g");
    expect(error.iterations).toBe(1);
    expect(error.recentTurns.map((t) => t.kind)).toContain("result");
    expect(conversation.sessionRecords()[0]).toMatchObject({ status: "aborted" });
  });

  it("observes only once in start mode", async () => {
    const screens = counter();
    const engine = new MockReasoningEngine([addStep, addStep, { type: "final", answer: "done" }]);
    const { loop } = makeLoop(engine, { observe: screens.observe, observeMode: "start" });

    await loop.run({ mode: "do", goal: "g", maxIterations: 5 });

    expect(screens.count()).toBe(1);
    expect(observationTexts(engine.calls[2].transcript)).toEqual(["screen 1"]);
  });

  it("skips empty observations", async () => {
    const engine = new MockReasoningEngine([{ type: "final", answer: "done" }]);
    const { loop, conversation } = makeLoop(engine, { observe: async () => [] });

    await loop.run({ mode: "do", goal: "g", maxIterations: 5 });

    expect(conversation.entries().some((t) => t.kind === "observation")).toBe(false);
  });
});

describe("TaskLoop dispatch", () => {
  it("assigns ids to requests that come without one", async () => {
    const engine = new MockReasoningEngine([
      {
        type: "actions",
        requests: [
          { name: "add", arguments: { a: 1, b: 1 } },
          { id: "mine", name: "add", arguments: { a: 2, b: 2 } },
        ],
      },
      { type: "final", answer: "done" },
    ]);
    const { loop, conversation } = makeLoop(engine);

    await loop.run({ mode: "do", goal: "g", maxIterations: 5 });

    const ids = conversation.entries().flatMap((t) => (t.kind === "invocation" ? [t.request.id] : []));
    expect(ids).toEqual(["call-0-1-1", "mine"]);
  });

  it("gives repeated ids in one batch a fresh id", async () => {
    const engine = new MockReasoningEngine([
      {
        type: "actions",
        requests: [
          { id: "x", name: "add", arguments: { a: 1, b: 1 } },
          { id: "x", name: "add", arguments: { a: 2, b: 2 } },
        ],
      },
      { type: "final", answer: "done" },
    ]);
    const { loop, conversation } = makeLoop(engine);

    const outcome = await loop.run({ mode: "do", goal: "g", maxIterations: 5 });

    expect(outcome.status).toBe("completed");
    const ids = conversation.entries().flatMap((t) => (t.kind === "invocation" ? [t.request.id] : []));
    expect(ids).toEqual(["x", "call-0-1-2"]);
  });

  it("runs independent requests concurrently and appends results in request order", async () => {
    const events: string[] = [];
    const engine = new MockReasoningEngine([
      {
        type: "actions",
        independent: true,
        requests: [
          { name: "wait", arguments: { ms: 30, label: "slow" } },
          { name: "wait", arguments: { ms: 1, label: "fast" } },
        ],
      },
      { type: "final", answer: "done" },
    ]);
    const { loop, conversation } = makeLoop(engine, { registry: makeRegistry(events) });

    const outcome = await loop.run({ mode: "do", goal: "g", maxIterations: 5 });

    expect(events).toEqual(["start slow", "start fast", "end fast", "end slow"]);
    const results = conversation.entries().flatMap((t) => (t.kind === "result" ? [t.result.description] : []));
    expect(results).toEqual(["slow", "fast"]);
    expect(outcome.trace.steps.map((s) => s.arguments)).toEqual([
      { ms: 30, label: "slow" },
      { ms: 1, label: "fast" },
    ]);
  });

  it("reports each iteration to onStep", async () => {
    const steps: Parameters<OnStepCallback>[0][] = [];
    const engine = new MockReasoningEngine([
      { ...addStep, thinking: "  adding  " },
      { type: "final", answer: "3" },
    ]);
    const { loop } = makeLoop(engine, { onStep: (step) => steps.push(step) });

    await loop.run({ mode: "do", goal: "g", maxIterations: 5 });

    expect(steps).toHaveLength(2);
    expect(steps[0].iteration).toBe(1);
    expect(steps[0].thinking).toBe("adding");
    expect(steps[0].results.map((r) => r.description)).toEqual(["1 + 2 = 3"]);
    expect(steps[1]).toEqual({ iteration: 2, requests: [], results: [], thinking: null });
  });

  it("rejects a budget that is not a positive integer", async () => {
    const { loop } = makeLoop(new MockReasoningEngine([]));
    await expect(loop.run({ mode: "do", goal: "g", maxIterations: 0 })).rejects.toThrow(
      "maxIterations must be a positive integer, got 0",
    );
  });
});

describe("TaskLoop engine faults", () => {
  it("retries a failing engine call after the first iteration", async () => {
    const engine = new MockReasoningEngine([
      addStep,
      new Error("flaky"),
      { type: "final", answer: "done" },
    ]);
    const { loop } = makeLoop(engine);

    const outcome = await loop.run({ mode: "do", goal: "g", maxIterations: 5 });

    expect(outcome.status).toBe("completed");
    expect(outcome.iterations).toBe(2);
    expect(engine.calls).toHaveLength(3);
  });

  it("retries a malformed step like any other engine fault", async () => {
    const malformed: ReasoningStep = JSON.parse('{"type":"actions"}');
    const engine = new MockReasoningEngine([addStep, malformed, { type: "final", answer: "done" }]);
    const { loop } = makeLoop(engine);

    const outcome = await loop.run({ mode: "do", goal: "g", maxIterations: 5 });

    expect(outcome.status).toBe("completed");
    expect(engine.calls).toHaveLength(3);
  });

  it("fails with ReasoningEngineError on a malformed first step", async () => {
    const malformed: ReasoningStep = JSON.parse('{"type":"actions"}');
    const { loop } = makeLoop(new MockReasoningEngine([malformed]));

    const error = await loop.run({ mode: "do", goal: "g", maxIterations: 5 }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ReasoningEngineError);
    if (!(error instanceof ReasoningEngineError)) return;
    expect(
      error.message.startsWith('Reasoning engine failed on iteration 1 of task "g": Malformed reasoning step: '),
    ).toBe(true);
  });

  it("gives up once the retries are spent", async () => {
    const engine = new MockReasoningEngine([addStep, new Error("down"), new Error("still down")]);
    const { loop, conversation } = makeLoop(engine, { engineRetries: 1 });

    const run = loop.run({ mode: "do", goal: "g", maxIterations: 5 });

    await expect(run).rejects.toThrow('Reasoning engine failed on iteration 2 of task "g": still down');
    expect(engine.calls).toHaveLength(3);
    expect(conversation.sessionRecords()[0]).toMatchObject({ status: "aborted" });
  });

  it("times out a slow first reasoning call", async () => {
    const slow: ReasoningEngine = {
      reason: () =>
        new Promise((resolve) => setTimeout(() => resolve({ type: "final", answer: "late" }), 100)),
    };
    const { loop } = makeLoop(slow, { reasoningTimeoutMs: 10 });

    const run = loop.run({ mode: "do", goal: "g", maxIterations: 5 });

    await expect(run).rejects.toBeInstanceOf(ReasoningEngineError);
    await expect(run).rejects.toThrow("Reasoning engine timed out after 10ms");
  });
});
