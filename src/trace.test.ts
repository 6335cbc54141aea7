import { describe, it, expect } from "vitest";
import { TraceRecorder, parseTrace, serializeTrace } from "./trace.js";

describe("TraceRecorder", () => {
  it("records dispatched actions in order and skips control tools", () => {
    const recorder = new TraceRecorder("Add numbers");
    recorder.record({ id: "1", name: "add", arguments: { a: 2, b: 3 } }, { a: 2, b: 3 });
    recorder.record({ id: "2", name: "complete_work", arguments: {} }, { feedback: "done" });
    recorder.record({ id: "3", name: "multiply", arguments: { a: 5, b: 2 } }, { a: 5, b: 2 });

    expect(recorder.length).toBe(2);
    expect(recorder.toTrace()).toEqual({
      goal: "Add numbers",
      steps: [
        { name: "add", arguments: { a: 2, b: 3 } },
        { name: "multiply", arguments: { a: 5, b: 2 } },
      ],
    });
  });

  it("hands out independent copies", () => {
    const recorder = new TraceRecorder("g");
    recorder.record({ id: "1", name: "add", arguments: {} }, {});
    recorder.toTrace().steps.pop();
    expect(recorder.toTrace().steps).toHaveLength(1);
  });
});

describe("trace serialization", () => {
  it("writes a versioned JSON document", () => {
    const json = serializeTrace({ goal: "g", steps: [{ name: "add", arguments: { a: 1 } }] });
    expect(JSON.parse(json)).toEqual({
      version: 1,
      goal: "g",
      steps: [{ name: "add", arguments: { a: 1 } }],
    });
  });

  it("parses what it serialized", () => {
    const trace = { goal: "Add numbers", steps: [{ name: "add", arguments: { a: 2, b: 3 } }] };
    expect(parseTrace(serializeTrace(trace))).toEqual(trace);
  });

  it("rejects documents with the wrong shape or version", () => {
    expect(() => parseTrace("not json")).toThrow();
    expect(() => parseTrace(JSON.stringify({ version: 2, goal: "g", steps: [] }))).toThrow();
    expect(() => parseTrace(JSON.stringify({ version: 1, goal: "g", steps: [{ name: "" }] }))).toThrow();
  });
});
