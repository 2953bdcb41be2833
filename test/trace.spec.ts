import { describe, expect, it } from "vitest";
import { Arena, TraceRecorder, Value } from "../src";

describe("trace", () => {
  it("records allocations with deduplicated parents", () => {
    const arena = new Arena({ trace: true });
    const x = Value.fromScalar(3, arena);
    const y = x.mul(x);

    expect(arena.trace?.snapshot()).toEqual([
      { type: "alloc", id: x.id, op: "leaf", parents: [] },
      { type: "alloc", id: y.id, op: "mul", parents: [x.id] },
    ]);
  });

  it("records backward in reverse topological order", () => {
    const trace = new TraceRecorder();
    const arena = new Arena({ trace });
    const x = Value.fromScalar(3, arena);
    const y = x.mul(x);
    trace.clear();

    y.backward();

    expect(trace.snapshot()).toEqual([
      { type: "backward_begin", root: y.id, nodes: 2 },
      { type: "backward_node", id: y.id, op: "mul", rule: "mul" },
      { type: "backward_node", id: x.id, op: "leaf", rule: null },
      { type: "backward_end", root: y.id },
    ]);
  });

  it("shows spent rules on a second pass", () => {
    const trace = new TraceRecorder();
    const arena = new Arena({ trace });
    const x = Value.fromScalar(3, arena);
    const y = x.relu();
    y.backward();
    trace.clear();

    y.backward();

    expect(
      trace.snapshot().filter((event) => event.type === "backward_node"),
    ).toEqual([
      { type: "backward_node", id: y.id, op: "relu", rule: null },
      { type: "backward_node", id: x.id, op: "leaf", rule: null },
    ]);
  });

  it("records the three nodes behind a subtraction", () => {
    const arena = new Arena({ trace: true });
    const a = Value.fromScalar(5, arena);
    const b = Value.fromScalar(3, arena);
    arena.trace?.clear();

    const diff = a.sub(b);

    // Ids are handed out in allocation order: the -1 leaf, the neg, the sub.
    expect(arena.trace?.snapshot()).toEqual([
      { type: "alloc", id: diff.id - 2, op: "leaf", parents: [] },
      { type: "alloc", id: diff.id - 1, op: "neg", parents: [b.id, diff.id - 2] },
      { type: "alloc", id: diff.id, op: "sub", parents: [a.id, diff.id - 1] },
    ]);
  });

  it("records gradient bookkeeping", () => {
    const trace = new TraceRecorder();
    const arena = new Arena({ trace });
    const x = Value.fromScalar(3, arena);
    trace.clear();

    x.zeroGrad();
    x.applyGradientStep(0.1);

    expect(trace.snapshot()).toEqual([
      { type: "zero_grad", id: x.id },
      { type: "gradient_step", id: x.id, lr: 0.1 },
    ]);
  });

  it("stays off unless requested", () => {
    const arena = new Arena();
    Value.fromScalar(1, arena);
    expect(arena.trace).toBeNull();
  });
});
