import { describe, expect, it } from "vitest";
import { Arena, linearDecay, SGD, Value } from "../src";

describe("SGD", () => {
  it("steps each parameter against its gradient", () => {
    const arena = new Arena();
    const x = Value.fromScalar(2, arena);
    const y = Value.fromScalar(-1, arena);
    x.mul(x).add(y.mul(3)).backward();

    const opt = new SGD([x, y], { lr: 0.1 });
    opt.step();

    expect(x.data).toBeCloseTo(1.6, 12);
    expect(y.data).toBeCloseTo(-1.3, 12);
    // Gradients survive a step until zeroGrad.
    expect(x.grad).toBe(4);

    opt.zeroGrad();
    expect(x.grad).toBe(0);
    expect(y.grad).toBe(0);
  });

  it("uses a learning rate changed between steps", () => {
    const arena = new Arena();
    const x = Value.fromScalar(1, arena);
    x.mul(2).backward();

    const opt = new SGD([x], { lr: 1 });
    opt.setLearningRate(0.25);
    opt.step();

    expect(opt.learningRate).toBe(0.25);
    expect(x.data).toBe(0.5);
  });

  it("copies its parameter list", () => {
    const arena = new Arena();
    const params = [Value.fromScalar(1, arena)];
    const opt = new SGD(params, { lr: 0.1 });
    params.push(Value.fromScalar(2, arena));

    expect(opt.getParams()).toHaveLength(1);
    expect(opt.arena).toBe(arena);
  });

  it("validates its parameters and learning rate", () => {
    const arena = new Arena();
    const x = Value.fromScalar(1, arena);

    expect(() => new SGD([], { lr: 0.1 })).toThrow("SGD requires at least one parameter");
    expect(() => new SGD([x, Value.fromScalar(1, new Arena())], { lr: 0.1 })).toThrow(
      "SGD parameters must share the same arena",
    );
    expect(() => new SGD([x.add(1)], { lr: 0.1 })).toThrow(
      "SGD parameters must be leaf values, got add",
    );
    expect(() => new SGD([x], { lr: 0 })).toThrow("SGD learning rate must be > 0, got 0");
    expect(() => new SGD([x], { lr: 0.1 }).setLearningRate(Number.NaN)).toThrow(
      "SGD learning rate must be > 0, got NaN",
    );
  });
});

describe("linearDecay", () => {
  it("goes from 1 at the first epoch towards 0.1 at the last", () => {
    expect(linearDecay(0, 10)).toBe(1);
    expect(linearDecay(5, 10)).toBeCloseTo(0.55, 12);
    expect(linearDecay(10, 10)).toBeCloseTo(0.1, 12);
  });

  it("takes custom endpoints", () => {
    expect(linearDecay(1, 4, { start: 0.5, end: 0.1 })).toBeCloseTo(0.4, 12);
  });

  it("needs a positive epoch count", () => {
    expect(() => linearDecay(0, 0)).toThrow("linearDecay needs a positive epoch count, got 0");
  });
});
