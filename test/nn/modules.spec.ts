/**
 * Tests for nn modules: Neuron, Layer, MLP and the max-margin loss
 */
import { beforeEach, describe, expect, it } from "vitest";
import { Arena, Rng, Value } from "../../src";
import { Layer } from "../../src/nn/layer";
import { svmLoss } from "../../src/nn/loss";
import { MLP } from "../../src/nn/mlp";
import { Neuron } from "../../src/nn/neuron";

describe("nn.Neuron", () => {
  let arena: Arena;
  const s = (v: number) => Value.fromScalar(v, arena);

  beforeEach(() => {
    arena = new Arena();
  });

  it("draws weights in [-1, 1] and a zero bias", () => {
    const neuron = new Neuron(3, { arena, rng: new Rng(7) });

    expect(neuron.parameters()).toHaveLength(4);
    for (const w of neuron.weights) {
      expect(w.data).toBeGreaterThanOrEqual(-1);
      expect(w.data).toBeLessThan(1);
    }
    expect(neuron.bias.data).toBe(0);
  });

  it("computes relu(b + w·x) from supplied parameters", () => {
    const neuron = new Neuron(2, { parameters: [s(2), s(-3), s(1)] });

    expect(neuron.forward([s(1), s(1)]).data).toBe(0);
    expect(neuron.forward([s(1), s(0)]).data).toBe(3);
    expect(neuron.toString()).toBe("Neuron: (2, ReLU)");
  });

  it("skips the relu when linear", () => {
    const neuron = new Neuron(2, { nonlinear: false, parameters: [s(2), s(-3), s(1)] });

    expect(neuron.forward([s(0), s(1)]).data).toBe(-2);
    expect(neuron.toString()).toBe("Neuron: (2, Linear)");
  });

  it("rejects inputs of the wrong width", () => {
    const neuron = new Neuron(2, { arena, rng: new Rng(1) });
    expect(() => neuron.forward([s(1)])).toThrow("Neuron expects 2 inputs, got 1");
  });

  it("rejects a wrong number of supplied parameters", () => {
    expect(() => new Neuron(2, { parameters: [s(1), s(2)] })).toThrow(
      "Expected at least 3 parameters, got 2",
    );
    expect(() => new Neuron(1, { parameters: [s(1), s(2), s(3)] })).toThrow(
      "Expected 2 parameters, got 3",
    );
  });
});

describe("nn.Layer", () => {
  it("holds one neuron per output", () => {
    const arena = new Arena();
    const layer = new Layer(3, 2, { arena, rng: new Rng(3) });
    const out = layer.forward([1, 2, 3].map((v) => Value.fromScalar(v, arena)));

    expect(layer.neurons).toHaveLength(2);
    expect(layer.modules()).toHaveLength(2);
    expect(layer.parameters()).toHaveLength(8);
    expect(out).toHaveLength(2);
    expect(layer.toString()).toBe("Layer:\nNeuron: (3, ReLU)\nNeuron: (3, ReLU)");
  });
});

describe("nn.MLP", () => {
  it("counts the parameters of every layer", () => {
    const model = new MLP([2, 16, 16, 1], { arena: new Arena(), rng: new Rng(1) });
    expect(model.parameters()).toHaveLength(337);
    expect(model.layers.map((layer) => layer.outDim)).toEqual([16, 16, 1]);
  });

  it("applies relu to every layer but the last", () => {
    const model = new MLP([2, 2, 1], { arena: new Arena(), rng: new Rng(1) });
    expect(model.toString()).toBe(
      [
        "MLP:",
        "Layer:",
        "Neuron: (2, ReLU)",
        "Neuron: (2, ReLU)",
        "Layer:",
        "Neuron: (2, Linear)",
      ].join("\n"),
    );
  });

  it("is reproducible for a given seed", () => {
    const weights = (seed: number) =>
      new MLP([2, 4, 1], { arena: new Arena(), rng: new Rng(seed) })
        .parameters()
        .map((p) => p.data);

    expect(weights(11)).toEqual(weights(11));
    expect(weights(11)).not.toEqual(weights(12));
  });

  it("rebuilds a model over existing parameter handles", () => {
    const arena = new Arena();
    const original = new MLP([2, 3, 1], { arena, rng: new Rng(5) });
    const clone = MLP.fromParameters([2, 3, 1], original.parameters());
    const x = [Value.fromScalar(0.5, arena), Value.fromScalar(-1.5, arena)];

    expect(clone.parameters().every((p, i) => p.equals(original.parameters()[i]))).toBe(true);
    expect(clone.forward(x)[0].data).toBe(original.forward(x)[0].data);
  });

  it("needs at least an input and an output size", () => {
    expect(() => new MLP([2])).toThrow(
      "MLP needs at least an input and an output size, got [2]",
    );
  });

  it("zeroes every parameter gradient", () => {
    const arena = new Arena();
    const model = new MLP([1, 1], { arena, rng: new Rng(2) });
    model.forward([Value.fromScalar(3, arena)])[0].backward();

    expect(model.parameters().map((p) => p.grad)).toEqual([3, 1]);
    model.zeroGrad();
    expect(model.parameters().map((p) => p.grad)).toEqual([0, 0]);
  });
});

describe("svmLoss", () => {
  it("is only the regularization term when every margin is met", () => {
    const arena = new Arena();
    const w = Value.fromScalar(0.5, arena);
    const b = Value.fromScalar(0, arena);
    const model = MLP.fromParameters([1, 1], [w, b]);
    const preds = [2, -4].map((v) => model.forward([Value.fromScalar(v, arena)])[0]);

    const { loss, accuracy } = svmLoss(model, preds, [1, -1]);
    loss.backward();

    expect(preds.map((p) => p.data)).toEqual([1, -2]);
    expect(loss.data).toBeCloseTo(2.5e-5, 12);
    expect(accuracy).toBe(1);
    expect(w.grad).toBeCloseTo(1e-4, 12);
    expect(b.grad).toBe(0);
  });

  it("averages the hinge over the batch", () => {
    const arena = new Arena();
    const w = Value.fromScalar(1, arena);
    const b = Value.fromScalar(0, arena);
    const model = MLP.fromParameters([1, 1], [w, b]);
    const preds = [0.5, 1].map((v) => model.forward([Value.fromScalar(v, arena)])[0]);

    const { loss, accuracy } = svmLoss(model, preds, [-1, -1], { alpha: 0 });

    // relu(1 + 0.5) + relu(1 + 1) = 3.5, halved
    expect(loss.data).toBeCloseTo(1.75, 12);
    expect(accuracy).toBe(0);
  });

  it("rejects empty and mismatched batches", () => {
    const arena = new Arena();
    const model = new MLP([1, 1], { arena, rng: new Rng(1) });
    const pred = Value.fromScalar(1, arena);

    expect(() => svmLoss(model, [], [])).toThrow("svmLoss needs at least one prediction");
    expect(() => svmLoss(model, [pred], [1, -1])).toThrow(
      "svmLoss got 1 predictions for 2 targets",
    );
  });
});
