import { Rng } from "../core/rng";
import { Value } from "../frontend-value";
import { Module, type ModuleOptions, ParameterSource } from "./module";

export interface NeuronOptions extends ModuleOptions {
  /** Apply ReLU to the output. Default true. */
  nonlinear?: boolean;
}

/**
 * `relu(b + Σ wᵢ·xᵢ)` (or the bare affine sum when linear). Weights start
 * uniform in [-1, 1], the bias at 0.
 */
export class Neuron extends Module<Value[], Value> {
  readonly inDim: number;
  readonly nonlinear: boolean;
  readonly weights: Value[];
  readonly bias: Value;

  constructor(inDim: number, options: NeuronOptions = {}) {
    super(options.arena ?? options.parameters?.[0]?.arena);
    if (!Number.isInteger(inDim) || inDim <= 0) {
      throw new Error(`Neuron input dimension must be a positive integer, got ${inDim}`);
    }
    this.inDim = inDim;
    this.nonlinear = options.nonlinear ?? true;

    const source = new ParameterSource(options.parameters);
    if (source.active) {
      this.weights = source.take(inDim);
      this.bias = source.take(1)[0];
      source.finish();
    } else {
      const rng = options.rng ?? new Rng();
      this.weights = Array.from({ length: inDim }, () =>
        Value.fromScalar(rng.uniform(-1, 1), this.arena),
      );
      this.bias = Value.fromScalar(0, this.arena);
    }
    for (const weight of this.weights) this.registerParameter(weight);
    this.registerParameter(this.bias);
  }

  forward(x: Value[]): Value {
    if (x.length !== this.inDim) {
      throw new Error(`Neuron expects ${this.inDim} inputs, got ${x.length}`);
    }
    let act = this.bias;
    for (let i = 0; i < this.inDim; i += 1) {
      act = act.add(this.weights[i].mul(x[i]));
    }
    return this.nonlinear ? act.relu() : act;
  }

  toString(): string {
    return `Neuron: (${this.inDim}, ${this.nonlinear ? "ReLU" : "Linear"})`;
  }
}
