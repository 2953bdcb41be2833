import { Rng } from "../core/rng";
import type { Value } from "../frontend-value";
import { Module, type ModuleOptions, ParameterSource } from "./module";
import { Neuron } from "./neuron";

export interface LayerOptions extends ModuleOptions {
  nonlinear?: boolean;
}

export class Layer extends Module<Value[], Value[]> {
  readonly inDim: number;
  readonly outDim: number;
  readonly neurons: Neuron[];

  constructor(inDim: number, outDim: number, options: LayerOptions = {}) {
    super(options.arena ?? options.parameters?.[0]?.arena);
    if (!Number.isInteger(outDim) || outDim <= 0) {
      throw new Error(`Layer output dimension must be a positive integer, got ${outDim}`);
    }
    this.inDim = inDim;
    this.outDim = outDim;

    const source = new ParameterSource(options.parameters);
    const rng = options.rng ?? new Rng();
    this.neurons = Array.from({ length: outDim }, (_, i) =>
      this.registerModule(
        `neuron${i}`,
        new Neuron(inDim, {
          arena: this.arena,
          rng,
          nonlinear: options.nonlinear,
          parameters: source.active ? source.take(inDim + 1) : undefined,
        }),
      ),
    );
    source.finish();
  }

  forward(x: Value[]): Value[] {
    return this.neurons.map((neuron) => neuron.forward(x));
  }

  toString(): string {
    return ["Layer:", ...this.neurons.map((neuron) => neuron.toString())].join("\n");
  }
}
