import { Rng } from "../core/rng";
import type { Value } from "../frontend-value";
import { Layer } from "./layer";
import { Module, type ModuleOptions, ParameterSource } from "./module";

/**
 * Stack of fully connected layers; `dims = [in, hidden..., out]`. Every
 * layer but the last applies ReLU.
 */
export class MLP extends Module<Value[], Value[]> {
  readonly dims: number[];
  readonly layers: Layer[];

  constructor(dims: number[], options: ModuleOptions = {}) {
    super(options.arena ?? options.parameters?.[0]?.arena);
    if (dims.length < 2) {
      throw new Error(`MLP needs at least an input and an output size, got [${dims.join(", ")}]`);
    }
    this.dims = dims.slice();

    const source = new ParameterSource(options.parameters);
    const rng = options.rng ?? new Rng();
    const last = dims.length - 2;
    this.layers = [];
    for (let i = 0; i <= last; i += 1) {
      const inDim = dims[i];
      const outDim = dims[i + 1];
      this.layers.push(
        this.registerModule(
          `layer${i}`,
          new Layer(inDim, outDim, {
            arena: this.arena,
            rng,
            nonlinear: i !== last,
            parameters: source.active ? source.take(outDim * (inDim + 1)) : undefined,
          }),
        ),
      );
    }
    source.finish();
  }

  /** Rebuild a model over parameter handles that already exist (e.g. in a worker). */
  static fromParameters(dims: number[], parameters: Value[]): MLP {
    return new MLP(dims, { parameters });
  }

  forward(x: Value[]): Value[] {
    let out = x;
    for (const layer of this.layers) {
      out = layer.forward(out);
    }
    return out;
  }

  toString(): string {
    return ["MLP:", ...this.layers.map((layer) => layer.toString())].join("\n");
  }
}
