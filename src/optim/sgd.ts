import type { Arena } from "../engine/arena";
import type { Value } from "../frontend-value";
import { validateLearningRate, validateOptimizerParams } from "./validate";

export type SGDOptions = {
  lr: number;
};

export class SGD {
  private readonly params: Value[];
  private lr: number;
  readonly arena: Arena;

  constructor(params: Value[], options: SGDOptions) {
    this.arena = validateOptimizerParams("SGD", params);
    this.lr = validateLearningRate("SGD", options.lr);
    this.params = params.slice();
  }

  get learningRate(): number {
    return this.lr;
  }

  setLearningRate(lr: number): void {
    this.lr = validateLearningRate("SGD", lr);
  }

  getParams(): Value[] {
    return this.params.slice();
  }

  /** `p.data -= lr * p.grad` for every parameter, in place. */
  step(): void {
    for (const param of this.params) {
      param.applyGradientStep(this.lr);
    }
  }

  zeroGrad(): void {
    for (const param of this.params) {
      param.zeroGrad();
    }
  }
}

export type LinearDecayOptions = {
  start?: number;
  end?: number;
};

/**
 * Learning rate decaying linearly from `start` (epoch 0) towards `end`
 * (epoch `epochs`): `1 - 0.9 * epoch / epochs` with the defaults.
 */
export function linearDecay(
  epoch: number,
  epochs: number,
  options: LinearDecayOptions = {},
): number {
  if (epochs <= 0) {
    throw new Error(`linearDecay needs a positive epoch count, got ${epochs}`);
  }
  const start = options.start ?? 1;
  const end = options.end ?? 0.1;
  return start - ((start - end) * epoch) / epochs;
}
