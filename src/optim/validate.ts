import type { Arena } from "../engine/arena";
import type { Value } from "../frontend-value";

/**
 * Validate common optimizer constructor parameters.
 * Returns the arena every parameter lives in.
 */
export function validateOptimizerParams(name: string, params: Value[]): Arena {
  if (params.length === 0) {
    throw new Error(`${name} requires at least one parameter`);
  }
  const arena = params[0].arena;
  for (const param of params) {
    if (!param.arena.sameStore(arena)) {
      throw new Error(`${name} parameters must share the same arena`);
    }
    if (param.op !== "leaf") {
      throw new Error(`${name} parameters must be leaf values, got ${param.op}`);
    }
  }
  return arena;
}

export function validateLearningRate(name: string, lr: number): number {
  if (!Number.isFinite(lr) || lr <= 0) {
    throw new Error(`${name} learning rate must be > 0, got ${lr}`);
  }
  return lr;
}
