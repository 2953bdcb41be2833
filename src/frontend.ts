import type { Arena } from "./engine/arena";
import { Value } from "./frontend-value";

export { configureEngine, defaultArena, getEngineConfig } from "./default-arena";
export { type Operand, Value } from "./frontend-value";

/** Fresh leaf holding `value`, in `arena` or the default arena. */
export function scalar(value: number, arena?: Arena): Value {
  return Value.fromScalar(value, arena);
}

/** Every node reachable from `value`, each after all of its parents. */
export function topologicalOrder(value: Value): Value[] {
  return value.topologicalOrder();
}
