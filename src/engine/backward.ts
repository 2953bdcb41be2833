import { applyRule, decodeRule } from "./backward-rules";
import type { DebugLogger } from "./debug-log";
import { MissingBackwardRuleError } from "./engine-errors";
import type { NodeStore } from "./node-store";
import { opName, type OpName, RuleCode } from "./ops";
import { topologicalIndices } from "./topo";
import type { TraceRecorder } from "./trace";

export interface BackwardNodeInfo {
  id: number;
  op: OpName;
  value: number;
  grad: number;
}

export type BackwardNodeHook = (info: BackwardNodeInfo) => void;

export interface BackwardContext {
  store: NodeStore;
  trace: TraceRecorder | null;
  log: DebugLogger | null;
  hooks: readonly BackwardNodeHook[];
}

function describe(store: NodeStore, index: number): string {
  const cols = store.columns;
  return `id: ${cols.ids[index]}, data: ${cols.values[index]}, grad: ${cols.grads[index]}, op: ${opName(cols.ops[index])}`;
}

/**
 * Seed `root` with 1 and run every pending backward rule once, consumers
 * before producers. Returns the number of nodes visited.
 *
 * Caller must hold the arena's access window.
 */
export function executeBackward(ctx: BackwardContext, root: number): number {
  const { store, trace, log, hooks } = ctx;
  const cols = store.columns;
  const order = topologicalIndices(store, root);

  trace?.record({
    type: "backward_begin",
    root: cols.ids[root],
    nodes: order.length,
  });
  if (log) {
    log("topological order");
    for (const index of order) log(describe(store, index));
  }

  cols.grads[root] = 1;

  for (let i = order.length - 1; i >= 0; i -= 1) {
    const index = order[i];
    const rule = decodeRule(cols, index);

    if (!rule && cols.spent[index] === 0 && store.parentsOf(index).length > 0) {
      throw new MissingBackwardRuleError(
        `Node ${cols.ids[index]} (${opName(cols.ops[index])}) has parents but no backward rule`,
      );
    }

    for (const hook of hooks) {
      hook({
        id: cols.ids[index],
        op: opName(cols.ops[index]),
        value: cols.values[index],
        grad: cols.grads[index],
      });
    }
    trace?.record({
      type: "backward_node",
      id: cols.ids[index],
      op: opName(cols.ops[index]),
      rule: rule?.kind ?? null,
    });
    log?.(`backward ${describe(store, index)}`);

    if (!rule) continue;
    // Take the rule before running it: one shot per node.
    cols.rules[index] = RuleCode.none;
    cols.spent[index] = 1;
    applyRule(cols, index, rule);
  }

  trace?.record({ type: "backward_end", root: cols.ids[root] });
  return order.length;
}
