import type { NodeColumns } from "./node-store";
import { RuleCode } from "./ops";

/**
 * Backward rule of a node, decoded from the arena columns. Operand fields
 * are arena indices; `*Value` fields are forward values captured when the
 * node was built.
 */
export type BackwardRule =
  | { kind: "add"; lhs: number; rhs: number }
  | { kind: "mul"; lhs: number; rhs: number; lhsValue: number; rhsValue: number }
  | { kind: "pow"; base: number; exponent: number; baseValue: number }
  | { kind: "relu"; input: number };

export function decodeRule(cols: NodeColumns, index: number): BackwardRule | null {
  const lhs = cols.operands[2 * index];
  const rhs = cols.operands[2 * index + 1];
  switch (cols.rules[index]) {
    case RuleCode.none:
      return null;
    case RuleCode.add:
      return { kind: "add", lhs, rhs };
    case RuleCode.mul:
      return {
        kind: "mul",
        lhs,
        rhs,
        lhsValue: cols.saved[2 * index],
        rhsValue: cols.saved[2 * index + 1],
      };
    case RuleCode.pow:
      return {
        kind: "pow",
        base: lhs,
        exponent: cols.saved[2 * index],
        baseValue: cols.saved[2 * index + 1],
      };
    case RuleCode.relu:
      return { kind: "relu", input: lhs };
    default:
      throw new Error(`Unknown backward rule code ${cols.rules[index]}`);
  }
}

/**
 * Push the gradient of node `index` into its operands. Contributions are
 * added, so an operand used twice (x * x) receives both.
 */
export function applyRule(
  cols: NodeColumns,
  index: number,
  rule: BackwardRule,
): void {
  const grads = cols.grads;
  const out = grads[index];
  switch (rule.kind) {
    case "add":
      grads[rule.lhs] += out;
      grads[rule.rhs] += out;
      return;
    case "mul":
      grads[rule.lhs] += rule.rhsValue * out;
      grads[rule.rhs] += rule.lhsValue * out;
      return;
    case "pow":
      grads[rule.base] +=
        rule.exponent * rule.baseValue ** (rule.exponent - 1) * out;
      return;
    case "relu":
      grads[rule.input] += cols.values[index] > 0 ? out : 0;
      return;
  }
}
