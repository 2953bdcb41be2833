/**
 * Operation tags and backward-rule codes as stored in the arena columns.
 *
 * The op tag is informational (diagnostics, traces); control flow in the
 * backward executor only ever looks at the rule code.
 */

export const OP_NAMES = [
  "leaf",
  "add",
  "sub",
  "mul",
  "neg",
  "div",
  "pow",
  "relu",
] as const;

export type OpName = (typeof OP_NAMES)[number];

export const OpCode = {
  leaf: 0,
  add: 1,
  sub: 2,
  mul: 3,
  neg: 4,
  div: 5,
  pow: 6,
  relu: 7,
} as const satisfies Record<OpName, number>;

export type OpCode = (typeof OpCode)[OpName];

export function opName(code: number): OpName {
  const name = OP_NAMES[code];
  if (name === undefined) {
    throw new Error(`Unknown op code ${code}`);
  }
  return name;
}

export const RULE_KINDS = ["add", "mul", "pow", "relu"] as const;

export type RuleKind = (typeof RULE_KINDS)[number];

/** Rule code 0 means "no rule installed". */
export const RuleCode = {
  none: 0,
  add: 1,
  mul: 2,
  pow: 3,
  relu: 4,
} as const;

export type RuleCode = (typeof RuleCode)[keyof typeof RuleCode];

/** Operand slot value for "no operand". */
export const NO_OPERAND = -1;
