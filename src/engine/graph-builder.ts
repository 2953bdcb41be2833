import type { Arena, NodeRef } from "./arena";
import type { NodeStore } from "./node-store";
import { OpCode, RuleCode } from "./ops";

// Helpers suffixed `Locked` expect the caller to hold the arena's access
// window and take already-checked slot indices.

function addLocked(
  arena: Arena,
  store: NodeStore,
  lhs: number,
  rhs: number,
  op: OpCode = OpCode.add,
): NodeRef {
  const values = store.columns.values;
  return arena.allocateLocked(store, {
    value: values[lhs] + values[rhs],
    op,
    rule: RuleCode.add,
    lhs,
    rhs,
  });
}

function mulLocked(
  arena: Arena,
  store: NodeStore,
  lhs: number,
  rhs: number,
  op: OpCode = OpCode.mul,
): NodeRef {
  const values = store.columns.values;
  const lhsValue = values[lhs];
  const rhsValue = values[rhs];
  return arena.allocateLocked(store, {
    value: lhsValue * rhsValue,
    op,
    rule: RuleCode.mul,
    lhs,
    rhs,
    saved0: lhsValue,
    saved1: rhsValue,
  });
}

function powLocked(
  arena: Arena,
  store: NodeStore,
  base: number,
  exponent: number,
): NodeRef {
  const baseValue = store.columns.values[base];
  return arena.allocateLocked(store, {
    value: baseValue ** exponent,
    op: OpCode.pow,
    rule: RuleCode.pow,
    lhs: base,
    saved0: exponent,
    saved1: baseValue,
  });
}

function negLocked(arena: Arena, store: NodeStore, input: number): NodeRef {
  const minusOne = arena.allocateLocked(store, {
    value: -1,
    op: OpCode.leaf,
    rule: RuleCode.none,
  });
  return mulLocked(arena, store, input, minusOne.index, OpCode.neg);
}

export function addNodes(arena: Arena, a: NodeRef, b: NodeRef): NodeRef {
  return arena.access((store) =>
    addLocked(arena, store, arena.checkLocked(store, a), arena.checkLocked(store, b)),
  );
}

export function mulNodes(arena: Arena, a: NodeRef, b: NodeRef): NodeRef {
  return arena.access((store) =>
    mulLocked(arena, store, arena.checkLocked(store, a), arena.checkLocked(store, b)),
  );
}

export function powNode(arena: Arena, base: NodeRef, exponent: number): NodeRef {
  return arena.access((store) =>
    powLocked(arena, store, arena.checkLocked(store, base), exponent),
  );
}

export function reluNode(arena: Arena, input: NodeRef): NodeRef {
  return arena.access((store) => {
    const index = arena.checkLocked(store, input);
    const value = store.columns.values[index];
    return arena.allocateLocked(store, {
      value: value < 0 ? 0 : value,
      op: OpCode.relu,
      rule: RuleCode.relu,
      lhs: index,
    });
  });
}

/** `a * -1`: a fresh -1 leaf and a multiply node tagged `neg`. */
export function negNode(arena: Arena, a: NodeRef): NodeRef {
  return arena.access((store) => negLocked(arena, store, arena.checkLocked(store, a)));
}

/** `a + (-b)`: allocates the -1 leaf, the neg node and an add node tagged `sub`. */
export function subNodes(arena: Arena, a: NodeRef, b: NodeRef): NodeRef {
  return arena.access((store) => {
    const lhs = arena.checkLocked(store, a);
    const negated = negLocked(arena, store, arena.checkLocked(store, b));
    return addLocked(arena, store, lhs, negated.index, OpCode.sub);
  });
}

/** `a * b^-1`: a pow node and a multiply node tagged `div`. */
export function divNodes(arena: Arena, a: NodeRef, b: NodeRef): NodeRef {
  return arena.access((store) => {
    const lhs = arena.checkLocked(store, a);
    const reciprocal = powLocked(arena, store, arena.checkLocked(store, b), -1);
    return mulLocked(arena, store, lhs, reciprocal.index, OpCode.div);
  });
}
