import type { Arena, NodeRef } from "./engine/arena";
import { ArenaMismatchError } from "./engine/engine-errors";
import {
  addNodes,
  divNodes,
  mulNodes,
  negNode,
  powNode,
  reluNode,
  subNodes,
} from "./engine/graph-builder";
import type { OpName } from "./engine/ops";
import { defaultArena } from "./default-arena";

/** A plain number operand becomes a fresh leaf in the left operand's arena. */
export type Operand = Value | number;

/**
 * Handle to one node of a computation graph. Arithmetic on handles builds
 * the graph; `backward()` fills in gradients.
 *
 * Handles are cheap: `clone()` and `parents` hand out new handles to
 * existing nodes. Two handles are equal when they name the same node, even
 * through different views of one shared arena.
 */
export class Value {
  readonly arena: Arena;
  readonly ref: NodeRef;

  constructor(arena: Arena, ref: NodeRef) {
    this.arena = arena;
    this.ref = ref;
  }

  static fromScalar(value: number, arena: Arena = defaultArena()): Value {
    return new Value(arena, arena.createLeaf(value));
  }

  /** Rebuild a handle from a ref received from another thread. */
  static fromRef(arena: Arena, ref: NodeRef): Value {
    return new Value(arena, arena.resolve(ref));
  }

  get id(): number {
    return this.ref.id;
  }

  get data(): number {
    return this.arena.value(this.ref);
  }

  get grad(): number {
    return this.arena.grad(this.ref);
  }

  get op(): OpName {
    return this.arena.op(this.ref);
  }

  get parents(): Value[] {
    return this.arena.parents(this.ref).map((ref) => new Value(this.arena, ref));
  }

  clone(): Value {
    return new Value(this.arena, this.ref);
  }

  /** Node ids are unique across arenas and threads, so the id decides. */
  equals(other: Value): boolean {
    return this.ref.id === other.ref.id;
  }

  add(other: Operand): Value {
    return this.wrap(addNodes(this.arena, this.ref, this.lift(other)));
  }

  sub(other: Operand): Value {
    return this.wrap(subNodes(this.arena, this.ref, this.lift(other)));
  }

  mul(other: Operand): Value {
    return this.wrap(mulNodes(this.arena, this.ref, this.lift(other)));
  }

  div(other: Operand): Value {
    return this.wrap(divNodes(this.arena, this.ref, this.lift(other)));
  }

  neg(): Value {
    return this.wrap(negNode(this.arena, this.ref));
  }

  pow(exponent: number): Value {
    return this.wrap(powNode(this.arena, this.ref, exponent));
  }

  relu(): Value {
    return this.wrap(reluNode(this.arena, this.ref));
  }

  backward(): void {
    this.arena.backward(this.ref);
  }

  zeroGrad(): void {
    this.arena.zeroGrad(this.ref);
  }

  /** `data -= lr * grad`, in place. */
  applyGradientStep(lr: number): void {
    this.arena.applyGradientStep(this.ref, lr);
  }

  topologicalOrder(): Value[] {
    return this.arena.topologicalOrder(this.ref).map((ref) => new Value(this.arena, ref));
  }

  toString(): string {
    const { id, value, grad, op } = this.arena.snapshot(this.ref);
    return `id: ${id}, data: ${value}, grad: ${grad}, op: ${op}`;
  }

  private lift(other: Operand): NodeRef {
    if (typeof other === "number") {
      return this.arena.createLeaf(other);
    }
    if (!this.arena.sameStore(other.arena)) {
      throw new ArenaMismatchError(
        `Cannot combine node ${this.ref.id} and node ${other.ref.id} from different arenas`,
      );
    }
    return other.ref;
  }

  private wrap(ref: NodeRef): Value {
    return new Value(this.arena, ref);
  }
}
