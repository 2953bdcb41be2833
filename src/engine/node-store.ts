import { threadId } from "node:worker_threads";

import { ArenaExhaustedError, SharedModeRequiredError } from "./engine-errors";
import { NO_OPERAND, type OpCode, type RuleCode } from "./ops";

export type SharingMode = "exclusive" | "shared";

/**
 * Column-oriented node storage. Slot `i` of every column belongs to node `i`;
 * `saved` and `operands` hold two entries per node.
 */
export interface NodeColumns {
  ids: Float64Array;
  values: Float64Array;
  grads: Float64Array;
  saved: Float64Array;
  operands: Int32Array;
  ops: Uint8Array;
  rules: Uint8Array;
  spent: Uint8Array;
}

type ColumnName = keyof NodeColumns;

type ColumnBuffers<B extends ArrayBufferLike> = Record<ColumnName, B>;

export interface SharedStoreDescriptor {
  capacity: number;
  control: SharedArrayBuffer;
  columns: ColumnBuffers<SharedArrayBuffer>;
}

export interface NodeInit {
  value: number;
  op: OpCode;
  rule: RuleCode;
  lhs?: number;
  rhs?: number;
  saved0?: number;
  saved1?: number;
}

// Int32 control words, followed by the float64 store key at CONTROL_KEY_OFFSET.
export const CONTROL_LOCK = 0;
const CONTROL_COUNT = 1;
const CONTROL_POISONED = 2;
const CONTROL_INT_WORDS = 4;
const CONTROL_KEY_OFFSET = CONTROL_INT_WORDS * 4;
const CONTROL_BYTES = CONTROL_KEY_OFFSET + 8;

// Node ids and store keys are `threadId * THREAD_SPAN + n`, with `n` counted
// per thread, so they are unique across every store of the process and
// never handed out twice.
const THREAD_SPAN = 2 ** 32;
let lastNodeId = 0;
let lastStoreKey = 0;

function threadScoped(n: number, what: string): number {
  if (n >= THREAD_SPAN) {
    throw new Error(`Thread ${threadId} ran out of ${what}`);
  }
  return threadId * THREAD_SPAN + n;
}

function nextNodeId(): number {
  lastNodeId += 1;
  return threadScoped(lastNodeId, "node ids");
}

function nextStoreKey(): number {
  lastStoreKey += 1;
  return threadScoped(lastStoreKey, "store keys");
}

function columnBytes(capacity: number): Record<ColumnName, number> {
  return {
    ids: capacity * 8,
    values: capacity * 8,
    grads: capacity * 8,
    saved: capacity * 16,
    operands: capacity * 8,
    ops: capacity,
    rules: capacity,
    spent: capacity,
  };
}

function createBuffers<B extends ArrayBufferLike>(
  capacity: number,
  alloc: (bytes: number) => B,
): ColumnBuffers<B> {
  const bytes = columnBytes(capacity);
  return {
    ids: alloc(bytes.ids),
    values: alloc(bytes.values),
    grads: alloc(bytes.grads),
    saved: alloc(bytes.saved),
    operands: alloc(bytes.operands),
    ops: alloc(bytes.ops),
    rules: alloc(bytes.rules),
    spent: alloc(bytes.spent),
  };
}

function viewColumns(buffers: ColumnBuffers<ArrayBufferLike>): NodeColumns {
  return {
    ids: new Float64Array(buffers.ids),
    values: new Float64Array(buffers.values),
    grads: new Float64Array(buffers.grads),
    saved: new Float64Array(buffers.saved),
    operands: new Int32Array(buffers.operands),
    ops: new Uint8Array(buffers.ops),
    rules: new Uint8Array(buffers.rules),
    spent: new Uint8Array(buffers.spent),
  };
}

export class NodeStore {
  readonly mode: SharingMode;
  /** Int32 control words; `CONTROL_LOCK` is the arena lock word. */
  readonly control: Int32Array;
  /** Identifies the backing storage; equal for every view of one shared store. */
  readonly key: number;
  private readonly shared: SharedStoreDescriptor | null;
  private cols: NodeColumns;
  private cap: number;

  private constructor(
    mode: SharingMode,
    capacity: number,
    controlBuffer: ArrayBufferLike,
    columns: NodeColumns,
    shared: SharedStoreDescriptor | null,
  ) {
    this.mode = mode;
    this.cap = capacity;
    this.control = new Int32Array(controlBuffer, 0, CONTROL_INT_WORDS);
    const keyWord = new Float64Array(controlBuffer, CONTROL_KEY_OFFSET, 1);
    if (keyWord[0] === 0) keyWord[0] = nextStoreKey();
    this.key = keyWord[0];
    this.cols = columns;
    this.shared = shared;
  }

  static exclusive(capacity: number): NodeStore {
    const control = new ArrayBuffer(CONTROL_BYTES);
    const buffers = createBuffers(capacity, (bytes) => new ArrayBuffer(bytes));
    return new NodeStore("exclusive", capacity, control, viewColumns(buffers), null);
  }

  static shared(capacity: number): NodeStore {
    const control = new SharedArrayBuffer(CONTROL_BYTES);
    const columns = createBuffers(
      capacity,
      (bytes) => new SharedArrayBuffer(bytes),
    );
    return NodeStore.fromDescriptor({ capacity, control, columns });
  }

  static fromDescriptor(descriptor: SharedStoreDescriptor): NodeStore {
    return new NodeStore(
      "shared",
      descriptor.capacity,
      descriptor.control,
      viewColumns(descriptor.columns),
      descriptor,
    );
  }

  describe(): SharedStoreDescriptor {
    if (!this.shared) {
      throw new SharedModeRequiredError(
        "Only arenas created in shared mode can be shared across threads",
      );
    }
    return this.shared;
  }

  get columns(): NodeColumns {
    return this.cols;
  }

  get capacity(): number {
    return this.cap;
  }

  get count(): number {
    return this.control[CONTROL_COUNT];
  }

  get poisoned(): boolean {
    return this.control[CONTROL_POISONED] !== 0;
  }

  poison(): void {
    this.control[CONTROL_POISONED] = 1;
  }

  /** Drop every node at or after `count`. Their ids are never handed out again. */
  truncate(count: number): void {
    if (count < 0 || count > this.count) {
      throw new Error(`Cannot truncate ${this.count} nodes to ${count}`);
    }
    this.control[CONTROL_COUNT] = count;
  }

  /** Caller must hold the arena lock. */
  allocate(init: NodeInit): number {
    const index = this.count;
    if (index >= this.cap) {
      this.grow(index + 1);
    }
    const cols = this.cols;
    cols.ids[index] = nextNodeId();
    cols.values[index] = init.value;
    cols.grads[index] = 0;
    cols.ops[index] = init.op;
    cols.rules[index] = init.rule;
    cols.spent[index] = 0;
    cols.operands[2 * index] = init.lhs ?? NO_OPERAND;
    cols.operands[2 * index + 1] = init.rhs ?? NO_OPERAND;
    cols.saved[2 * index] = init.saved0 ?? 0;
    cols.saved[2 * index + 1] = init.saved1 ?? 0;
    this.control[CONTROL_COUNT] = index + 1;
    return index;
  }

  /** Parent set of a node: its operands, deduplicated by identity. */
  parentsOf(index: number): number[] {
    const lhs = this.cols.operands[2 * index];
    const rhs = this.cols.operands[2 * index + 1];
    if (lhs === NO_OPERAND) return [];
    if (rhs === NO_OPERAND || rhs === lhs) return [lhs];
    return [lhs, rhs];
  }

  private grow(required: number): void {
    if (this.shared) {
      throw new ArenaExhaustedError(
        `Shared arena is full (capacity ${this.cap})`,
      );
    }
    let next = Math.max(this.cap * 2, 16);
    while (next < required) next *= 2;
    const grown = viewColumns(
      createBuffers(next, (bytes) => new ArrayBuffer(bytes)),
    );
    const old = this.cols;
    grown.ids.set(old.ids);
    grown.values.set(old.values);
    grown.grads.set(old.grads);
    grown.saved.set(old.saved);
    grown.operands.set(old.operands);
    grown.ops.set(old.ops);
    grown.rules.set(old.rules);
    grown.spent.set(old.spent);
    this.cols = grown;
    this.cap = next;
  }
}
