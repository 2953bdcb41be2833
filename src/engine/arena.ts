import { type AccessLock, AtomicsLock, ExclusiveLock } from "./access-lock";
import {
  type BackwardNodeHook,
  executeBackward,
} from "./backward";
import { consoleLogger, type DebugLogger } from "./debug-log";
import {
  MissingBackwardRuleError,
  NonReentrantBackwardError,
  PoisonedArenaError,
  StaleHandleError,
} from "./engine-errors";
import {
  CONTROL_LOCK,
  type NodeInit,
  NodeStore,
  type SharedStoreDescriptor,
  type SharingMode,
} from "./node-store";
import { OpCode, opName, type OpName, RuleCode } from "./ops";
import { topologicalIndices } from "./topo";
import { TraceRecorder } from "./trace";

/** Transferable reference to a node: arena slot plus the id it must hold. */
export interface NodeRef {
  readonly index: number;
  readonly id: number;
}

export interface ArenaMark {
  readonly count: number;
}

export interface ArenaOptions {
  mode?: SharingMode;
  /** Initial capacity (exclusive) or fixed capacity (shared). */
  capacity?: number;
  /** Pass a recorder, or `true` for a fresh one. */
  trace?: TraceRecorder | boolean;
  debug?: boolean;
}

export type AttachOptions = Omit<ArenaOptions, "mode" | "capacity">;

export interface NodeSnapshot {
  id: number;
  op: OpName;
  value: number;
  grad: number;
  parents: NodeRef[];
}

const DEFAULT_CAPACITY = 4096;

/**
 * Index-addressed storage for computation-graph nodes plus the access
 * discipline guarding it.
 *
 * Every public method runs inside the arena's access window. In exclusive
 * mode an overlapping window throws `AlreadyBorrowedError`; in shared mode
 * other threads wait for the window while the owning thread re-entering
 * throws.
 */
export class Arena {
  readonly mode: SharingMode;
  readonly trace: TraceRecorder | null;
  private readonly store: NodeStore;
  private readonly lock: AccessLock;
  private readonly log: DebugLogger | null;
  private readonly backwardHooks: BackwardNodeHook[] = [];
  private backwardActive = false;

  /** Pass `descriptor` (or use `Arena.attach`) to open a view of a shared arena. */
  constructor(options: ArenaOptions = {}, descriptor?: SharedStoreDescriptor) {
    if (descriptor) {
      this.store = NodeStore.fromDescriptor(descriptor);
    } else {
      const mode = options.mode ?? "exclusive";
      const capacity = options.capacity ?? DEFAULT_CAPACITY;
      if (!Number.isInteger(capacity) || capacity <= 0) {
        throw new Error(`Arena capacity must be a positive integer, got ${capacity}`);
      }
      this.store =
        mode === "shared" ? NodeStore.shared(capacity) : NodeStore.exclusive(capacity);
    }
    this.mode = this.store.mode;
    this.lock =
      this.store.mode === "shared"
        ? new AtomicsLock(this.store.control, CONTROL_LOCK)
        : new ExclusiveLock();
    this.trace =
      options.trace instanceof TraceRecorder
        ? options.trace
        : options.trace
          ? new TraceRecorder()
          : null;
    this.log = options.debug ? consoleLogger() : null;
  }

  /** Open a view of a shared arena, typically inside a worker thread. */
  static attach(descriptor: SharedStoreDescriptor, options: AttachOptions = {}): Arena {
    return new Arena(options, descriptor);
  }

  /** Buffers backing a shared arena, for `Arena.attach` in another thread. */
  share(): SharedStoreDescriptor {
    return this.store.describe();
  }

  /** True when both arenas are views of the same node storage. */
  sameStore(other: Arena): boolean {
    return this === other || this.store.key === other.store.key;
  }

  get size(): number {
    return this.access((store) => store.count);
  }

  get capacity(): number {
    return this.access((store) => store.capacity);
  }

  get poisoned(): boolean {
    return this.store.poisoned;
  }

  /**
   * Run `fn` inside the access window. Everything that touches the node
   * columns goes through here.
   */
  access<T>(fn: (store: NodeStore) => T): T {
    this.ensureNotPoisoned();
    this.lock.acquire();
    try {
      return fn(this.store);
    } finally {
      this.lock.release();
    }
  }

  /** Throws `StaleHandleError` unless `ref` still names a live node. */
  checkLocked(store: NodeStore, ref: NodeRef): number {
    if (ref.index < 0 || ref.index >= store.count || store.columns.ids[ref.index] !== ref.id) {
      throw new StaleHandleError(
        `Node ${ref.id} is no longer live in this arena (slot ${ref.index})`,
      );
    }
    return ref.index;
  }

  resolve(ref: NodeRef): NodeRef {
    return this.access((store) => {
      this.checkLocked(store, ref);
      return { index: ref.index, id: ref.id };
    });
  }

  /** Allocate a node. Caller must hold the access window. */
  allocateLocked(store: NodeStore, init: NodeInit): NodeRef {
    const index = store.allocate(init);
    const ids = store.columns.ids;
    const ref = { index, id: ids[index] };
    this.trace?.record({
      type: "alloc",
      id: ref.id,
      op: opName(init.op),
      parents: store.parentsOf(index).map((parent) => ids[parent]),
    });
    return ref;
  }

  createLeaf(value: number): NodeRef {
    return this.access((store) =>
      this.allocateLocked(store, { value, op: OpCode.leaf, rule: RuleCode.none }),
    );
  }

  value(ref: NodeRef): number {
    return this.access((store) => store.columns.values[this.checkLocked(store, ref)]);
  }

  grad(ref: NodeRef): number {
    return this.access((store) => store.columns.grads[this.checkLocked(store, ref)]);
  }

  op(ref: NodeRef): OpName {
    return this.access((store) => opName(store.columns.ops[this.checkLocked(store, ref)]));
  }

  parents(ref: NodeRef): NodeRef[] {
    return this.access((store) => {
      const ids = store.columns.ids;
      return store
        .parentsOf(this.checkLocked(store, ref))
        .map((index) => ({ index, id: ids[index] }));
    });
  }

  snapshot(ref: NodeRef): NodeSnapshot {
    return this.access((store) => {
      const index = this.checkLocked(store, ref);
      const cols = store.columns;
      return {
        id: ref.id,
        op: opName(cols.ops[index]),
        value: cols.values[index],
        grad: cols.grads[index],
        parents: store
          .parentsOf(index)
          .map((parent) => ({ index: parent, id: cols.ids[parent] })),
      };
    });
  }

  zeroGrad(ref: NodeRef): void {
    this.access((store) => {
      store.columns.grads[this.checkLocked(store, ref)] = 0;
    });
    this.trace?.record({ type: "zero_grad", id: ref.id });
  }

  applyGradientStep(ref: NodeRef, lr: number): void {
    this.access((store) => {
      const index = this.checkLocked(store, ref);
      const cols = store.columns;
      cols.values[index] -= lr * cols.grads[index];
    });
    this.trace?.record({ type: "gradient_step", id: ref.id, lr });
  }

  topologicalOrder(ref: NodeRef): NodeRef[] {
    return this.access((store) => {
      const ids = store.columns.ids;
      return topologicalIndices(store, this.checkLocked(store, ref)).map(
        (index) => ({ index, id: ids[index] }),
      );
    });
  }

  /**
   * Reverse-mode pass from `ref`. Holds the access window for the whole
   * pass, so it is the only writer of gradients while it runs.
   */
  backward(ref: NodeRef): number {
    if (this.backwardActive) {
      throw new NonReentrantBackwardError(
        "backward() called while a backward pass is running on this arena",
      );
    }
    this.backwardActive = true;
    try {
      return this.access((store) => {
        const root = this.checkLocked(store, ref);
        try {
          return executeBackward(
            { store, trace: this.trace, log: this.log, hooks: this.backwardHooks },
            root,
          );
        } catch (error) {
          if (error instanceof MissingBackwardRuleError) {
            store.poison();
            this.trace?.record({ type: "poison", reason: error.message });
          }
          throw error;
        }
      });
    } finally {
      this.backwardActive = false;
    }
  }

  /** Called before each node's rule runs; returns an unsubscribe function. */
  onBackwardNode(hook: BackwardNodeHook): () => void {
    this.backwardHooks.push(hook);
    return () => {
      const at = this.backwardHooks.indexOf(hook);
      if (at >= 0) this.backwardHooks.splice(at, 1);
    };
  }

  mark(): ArenaMark {
    return this.access((store) => ({ count: store.count }));
  }

  /** Release every node created after `mark`; their handles become stale. */
  rewind(mark: ArenaMark): number {
    const released = this.access((store) => {
      const released = store.count - mark.count;
      store.truncate(mark.count);
      return released;
    });
    this.trace?.record({ type: "rewind", mark: mark.count, released });
    return released;
  }

  /** Run `fn`, then release every node it created. */
  tidy<T>(fn: () => T): T {
    const mark = this.mark();
    try {
      return fn();
    } finally {
      this.rewind(mark);
    }
  }

  /** Drop a node's pending rule without marking it spent. */
  _debug_clearRule(ref: NodeRef): void {
    this.access((store) => {
      store.columns.rules[this.checkLocked(store, ref)] = RuleCode.none;
    });
  }

  private ensureNotPoisoned(): void {
    if (this.store.poisoned) {
      throw new PoisonedArenaError("Arena is poisoned");
    }
  }
}
