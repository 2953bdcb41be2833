import { Worker } from "node:worker_threads";
import { describe, expect, it } from "vitest";
import {
  AlreadyBorrowedError,
  Arena,
  ArenaExhaustedError,
  ArenaMismatchError,
  SharedModeRequiredError,
  StaleHandleError,
  Value,
} from "../src";

// Plain script: takes the arena lock word, writes node 0's value while
// holding it, then releases.
const LOCK_HOLDER = `
const { parentPort, threadId, workerData } = require("node:worker_threads");
const words = new Int32Array(workerData.control, 0, 4);
const values = new Float64Array(workerData.columns.values);
const tag = threadId + 1;
while (Atomics.compareExchange(words, 0, 0, tag) !== 0) {}
parentPort.postMessage(tag);
Atomics.wait(new Int32Array(new SharedArrayBuffer(4)), 0, 0, 100);
values[0] = 42;
Atomics.store(words, 0, 0);
Atomics.notify(words, 0);
`;

describe("exclusive access", () => {
  it("throws on an overlapping access window and releases it", () => {
    const arena = new Arena();
    arena.createLeaf(1);

    expect(() => arena.access(() => arena.size)).toThrow(AlreadyBorrowedError);
    expect(arena.size).toBe(1);
  });

  it("releases the window when the callback throws", () => {
    const arena = new Arena();
    expect(() =>
      arena.access(() => {
        throw new Error("boom");
      }),
    ).toThrow("boom");
    expect(() => arena.createLeaf(1)).not.toThrow();
  });

  it("grows past its initial capacity", () => {
    const arena = new Arena({ capacity: 2 });
    const leaves = [1, 2, 3].map((v) => Value.fromScalar(v, arena));

    expect(arena.size).toBe(3);
    expect(arena.capacity).toBe(16);
    expect(leaves.map((leaf) => leaf.data)).toEqual([1, 2, 3]);
    expect(leaves[0].add(leaves[2]).data).toBe(4);
  });

  it("cannot be shared", () => {
    expect(() => new Arena().share()).toThrow(SharedModeRequiredError);
  });

  it("rejects a non-positive capacity", () => {
    expect(() => new Arena({ capacity: 0 })).toThrow(
      "Arena capacity must be a positive integer, got 0",
    );
  });
});

describe("shared access", () => {
  it("fails when the fixed capacity is used up", () => {
    const arena = new Arena({ mode: "shared", capacity: 2 });
    arena.createLeaf(1);
    arena.createLeaf(2);

    expect(() => arena.createLeaf(3)).toThrow(ArenaExhaustedError);
    expect(arena.size).toBe(2);
    expect(arena.poisoned).toBe(false);
  });

  it("lets attached views see the same nodes", () => {
    const arena = new Arena({ mode: "shared", capacity: 64 });
    const view = Arena.attach(arena.share());
    const x = Value.fromScalar(3, arena);

    const remote = Value.fromRef(view, x.ref);
    const y = remote.mul(remote);
    y.backward();

    expect(view.mode).toBe("shared");
    expect(arena.size).toBe(2);
    expect(x.grad).toBe(6);
    expect(Value.fromRef(arena, y.ref).data).toBe(9);
  });

  it("treats handles through different views of one store as the same node", () => {
    const arena = new Arena({ mode: "shared", capacity: 64 });
    const view = Arena.attach(arena.share());
    const x = Value.fromScalar(3, arena);
    const remote = Value.fromRef(view, x.ref);

    expect(view.sameStore(arena)).toBe(true);
    expect(x.equals(remote)).toBe(true);
    expect(remote.equals(x)).toBe(true);

    const sum = x.add(remote);
    sum.backward();
    expect(sum.data).toBe(6);
    expect(x.grad).toBe(2);
  });

  it("still rejects operands from a different shared store", () => {
    const first = new Arena({ mode: "shared", capacity: 8 });
    const second = new Arena({ mode: "shared", capacity: 8 });
    const a = Value.fromScalar(1, first);
    const b = Value.fromScalar(2, second);

    expect(first.sameStore(second)).toBe(false);
    expect(() => a.add(b)).toThrow(ArenaMismatchError);
  });

  it("throws when the same thread overlaps windows through two views", () => {
    const arena = new Arena({ mode: "shared", capacity: 8 });
    const view = Arena.attach(arena.share());

    expect(() => arena.access(() => view.size)).toThrow(AlreadyBorrowedError);
    expect(view.size).toBe(0);
  });

  it("waits for another thread to release the window", async () => {
    const arena = new Arena({ mode: "shared", capacity: 8 });
    const x = Value.fromScalar(1, arena);
    const worker = new Worker(LOCK_HOLDER, { eval: true, workerData: arena.share() });
    try {
      const tag = await new Promise<number>((resolve, reject) => {
        worker.once("message", resolve);
        worker.once("error", reject);
      });
      expect(tag).toBe(worker.threadId + 1);

      // Blocks until the worker has written and released.
      expect(x.data).toBe(42);
    } finally {
      await worker.terminate();
    }
  });
});

describe("node ids", () => {
  it("are distinct across separate arenas", () => {
    const a = Value.fromScalar(1, new Arena());
    const b = Value.fromScalar(1, new Arena());
    const c = Value.fromScalar(1, new Arena({ mode: "shared", capacity: 4 }));

    expect(new Set([a.id, b.id, c.id]).size).toBe(3);
    expect(a.equals(b)).toBe(false);
    expect(b.id).toBe(a.id + 1);
    expect(c.id).toBe(b.id + 1);
  });
});

describe("releasing nodes", () => {
  it("invalidates handles created after a mark", () => {
    const arena = new Arena();
    const kept = Value.fromScalar(1, arena);
    const mark = arena.mark();
    const dropped = kept.add(2);

    expect(arena.rewind(mark)).toBe(2);
    expect(arena.size).toBe(1);
    expect(() => dropped.data).toThrow(StaleHandleError);
    expect(kept.data).toBe(1);
  });

  it("never hands a released id out again", () => {
    const arena = new Arena();
    const mark = arena.mark();
    const first = Value.fromScalar(1, arena);
    arena.rewind(mark);
    const second = Value.fromScalar(2, arena);

    expect(second.ref.index).toBe(first.ref.index);
    expect(second.id).toBe(first.id + 1);
    expect(() => first.data).toThrow(StaleHandleError);
    expect(first.equals(second)).toBe(false);
  });

  it("releases everything a tidy scope created", () => {
    const arena = new Arena({ trace: true });
    const x = Value.fromScalar(3, arena);
    let inner: Value | undefined;

    const result = arena.tidy(() => {
      inner = x.mul(x).add(1);
      return inner.data;
    });

    expect(result).toBe(10);
    expect(arena.size).toBe(1);
    expect(() => inner?.data).toThrow(StaleHandleError);
    expect(arena.trace?.snapshot().at(-1)).toEqual({
      type: "rewind",
      mark: 1,
      released: 3,
    });
  });

  it("rejects a mark from the future", () => {
    const arena = new Arena();
    expect(() => arena.rewind({ count: 5 })).toThrow("Cannot truncate 0 nodes to 5");
  });
});
