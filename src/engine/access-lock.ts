import { threadId } from "node:worker_threads";

import { AlreadyBorrowedError } from "./engine-errors";

/**
 * Guards an arena's access window. `held` reports whether the calling
 * thread is the one holding it.
 */
export interface AccessLock {
  readonly held: boolean;
  acquire(): void;
  tryAcquire(): boolean;
  release(): void;
}

export class ExclusiveLock implements AccessLock {
  private locked = false;

  get held(): boolean {
    return this.locked;
  }

  acquire(): void {
    if (!this.tryAcquire()) {
      throw new AlreadyBorrowedError("Node arena is already borrowed");
    }
  }

  tryAcquire(): boolean {
    if (this.locked) return false;
    this.locked = true;
    return true;
  }

  release(): void {
    this.locked = false;
  }
}

const WAIT_SLICE_MS = 50;

/**
 * Mutex over one Int32 word of shared memory. The word holds 0 when free,
 * otherwise the owner's thread tag.
 */
export class AtomicsLock implements AccessLock {
  private readonly tag = threadId + 1;

  constructor(
    private readonly words: Int32Array,
    private readonly index: number,
  ) {}

  get held(): boolean {
    return Atomics.load(this.words, this.index) === this.tag;
  }

  acquire(): void {
    for (;;) {
      const owner = Atomics.compareExchange(this.words, this.index, 0, this.tag);
      if (owner === 0) return;
      if (owner === this.tag) {
        throw new AlreadyBorrowedError(
          `Node arena is already borrowed by this thread (tag ${owner})`,
        );
      }
      Atomics.wait(this.words, this.index, owner, WAIT_SLICE_MS);
    }
  }

  tryAcquire(): boolean {
    return Atomics.compareExchange(this.words, this.index, 0, this.tag) === 0;
  }

  release(): void {
    const owner = Atomics.compareExchange(this.words, this.index, this.tag, 0);
    if (owner !== this.tag) {
      throw new Error(
        `AtomicsLock released by tag ${this.tag} but held by ${owner}`,
      );
    }
    Atomics.notify(this.words, this.index, 1);
  }
}
