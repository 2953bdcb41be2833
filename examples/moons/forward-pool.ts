import { Worker } from "node:worker_threads";

import type { Arena, NodeRef, Value } from "../../src";
import type { ForwardRequest, ForwardResponse, ForwardWorkerInit } from "./protocol";

type Pending = {
  resolve: (preds: NodeRef[]) => void;
  reject: (error: Error) => void;
};

/**
 * Fixed set of forward workers sharing one arena. `forward` splits the rows
 * round-robin and returns the prediction refs in input order.
 */
export class ForwardPool {
  private readonly workers: Worker[];
  private readonly pending = new Map<number, Pending>();
  private nextRequestId = 1;
  private failure: Error | null = null;
  private closing = false;

  constructor(arena: Arena, dims: number[], parameters: Value[], size: number) {
    if (!Number.isInteger(size) || size <= 0) {
      throw new Error(`ForwardPool needs a positive worker count, got ${size}`);
    }
    const init: ForwardWorkerInit = {
      store: arena.share(),
      dims,
      parameters: parameters.map((param) => param.ref),
    };
    this.workers = Array.from({ length: size }, () => this.spawn(init));
  }

  async forward(rows: number[][]): Promise<NodeRef[]> {
    const chunks = this.workers.map((): { rows: number[][]; at: number[] } => ({
      rows: [],
      at: [],
    }));
    rows.forEach((row, i) => {
      const chunk = chunks[i % chunks.length];
      chunk.rows.push(row);
      chunk.at.push(i);
    });

    const results = await Promise.all(
      chunks.map((chunk, w) =>
        chunk.rows.length === 0
          ? Promise.resolve<NodeRef[]>([])
          : this.request(this.workers[w], chunk.rows),
      ),
    );

    const preds = new Array<NodeRef>(rows.length);
    results.forEach((refs, w) => {
      refs.forEach((ref, k) => {
        preds[chunks[w].at[k]] = ref;
      });
    });
    return preds;
  }

  async close(): Promise<void> {
    this.closing = true;
    await Promise.all(this.workers.map((worker) => worker.terminate()));
  }

  /** Stop one worker as if it had died (tests). */
  async _debug_terminateWorker(index: number): Promise<void> {
    await this.workers[index].terminate();
  }

  private spawn(init: ForwardWorkerInit): Worker {
    const worker = new Worker(new URL("./worker-bootstrap.mjs", import.meta.url), {
      workerData: init,
      argv: [new URL("./forward-worker.ts", import.meta.url).href],
    });
    const id = worker.threadId;
    worker.on("message", (response: ForwardResponse) => this.settle(response));
    worker.on("error", (error) => this.failAll(error));
    worker.on("exit", (code) => {
      if (!this.closing) {
        this.failAll(new Error(`Forward worker ${id} exited with code ${code}`));
      }
    });
    return worker;
  }

  private request(worker: Worker, rows: number[][]): Promise<NodeRef[]> {
    const requestId = this.nextRequestId++;
    const message: ForwardRequest = { type: "forward", requestId, rows };
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    return new Promise((resolve, reject) => {
      this.pending.set(requestId, { resolve, reject });
      worker.postMessage(message);
    });
  }

  private settle(response: ForwardResponse): void {
    const pending = this.pending.get(response.requestId);
    if (!pending) return;
    this.pending.delete(response.requestId);
    if (response.type === "error") {
      pending.reject(new Error(`Forward worker failed: ${response.message}`));
    } else {
      pending.resolve(response.preds);
    }
  }

  /** Rejects everything pending; the pool is unusable afterwards. */
  private failAll(error: Error): void {
    this.failure ??= error;
    for (const pending of this.pending.values()) pending.reject(error);
    this.pending.clear();
  }
}
