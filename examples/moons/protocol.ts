import type { NodeRef, SharedStoreDescriptor } from "../../src";

/** Passed as `workerData` when a forward worker starts. */
export interface ForwardWorkerInit {
  store: SharedStoreDescriptor;
  dims: number[];
  parameters: NodeRef[];
}

export type ForwardRequest = {
  type: "forward";
  requestId: number;
  rows: number[][];
};

export type ForwardResponse =
  | {
      type: "preds";
      requestId: number;
      preds: NodeRef[];
    }
  | {
      type: "error";
      requestId: number;
      message: string;
    };
