/**
 * Forward-pass worker: attaches to the trainer's shared arena, rebuilds the
 * model over the trainer's parameter nodes and runs forward passes for the
 * rows it is sent. Prediction nodes stay in the shared arena; only their
 * refs travel back.
 */

import { parentPort, workerData } from "node:worker_threads";

import { Arena, nn, Value } from "../../src";
import type { ForwardRequest, ForwardResponse, ForwardWorkerInit } from "./protocol";

const port = parentPort;
if (!port) {
  throw new Error("forward-worker must run inside a worker thread");
}

const init: ForwardWorkerInit = workerData;
const arena = Arena.attach(init.store);
const model = nn.MLP.fromParameters(
  init.dims,
  init.parameters.map((ref) => Value.fromRef(arena, ref)),
);

port.on("message", (request: ForwardRequest) => {
  let response: ForwardResponse;
  try {
    const preds = request.rows.map(
      (row) => model.forward(row.map((v) => Value.fromScalar(v, arena)))[0].ref,
    );
    response = { type: "preds", requestId: request.requestId, preds };
  } catch (error) {
    response = {
      type: "error",
      requestId: request.requestId,
      message: error instanceof Error ? error.message : String(error),
    };
  }
  port.postMessage(response);
});
