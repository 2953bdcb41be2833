/**
 * Trains a [2, 16, 16, 1] MLP on the two-moons dataset with the max-margin
 * loss and a linearly decaying SGD learning rate.
 *
 * Usage:
 *   npm run train:moons -- [--epochs 100] [--samples 100] [--seed 1] [--threads 4]
 *
 * With --threads the arena is created in shared mode and every epoch's
 * forward passes run on worker threads; loss, backward and the optimizer
 * step stay on the main thread.
 */

import { performance } from "node:perf_hooks";

import {
  Arena,
  linearDecay,
  makeMoons,
  nn,
  Rng,
  SGD,
  shuffleTogether,
  Value,
} from "../../src";
import { ForwardPool } from "./forward-pool";

const DIMS = [2, 16, 16, 1];
const SHARED_CAPACITY = 1 << 20;

interface CLIArgs {
  epochs: number;
  samples: number;
  noise: number;
  seed: number;
  threads: number;
}

function parseArgs(): CLIArgs {
  const args = process.argv.slice(2);
  const result: CLIArgs = {
    epochs: 100,
    samples: 100,
    noise: 0.1,
    seed: 1,
    threads: 0,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case "--epochs":
        result.epochs = parseInt(args[++i], 10);
        break;
      case "--samples":
        result.samples = parseInt(args[++i], 10);
        break;
      case "--noise":
        result.noise = parseFloat(args[++i]);
        break;
      case "--seed":
        result.seed = parseInt(args[++i], 10);
        break;
      case "--threads":
        result.threads = parseInt(args[++i], 10);
        break;
      default:
        throw new Error(`Unknown argument: ${arg}`);
    }
  }
  return result;
}

async function main(): Promise<void> {
  const args = parseArgs();
  const rng = new Rng(args.seed);

  const { x, y: labels } = makeMoons(args.samples, { shuffle: true, noise: args.noise, rng });
  // labels are 0/1; the loss wants -1/1
  const y = labels.map((label) => label * 2 - 1);

  const arena =
    args.threads > 0
      ? new Arena({ mode: "shared", capacity: SHARED_CAPACITY })
      : new Arena({ mode: "exclusive" });
  const model = new nn.MLP(DIMS, { arena, rng });
  const optimizer = new SGD(model.parameters(), { lr: linearDecay(0, args.epochs) });

  console.log(model.toString());
  console.log(`Number of parameters: ${model.parameters().length}`);
  if (args.threads > 0) {
    console.log(`Forward passes on ${args.threads} worker threads`);
  }

  const pool =
    args.threads > 0 ? new ForwardPool(arena, DIMS, model.parameters(), args.threads) : null;
  // Everything allocated after this point is per-epoch.
  const modelMark = arena.mark();

  try {
    for (let epoch = 0; epoch < args.epochs; epoch++) {
      const start = performance.now();
      shuffleTogether([x, y], rng);

      const preds = pool
        ? (await pool.forward(x)).map((ref) => Value.fromRef(arena, ref))
        : x.map((row) => model.forward(row.map((v) => Value.fromScalar(v, arena)))[0]);

      const { loss, accuracy } = nn.svmLoss(model, preds, y);
      optimizer.zeroGrad();
      loss.backward();
      optimizer.setLearningRate(linearDecay(epoch, args.epochs));
      optimizer.step();

      const elapsed = performance.now() - start;
      console.log(
        `Epoch: ${epoch}, time: ${elapsed.toFixed(0)}ms, loss: ${loss.data.toFixed(6)}, accuracy: ${(accuracy * 100).toFixed(4)}%`,
      );
      arena.rewind(modelMark);
    }
  } finally {
    await pool?.close();
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
