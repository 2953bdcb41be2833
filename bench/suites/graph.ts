/**
 * Graph construction and backward throughput:
 * - Deep add/mul chains (topological sort on long paths)
 * - Wide fan-in sums (many consumers of one leaf)
 * - One MLP training step on a small batch
 * Each case runs in both sharing modes to show the cost of the shared lock.
 */

import { Arena, nn, Rng, type SharingMode, SGD, Value } from "../../src";
import type { BenchCase } from "../types";

const MODES: SharingMode[] = ["exclusive", "shared"];

function chainCase(mode: SharingMode, depth: number): BenchCase {
  const arena = new Arena({ mode, capacity: 4 * depth + 16 });
  const x = Value.fromScalar(0.5, arena);

  return {
    name: `chain.${mode}.${depth}`,
    // one lifted constant and one op node per mul, one node per add
    nodes: 3 * depth,
    run: () => {
      arena.tidy(() => {
        let y = x;
        for (let i = 0; i < depth; i += 1) {
          y = y.mul(0.999).add(x);
        }
        y.backward();
      });
    },
  };
}

function fanInCase(mode: SharingMode, width: number): BenchCase {
  const arena = new Arena({ mode, capacity: 2 * width + 16 });
  const x = Value.fromScalar(1, arena);

  return {
    name: `fan-in.${mode}.${width}`,
    nodes: 2 * width,
    run: () => {
      arena.tidy(() => {
        let sum = x;
        for (let i = 0; i < width; i += 1) {
          sum = sum.add(x.mul(x));
        }
        sum.backward();
      });
    },
  };
}

function mlpStepCase(mode: SharingMode, batch: number): BenchCase {
  const arena = new Arena({ mode, capacity: 1 << 18 });
  const rng = new Rng(1337);
  const model = new nn.MLP([2, 16, 16, 1], { arena, rng });
  const optimizer = new SGD(model.parameters(), { lr: 0.05 });
  const inputs = Array.from({ length: batch }, () => [rng.gauss(), rng.gauss()]);
  const targets = inputs.map(([a, b]) => (a * b > 0 ? 1 : -1));

  return {
    name: `mlp-step.${mode}.${batch}`,
    run: () => {
      arena.tidy(() => {
        const preds = inputs.map(
          (row) => model.forward(row.map((v) => Value.fromScalar(v, arena)))[0],
        );
        const { loss } = nn.svmLoss(model, preds, targets);
        optimizer.zeroGrad();
        loss.backward();
        optimizer.step();
      });
    },
  };
}

export function createGraphSuite(): BenchCase[] {
  return MODES.flatMap((mode) => [
    chainCase(mode, 1_000),
    chainCase(mode, 20_000),
    fanInCase(mode, 10_000),
    mlpStepCase(mode, 32),
  ]);
}
