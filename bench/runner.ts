import fs from "node:fs";
import path from "node:path";
import { performance } from "node:perf_hooks";

import { createGraphSuite } from "./suites/graph";
import type { BenchCase, BenchResult } from "./types";

const warmupIters = Number.parseInt(process.env.BENCH_WARMUP ?? "3", 10);
const runIters = Number.parseInt(process.env.BENCH_ITERS ?? "10", 10);

function median(values: number[]): number {
  const sorted = values.slice().sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  if (sorted.length % 2 === 0) {
    return (sorted[mid - 1] + sorted[mid]) / 2;
  }
  return sorted[mid];
}

async function runCase(benchCase: BenchCase): Promise<BenchResult> {
  if (benchCase.skip || !benchCase.run) {
    return {
      name: benchCase.name,
      status: "skipped",
      reason: benchCase.skip ?? "missing run",
    };
  }

  for (let i = 0; i < warmupIters; i += 1) {
    await benchCase.run();
  }

  const durations: number[] = [];
  for (let i = 0; i < runIters; i += 1) {
    const start = performance.now();
    await benchCase.run();
    const end = performance.now();
    durations.push(end - start);
  }

  const msMedian = median(durations);
  const seconds = msMedian / 1000;
  const nodesPerSec =
    benchCase.nodes && seconds > 0 ? benchCase.nodes / seconds : undefined;

  return {
    name: benchCase.name,
    status: "ok",
    iterations: runIters,
    msMedian,
    nodesPerSec,
  };
}

async function run(): Promise<void> {
  const cases = createGraphSuite();
  const results: BenchResult[] = [];
  for (const benchCase of cases) {
    results.push(await runCase(benchCase));
  }
  const output = {
    timestamp: new Date().toISOString(),
    warmupIters,
    runIters,
    results,
  };

  const outDir = path.resolve("bench", "results");
  fs.mkdirSync(outDir, { recursive: true });
  const outPath = path.join(outDir, "latest.json");
  fs.writeFileSync(outPath, JSON.stringify(output, null, 2));

  for (const result of results) {
    if (result.status === "skipped") {
      console.log(`${result.name}: skipped (${result.reason})`);
      continue;
    }
    const mnodes =
      result.nodesPerSec !== undefined
        ? (result.nodesPerSec / 1e6).toFixed(2)
        : "n/a";
    console.log(`${result.name}: ${result.msMedian.toFixed(3)} ms (Mnodes/s=${mnodes})`);
  }
}

run().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
