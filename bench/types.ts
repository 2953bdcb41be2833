export type BenchCase = {
  name: string;
  run?: () => void | Promise<void>;
  /** Graph nodes created and visited by one run. */
  nodes?: number;
  skip?: string;
};

export type BenchResult =
  | {
      name: string;
      status: "skipped";
      reason: string;
    }
  | {
      name: string;
      status: "ok";
      iterations: number;
      msMedian: number;
      nodesPerSec?: number;
    };
