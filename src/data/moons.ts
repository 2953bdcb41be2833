import { Rng } from "../core/rng";

export type Point = [number, number];

export interface MoonsOptions {
  shuffle?: boolean;
  /** Standard deviation of gaussian noise added to each coordinate. */
  noise?: number;
  rng?: Rng;
}

export interface MoonsDataset {
  x: Point[];
  /** 0 for the outer moon, 1 for the inner one. */
  y: number[];
}

/** `n` evenly spaced values from `low` to `high`, both included. */
export function linspace(low: number, high: number, n: number): number[] {
  if (!Number.isInteger(n) || n < 1) {
    throw new Error(`linspace needs at least one sample, got ${n}`);
  }
  if (n === 1) return [low];
  const step = (high - low) / (n - 1);
  return Array.from({ length: n }, (_, i) => low + i * step);
}

/**
 * Apply one random permutation to every array in place (Fisher-Yates).
 * All arrays must have the same length.
 */
export function shuffleTogether(arrays: unknown[][], rng: Rng): void {
  if (arrays.length === 0) return;
  const length = arrays[0].length;
  if (arrays.some((array) => array.length !== length)) {
    throw new Error(
      `shuffleTogether needs equal lengths, got [${arrays.map((a) => a.length).join(", ")}]`,
    );
  }
  for (let i = 0; i < length - 1; i += 1) {
    const j = rng.int(i, length);
    if (j === i) continue;
    for (const array of arrays) {
      const tmp = array[i];
      array[i] = array[j];
      array[j] = tmp;
    }
  }
}

/**
 * Two interleaving half circles: `n` points on the outer moon and `n` on
 * the inner one.
 */
export function makeMoons(n: number, options: MoonsOptions = {}): MoonsDataset {
  const rng = options.rng ?? new Rng();
  const noise = options.noise ?? 0;
  const angles = linspace(0, Math.PI, n);

  const x: Point[] = [
    ...angles.map((t): Point => [Math.cos(t), Math.sin(t)]),
    ...angles.map((t): Point => [1 - Math.cos(t), 0.5 - Math.sin(t)]),
  ];
  const y: number[] = [...new Array<number>(n).fill(0), ...new Array<number>(n).fill(1)];

  if (options.shuffle) {
    shuffleTogether([x, y], rng);
  }
  if (noise > 0) {
    for (const point of x) {
      point[0] += rng.gauss(0, noise);
      point[1] += rng.gauss(0, noise);
    }
  }
  return { x, y };
}
