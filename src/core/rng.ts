/**
 * Seeded counter-based random numbers.
 *
 * Draw `n` of a generator is a pure function of `(seed, n)`, so runs with
 * the same seed see the same weights, datasets and shuffles.
 */

export function mix32(value: number): number {
  let v = value >>> 0;
  v ^= v >>> 16;
  v = Math.imul(v, 0x7feb352d);
  v ^= v >>> 15;
  v = Math.imul(v, 0x846ca68b);
  v ^= v >>> 16;
  return v >>> 0;
}

export function rngValue(seed: number, drawNonce: number): number {
  const state = (seed >>> 0) ^ Math.imul(drawNonce >>> 0, 0x85ebca6b);
  return mix32(state) / 2 ** 32;
}

export class Rng {
  readonly seed: number;
  private drawNonce = 0;
  private spareGauss: number | null = null;

  constructor(seed: number = Date.now()) {
    this.seed = seed >>> 0;
  }

  get draws(): number {
    return this.drawNonce;
  }

  /** Uniform in [0, 1). */
  next(): number {
    this.drawNonce += 1;
    return rngValue(this.seed, this.drawNonce);
  }

  uniform(low: number, high: number): number {
    return low + (high - low) * this.next();
  }

  /** Integer in [low, high). */
  int(low: number, high: number): number {
    if (high <= low) {
      throw new Error(`Empty integer range [${low}, ${high})`);
    }
    return low + Math.floor(this.next() * (high - low));
  }

  // Marsaglia polar method; the second variate of each pair is cached.
  gauss(mu = 0, sigma = 1): number {
    if (this.spareGauss !== null) {
      const spare = this.spareGauss;
      this.spareGauss = null;
      return mu + sigma * spare;
    }
    let u: number;
    let v: number;
    let r: number;
    do {
      u = 2 * this.next() - 1;
      v = 2 * this.next() - 1;
      r = u * u + v * v;
    } while (r >= 1 || r === 0);
    const mult = Math.sqrt((-2 * Math.log(r)) / r);
    this.spareGauss = v * mult;
    return mu + sigma * u * mult;
  }
}
