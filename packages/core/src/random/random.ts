/**
 * Injectable pseudorandom source. The only place indeterminism enters the engine,
 * so its state is part of every checkpoint.
 */
export interface RandomSource {
  /** Uniform float in [0, 1). */
  next(): number;
  /** Opaque integer that recreates this source via createRandom(). */
  getState(): number;
}

/** xorshift32; a zero seed is remapped because zero is a fixed point. */
export function createRandom(seed: number): RandomSource {
  let x = (seed | 0) || 1;
  return {
    next() {
      x ^= x << 13;
      x ^= x >>> 17;
      x ^= x << 5;
      return (x >>> 0) / 4294967296;
    },
    getState() {
      return x;
    },
  };
}

/** Uniform integer in [lo, hi], both inclusive. */
export function randomInt(rng: RandomSource, lo: number, hi: number): number {
  return lo + Math.floor(rng.next() * (hi - lo + 1));
}

/**
 * Draw k distinct items uniformly (partial Fisher–Yates). The input is not mutated.
 * k is clamped to the number of items.
 */
export function sampleWithoutReplacement<T>(rng: RandomSource, items: readonly T[], k: number): T[] {
  const pool = [...items];
  const n = Math.min(Math.max(k, 0), pool.length);
  for (let i = 0; i < n; i++) {
    const j = randomInt(rng, i, pool.length - 1);
    [pool[i], pool[j]] = [pool[j], pool[i]];
  }
  return pool.slice(0, n);
}
