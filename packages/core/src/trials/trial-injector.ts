import type { RankedItem } from "../types/feed.js";
import { reposition } from "../types/feed.js";
import { Insertion } from "../types/config.js";
import { ConfigError } from "../errors.js";
import { randomInt, sampleWithoutReplacement, type RandomSource } from "../random/random.js";

export interface TrialInjectorConfig {
  /** Max keys injected per call. */
  n: number;
  insertion: Insertion;
}

export interface TrialResult {
  itemsAdded: string[];
  feed: RankedItem[];
}

export interface TrialInjector {
  readonly config: TrialInjectorConfig;
  inject(feed: readonly RankedItem[], unused: readonly string[], rng: RandomSource): TrialResult;
}

/** Round half to even, so round(2.5) = 2 and round(3.5) = 4. */
export function roundHalfEven(x: number): number {
  const floor = Math.floor(x);
  const diff = x - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

type IndexPolicy = (k: number, length: number, rng: RandomSource) => number[];

const range = (start: number, k: number): number[] => Array.from({ length: k }, (_, i) => start + i);

const INDEX_POLICIES: Record<Insertion, IndexPolicy> = {
  append: (k, length) => range(length, k),
  prepend: (k) => range(0, k),
  middle: (k, length) => range(roundHalfEven(length / 2), k),
  // Offsets are bounded by k, not by the ordering's length.
  random: (k, _length, rng) => Array.from({ length: k }, () => randomInt(rng, 0, k)),
};

/** Target index for each of k keys inserted into an ordering of `length` items. */
export function findInsertionIndices(
  k: number,
  length: number,
  insertion: Insertion,
  rng: RandomSource,
): number[] {
  return INDEX_POLICIES[insertion](k, length, rng);
}

/**
 * Insert keys (reward 0) at the given indices, one after the other. Keys already in the
 * ordering are dropped before indices are assigned. Indices past the end append.
 */
export function insertKeys(
  feed: readonly RankedItem[],
  keys: readonly string[],
  indices: readonly number[],
): TrialResult {
  const present = new Set(feed.map((item) => item.key));
  const fresh = keys.filter((key) => {
    if (present.has(key)) return false;
    present.add(key);
    return true;
  });

  const out: RankedItem[] = [...feed];
  fresh.forEach((key, ix) => {
    out.splice(indices[ix], 0, { key, reward: 0, pos: ix });
  });

  return { itemsAdded: fresh, feed: reposition(out) };
}

/**
 * Trial injector: samples up to `n` unseen population members and merges them into
 * an ordering so the whole population keeps getting explored.
 */
export function createTrialInjector(config: TrialInjectorConfig): TrialInjector {
  const issues: string[] = [];
  if (!Number.isInteger(config.n) || config.n < 0) {
    issues.push(`nTry: expected a non-negative integer, got ${config.n}`);
  }
  if (!Insertion.includes(config.insertion)) {
    issues.push(`insertion: unknown insertion policy "${config.insertion}". Available: ${Insertion.join(", ")}`);
  }
  if (issues.length > 0) throw new ConfigError(issues);

  return {
    config,
    inject(feed, unused, rng) {
      const k = Math.min(config.n, unused.length);
      if (k === 0) return { itemsAdded: [], feed: reposition(feed) };
      const keys = sampleWithoutReplacement(rng, unused, k);
      const indices = findInsertionIndices(k, feed.length, config.insertion, rng);
      return insertKeys(feed, keys, indices);
    },
  };
}
