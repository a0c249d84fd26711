import type { FeedItem } from "../types/feed.js";
import type { AggStrategy } from "../types/config.js";

export interface AggregatedItem {
  key: string;
  reward: number;
  pos: number;
}

type Reducer = (values: readonly number[]) => number;

const sum: Reducer = (values) => values.reduce((acc, v) => acc + v, 0);

function mean(values: readonly number[]): number {
  const direct = sum(values) / values.length;
  if (Number.isFinite(direct)) return direct;
  // the running total overflowed; averaging term by term cannot
  return values.reduce((acc, v) => acc + v / values.length, 0);
}

/** Sums past the float range saturate at ±Number.MAX_VALUE. */
function clampFinite(value: number): number {
  if (value === Infinity) return Number.MAX_VALUE;
  if (value === -Infinity) return -Number.MAX_VALUE;
  return value;
}

export const REDUCERS: Record<AggStrategy, Reducer> = {
  mean,
  sum,
  min: (values) => Math.min(...values),
  max: (values) => Math.max(...values),
};

/**
 * Aggregation stage of scoring.
 *
 * Per-episode: the latest feed as submitted. Otherwise one entry per key across all
 * feeds of the open experiment, in first-appearance order, reward reduced with `reducer`
 * and pos reset to 0 (order is not meaningful yet). Aggregated rewards are always finite.
 */
export function aggregateFeeds(
  feeds: readonly (readonly FeedItem[])[],
  perEpisode: boolean,
  reducer: Reducer,
): AggregatedItem[] {
  if (perEpisode) {
    const latest = feeds[feeds.length - 1] ?? [];
    return latest.map(({ key, reward }, index) => ({ key, reward, pos: index }));
  }

  const rewardsByKey = new Map<string, number[]>();
  for (const feed of feeds) {
    for (const { key, reward } of feed) {
      const rewards = rewardsByKey.get(key);
      if (rewards) {
        rewards.push(reward);
      } else {
        rewardsByKey.set(key, [reward]);
      }
    }
  }

  return [...rewardsByKey].map(([key, rewards]) => ({ key, reward: clampFinite(reducer(rewards)), pos: 0 }));
}
