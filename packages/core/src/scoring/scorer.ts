import type { FeedItem, ScoredItem } from "../types/feed.js";
import type { ScorerConfig } from "../types/config.js";
import { ConfigError } from "../errors.js";
import { REDUCERS, aggregateFeeds } from "./aggregate.js";
import { NORMALIZERS } from "./normalize.js";

export interface Scorer {
  readonly config: ScorerConfig;
  /** Aggregate, normalize into `score`, and order descending by score (stable). */
  score(feeds: readonly (readonly FeedItem[])[]): ScoredItem[];
}

/**
 * Resolve the scoring strategy once. Unknown reducer or normalization names
 * (possible when the config bypassed EngineConfigSchema) fail here, not mid-run.
 */
export function createScorer(config: ScorerConfig): Scorer {
  const reducer = Object.hasOwn(REDUCERS, config.aggStrategy) ? REDUCERS[config.aggStrategy] : undefined;
  const normalizer = Object.hasOwn(NORMALIZERS, config.normalization)
    ? NORMALIZERS[config.normalization]
    : undefined;

  const issues: string[] = [];
  if (!reducer) issues.push(`scorer.aggStrategy: unknown aggregation "${config.aggStrategy}"`);
  if (!normalizer) issues.push(`scorer.normalization: unknown normalization "${config.normalization}"`);
  if (!(config.logBase > 0) || config.logBase === 1) {
    issues.push(`scorer.logBase: expected a positive base other than 1, got ${config.logBase}`);
  }
  if (!reducer || !normalizer || issues.length > 0) throw new ConfigError(issues);

  return {
    config,
    score(feeds) {
      const aggregated = aggregateFeeds(feeds, config.perEpisode, reducer);
      const scores = normalizer(
        aggregated.map((item) => item.reward),
        config.logBase,
      );
      return aggregated
        .map((item, index) => ({ ...item, score: scores[index] }))
        .sort((a, b) => b.score - a.score)
        .map((item, index) => ({ ...item, pos: index }));
    },
  };
}
