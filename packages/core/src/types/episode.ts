import type { FeedItem, RankedItem } from "./feed.js";

export interface EpisodeRecord {
  episode: number;
  isOptEpisode: boolean;
  feed: readonly FeedItem[];
  feedOut: readonly RankedItem[];
  itemsAdded: readonly string[];
}

/** Closed experiments by id. */
export type ExperimentHistory = Record<number, readonly EpisodeRecord[]>;

export interface Experiment {
  id: number;
  episodes: readonly EpisodeRecord[];
}
