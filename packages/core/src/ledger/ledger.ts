import type { FeedItem, RankedItem } from "../types/feed.js";
import type { EpisodeRecord } from "../types/episode.js";
import type { EngineConfig } from "../types/config.js";

export interface LedgerState {
  /** Raw feeds of the open experiment, oldest first. */
  feeds: FeedItem[][];
  /** key -> appearances across the open experiment's feeds. */
  counter: Map<string, number>;
  /** Every key ever submitted, in first-seen order. Survives resets. */
  observed: Set<string>;
  feed: FeedItem[] | null;
  feedOut: RankedItem[] | null;
  itemsAdded: string[];
  /** Episode records of the open experiment. */
  records: EpisodeRecord[];
}

export type PopulationConfig = Pick<EngineConfig, "population" | "populationGrowth">;

export function createLedgerState(): LedgerState {
  return {
    feeds: [],
    counter: new Map(),
    observed: new Set(),
    feed: null,
    feedOut: null,
    itemsAdded: [],
    records: [],
  };
}

function fixedPopulation(config: PopulationConfig): string[] | null {
  return config.population && config.population.length > 0 ? config.population : null;
}

/**
 * Feedback ledger: append-only record of what was submitted and tried.
 * Operates on a LedgerState owned by the engine.
 */
export const ledger = {
  logFeed(state: LedgerState, feed: readonly FeedItem[]): void {
    const copy = feed.map((item) => ({ ...item }));
    state.feeds.push(copy);
    state.feed = copy;
    for (const { key } of copy) {
      state.counter.set(key, (state.counter.get(key) ?? 0) + 1);
      state.observed.add(key);
    }
  },

  /** Snapshot the latest feed, feedOut and injected keys as an immutable record. */
  logEpisode(state: LedgerState, episode: number, isOptEpisode: boolean): EpisodeRecord {
    const record: EpisodeRecord = Object.freeze({
      episode,
      isOptEpisode,
      feed: Object.freeze((state.feed ?? []).map((item) => Object.freeze({ ...item }))),
      feedOut: Object.freeze((state.feedOut ?? []).map((item) => Object.freeze({ ...item }))),
      itemsAdded: Object.freeze([...state.itemsAdded]),
    });
    state.records.push(record);
    return record;
  },

  /**
   * Keys eligible for inclusion:
   * - no fixed population: every key ever observed
   * - fixed population with growth: fixed keys, then observed ones outside it
   * - fixed population: the fixed keys
   */
  population(state: LedgerState, config: PopulationConfig): string[] {
    const fixed = fixedPopulation(config);
    if (!fixed) return [...state.observed];
    if (config.populationGrowth) return [...new Set([...fixed, ...state.observed])];
    return [...fixed];
  },

  /** Population members absent from every feed of the open experiment. */
  unusedItems(state: LedgerState, config: PopulationConfig): string[] {
    if (!fixedPopulation(config)) return [];
    return ledger.population(state, config).filter((key) => !state.counter.has(key));
  },

  /** Clear the open experiment. Observed keys stay part of the population. */
  reset(state: LedgerState): void {
    state.feeds = [];
    state.counter = new Map();
    state.feed = null;
    state.feedOut = null;
    state.itemsAdded = [];
    state.records = [];
  },
};
