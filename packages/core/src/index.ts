// Types
export type { FeedItem, ScoredItem, RankedItem } from "./types/feed.js";
export { FeedItemSchema, FeedSchema, RankedItemSchema, parseFeed, reposition } from "./types/feed.js";
export type { EpisodeRecord, ExperimentHistory, Experiment } from "./types/episode.js";
export type { ScorerConfig, EngineConfig, EngineConfigInput } from "./types/config.js";
export {
  AggStrategy,
  Normalization,
  Insertion,
  ScorerConfigSchema,
  EngineConfigSchema,
  parseEngineConfig,
} from "./types/config.js";

// Errors
export { ConfigError, FeedShapeError, CheckpointError } from "./errors.js";

// Randomness
export type { RandomSource } from "./random/random.js";
export { createRandom, randomInt, sampleWithoutReplacement } from "./random/random.js";

// Ledger & tracker
export type { LedgerState, PopulationConfig } from "./ledger/ledger.js";
export { ledger, createLedgerState } from "./ledger/ledger.js";
export type { TrackerState } from "./ledger/tracker.js";
export { tracker } from "./ledger/tracker.js";

// Scoring & selection
export type { Scorer } from "./scoring/scorer.js";
export { createScorer } from "./scoring/scorer.js";
export type { AggregatedItem } from "./scoring/aggregate.js";
export { REDUCERS, aggregateFeeds } from "./scoring/aggregate.js";
export type { Normalizer } from "./scoring/normalize.js";
export { NORMALIZERS } from "./scoring/normalize.js";
export type { Selector } from "./selection/selector.js";
export { scoreOrderSelector, selectorRegistry } from "./selection/selector.js";

// Trials
export type { TrialInjector, TrialInjectorConfig, TrialResult } from "./trials/trial-injector.js";
export { createTrialInjector, findInsertionIndices, insertKeys, roundHalfEven } from "./trials/trial-injector.js";

// Convergence
export type { MonitorState, MonitorConfig, MonitorSignal, StopReason } from "./convergence/monitor.js";
export { monitor, createMonitorState } from "./convergence/monitor.js";

// Engine
export type { EngineStatus, EngineMachineInput } from "./engine/engine-machine.js";
export { engineMachine } from "./engine/engine-machine.js";
export type { EngineState, MachineState } from "./engine/engine-state.js";
export { createEngineState } from "./engine/engine-state.js";
export type { EngineOptions } from "./engine/engine.js";
export { FeedRankEngine } from "./engine/engine.js";

// Persistence
export { CHECKPOINT_FILE, CheckpointSchema, saveEngine, loadEngine, hasCheckpoint } from "./persistence/checkpoint.js";
