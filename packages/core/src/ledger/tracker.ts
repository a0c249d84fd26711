import type { EpisodeRecord, ExperimentHistory } from "../types/episode.js";
import type { RankedItem } from "../types/feed.js";
import { ledger, type LedgerState } from "./ledger.js";

export interface TrackerState {
  episode: number;
  experimentId: number;
  ledger: LedgerState;
  history: ExperimentHistory;
}

/**
 * Experiment tracker: groups episode records into numbered experiments.
 * The open experiment lives in the ledger; closed ones are archived in `history`.
 */
export const tracker = {
  /** Archive the open experiment under its id. No-op while it has no records. */
  addExperiment(state: TrackerState): void {
    if (state.ledger.records.length === 0) return;
    state.history[state.experimentId] = [...state.ledger.records];
  },

  /** Close the open experiment and start the next one at episode 0. */
  resetExperiment(state: TrackerState): void {
    tracker.addExperiment(state);
    ledger.reset(state.ledger);
    state.episode = 0;
    state.experimentId += 1;
  },

  /** Closed experiments plus the open one under its id. */
  experiments(state: TrackerState): ExperimentHistory {
    return { ...state.history, [state.experimentId]: [...state.ledger.records] };
  },

  /** feedOut of the last record of the highest-numbered experiment, null if it has none yet. */
  output(state: TrackerState): readonly RankedItem[] | null {
    const all = tracker.experiments(state);
    const latest = Math.max(...Object.keys(all).map(Number));
    const records: readonly EpisodeRecord[] = all[latest] ?? [];
    return records.length > 0 ? records[records.length - 1].feedOut : null;
  },
};
