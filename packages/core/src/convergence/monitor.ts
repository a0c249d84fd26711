import type { EpisodeRecord } from "../types/episode.js";

export type StopReason = "episode_ceiling" | "stagnation";
export type MonitorSignal = "continue" | "stop" | "restart";

export interface MonitorState {
  stop: boolean;
  restart: boolean;
  /** Set once the output ordering has repeated `patience` times. */
  stagnant: boolean;
  stagnationCount: number;
  lastKeyOrder: string[] | null;
  reason: StopReason | null;
}

export interface MonitorConfig {
  episodeCeiling?: number;
  /** Consecutive repeats of the same ordering before declaring stagnation. */
  patience?: number;
  startAt: number;
  restartOnStagnation: boolean;
}

export function createMonitorState(): MonitorState {
  return {
    stop: false,
    restart: false,
    stagnant: false,
    stagnationCount: 0,
    lastKeyOrder: null,
    reason: null,
  };
}

function sameOrder(a: readonly string[], b: readonly string[] | null): boolean {
  return b !== null && a.length === b.length && a.every((key, i) => key === b[i]);
}

function signalOf(state: MonitorState): MonitorSignal {
  if (state.stop) return "stop";
  if (state.restart) return "restart";
  return "continue";
}

/**
 * Convergence monitor: decides after each episode whether the experiment goes on,
 * stops for good, or restarts. A stop is terminal until reset and outranks a restart.
 */
export const monitor = {
  evaluate(state: MonitorState, records: readonly EpisodeRecord[], config: MonitorConfig): MonitorSignal {
    if (state.stop) return "stop";

    const latest = records[records.length - 1];
    if (!latest) return signalOf(state);

    // episode numbers are 0-based, the ceiling counts episodes
    if (config.episodeCeiling !== undefined && latest.episode >= config.episodeCeiling - 1) {
      state.stop = true;
      state.restart = false;
      state.reason = "episode_ceiling";
      return "stop";
    }

    if (config.patience === undefined || !latest.isOptEpisode) return signalOf(state);

    const keys = latest.feedOut.map((item) => item.key);
    if (latest.episode >= config.startAt && sameOrder(keys, state.lastKeyOrder)) {
      state.stagnationCount += 1;
      if (state.stagnationCount >= config.patience) {
        state.stagnant = true;
        state.reason = "stagnation";
        if (config.restartOnStagnation) {
          state.restart = true;
        } else {
          state.stop = true;
        }
      }
    } else {
      state.stagnationCount = 0;
      state.lastKeyOrder = keys;
    }

    return signalOf(state);
  },

  reset(state: MonitorState): void {
    Object.assign(state, createMonitorState());
  },
};
