import { describe, it, expect } from "vitest";
import { createMonitorState, monitor, type MonitorConfig } from "./monitor.js";
import type { EpisodeRecord } from "../types/episode.js";

function record(episode: number, keys: string[], isOptEpisode = true): EpisodeRecord {
  return {
    episode,
    isOptEpisode,
    feed: [],
    feedOut: keys.map((key, pos) => ({ key, reward: 0, pos })),
    itemsAdded: [],
  };
}

const base: MonitorConfig = { startAt: 0, restartOnStagnation: false };

/** Feed records one at a time, evaluating after each, and collect the signals. */
function run(config: MonitorConfig, orders: string[][], isOpt?: boolean[]) {
  const state = createMonitorState();
  const records: EpisodeRecord[] = [];
  const signals = orders.map((keys, episode) => {
    records.push(record(episode, keys, isOpt?.[episode] ?? true));
    return monitor.evaluate(state, records, config);
  });
  return { state, signals };
}

describe("monitor: episode ceiling", () => {
  it("stops once the experiment has produced episodeCeiling episodes", () => {
    const { signals, state } = run({ ...base, episodeCeiling: 3 }, [["a"], ["b"], ["c"]]);
    expect(signals).toEqual(["continue", "continue", "stop"]);
    expect(state.reason).toBe("episode_ceiling");
  });

  it("stays stopped on later evaluations", () => {
    const state = createMonitorState();
    const records = [record(0, ["a"])];
    expect(monitor.evaluate(state, records, { ...base, episodeCeiling: 1 })).toBe("stop");
    expect(monitor.evaluate(state, [], base)).toBe("stop");
  });

  it("continues without records", () => {
    expect(monitor.evaluate(createMonitorState(), [], { ...base, episodeCeiling: 1 })).toBe("continue");
  });
});

describe("monitor: stagnation", () => {
  it("declares stagnation on exactly the patience-th repeat", () => {
    const { signals, state } = run({ ...base, patience: 2 }, [["a", "b"], ["a", "b"], ["a", "b"]]);
    expect(signals).toEqual(["continue", "continue", "stop"]);
    expect(state.stagnant).toBe(true);
    expect(state.reason).toBe("stagnation");
    expect(state.stagnationCount).toBe(2);
  });

  it("restarts instead of stopping when configured", () => {
    const { signals, state } = run(
      { ...base, patience: 1, restartOnStagnation: true },
      [["a"], ["a"]],
    );
    expect(signals).toEqual(["continue", "restart"]);
    expect(state.restart).toBe(true);
    expect(state.stop).toBe(false);
  });

  it("resets the count when the ordering changes", () => {
    const { signals, state } = run(
      { ...base, patience: 2 },
      [["a", "b"], ["a", "b"], ["b", "a"], ["b", "a"]],
    );
    expect(signals).toEqual(["continue", "continue", "continue", "continue"]);
    expect(state.stagnationCount).toBe(1);
    expect(state.lastKeyOrder).toEqual(["b", "a"]);
  });

  it("ignores non-optimization episodes", () => {
    const { signals, state } = run(
      { ...base, patience: 1 },
      [["a"], ["a"], ["a"]],
      [true, false, true],
    );
    expect(signals).toEqual(["continue", "continue", "stop"]);
    expect(state.stagnationCount).toBe(1);
  });

  it("does not count repeats before startAt", () => {
    const { signals } = run(
      { ...base, patience: 1, startAt: 2 },
      [["a"], ["a"], ["a"]],
    );
    expect(signals).toEqual(["continue", "continue", "stop"]);
  });

  it("does nothing without patience", () => {
    const { signals, state } = run(base, [["a"], ["a"], ["a"]]);
    expect(signals).toEqual(["continue", "continue", "continue"]);
    expect(state.lastKeyOrder).toBeNull();
  });

  it("does not treat a first empty ordering as a repeat", () => {
    const { signals } = run({ ...base, patience: 1 }, [[], ["a"]]);
    expect(signals).toEqual(["continue", "continue"]);
  });

  it("lets the ceiling win over a stagnation restart", () => {
    const { signals, state } = run(
      { ...base, patience: 1, restartOnStagnation: true, episodeCeiling: 2 },
      [["a"], ["a"]],
    );
    expect(signals).toEqual(["continue", "stop"]);
    expect(state.restart).toBe(false);
    expect(state.reason).toBe("episode_ceiling");
  });
});

describe("monitor.reset", () => {
  it("clears every field", () => {
    const { state } = run({ ...base, patience: 1 }, [["a"], ["a"]]);
    monitor.reset(state);
    expect(state).toEqual(createMonitorState());
  });
});
