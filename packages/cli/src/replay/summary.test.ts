import { describe, it, expect } from "vitest";
import { FeedRankEngine } from "@feedrank/core";
import { formatSummary, summarize } from "./summary.js";

describe("summarize", () => {
  it("reports an untouched engine", () => {
    expect(summarize(new FeedRankEngine(), "r0", 0)).toEqual({
      runId: "r0",
      steps: 0,
      experiments: 0,
      restarts: 0,
      status: "running",
      stopReason: null,
      finalOrdering: [],
    });
  });

  it("counts experiments with episodes and the stop reason", () => {
    const engine = new FeedRankEngine({ episodeCeiling: 1 });
    engine.step([{ key: "a", reward: 1 }, { key: "b", reward: 2 }]);
    engine.step([{ key: "a", reward: 1 }]);

    const summary = summarize(engine, "r1", 2);
    expect(summary.experiments).toBe(1);
    expect(summary.status).toBe("stopped");
    expect(summary.stopReason).toBe("episode_ceiling");
    expect(summary.finalOrdering).toEqual(["b", "a"]);
  });
});

describe("formatSummary", () => {
  it("renders one field per line", () => {
    const text = formatSummary({
      runId: "r1",
      steps: 4,
      experiments: 2,
      restarts: 1,
      status: "stopped",
      stopReason: "stagnation",
      finalOrdering: ["b", "a"],
    });
    expect(text.split("\n")).toEqual([
      "run:         r1",
      "steps:       4",
      "experiments: 2",
      "restarts:    1",
      "status:      stopped (stagnation)",
      "ordering:    b, a",
    ]);
  });

  it("marks an empty ordering", () => {
    const text = formatSummary({
      runId: "r0",
      steps: 0,
      experiments: 0,
      restarts: 0,
      status: "running",
      stopReason: null,
      finalOrdering: [],
    });
    expect(text.split("\n").slice(-2)).toEqual(["status:      running", "ordering:    (none)"]);
  });
});
