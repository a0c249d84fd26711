import type { EngineStatus, FeedRankEngine, StopReason } from "@feedrank/core";

export interface ReplaySummary {
  runId: string;
  steps: number;
  /** Experiments with at least one episode, including the open one. */
  experiments: number;
  restarts: number;
  status: EngineStatus;
  stopReason: StopReason | null;
  finalOrdering: string[];
}

export function summarize(engine: FeedRankEngine, runId: string, steps: number): ReplaySummary {
  const experiments = Object.values(engine.experiments).filter((records) => records.length > 0).length;
  return {
    runId,
    steps,
    experiments,
    restarts: engine.restarts,
    status: engine.status,
    stopReason: engine.monitorState.reason,
    finalOrdering: (engine.output ?? []).map((item) => item.key),
  };
}

export function formatSummary(summary: ReplaySummary): string {
  return [
    `run:         ${summary.runId}`,
    `steps:       ${summary.steps}`,
    `experiments: ${summary.experiments}`,
    `restarts:    ${summary.restarts}`,
    `status:      ${summary.status}${summary.stopReason ? ` (${summary.stopReason})` : ""}`,
    `ordering:    ${summary.finalOrdering.length > 0 ? summary.finalOrdering.join(", ") : "(none)"}`,
  ].join("\n");
}
