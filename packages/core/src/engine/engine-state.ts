import type { EngineConfig } from "../types/config.js";
import type { EpisodeRecord, ExperimentHistory } from "../types/episode.js";
import type { TrackerState } from "../ledger/tracker.js";
import { createLedgerState } from "../ledger/ledger.js";
import { createMonitorState, type MonitorState, type StopReason } from "../convergence/monitor.js";
import type { EngineStatus } from "./engine-machine.js";

export interface MachineState {
  status: EngineStatus;
  restarts: number;
  resets: number;
  stopReason: StopReason | null;
}

/**
 * Everything one engine owns. Ledger, tracker and monitor are services over
 * this struct; a checkpoint is this struct serialized.
 */
export interface EngineState extends TrackerState {
  config: EngineConfig;
  monitor: MonitorState;
  machine: MachineState;
  randomState: number;
}

export function createEngineState(config: EngineConfig): EngineState {
  return {
    config,
    episode: 0,
    experimentId: 0,
    ledger: createLedgerState(),
    history: {},
    monitor: createMonitorState(),
    machine: { status: "running", restarts: 0, resets: 0, stopReason: null },
    randomState: config.seed,
  };
}

function freezeRecord(record: EpisodeRecord): EpisodeRecord {
  return Object.freeze({
    ...record,
    feed: Object.freeze(record.feed.map((item) => Object.freeze({ ...item }))),
    feedOut: Object.freeze(record.feedOut.map((item) => Object.freeze({ ...item }))),
    itemsAdded: Object.freeze([...record.itemsAdded]),
  });
}

/** Re-freeze episode records after a copy (structuredClone drops the freeze). */
export function freezeRecords(state: EngineState): EngineState {
  const history: ExperimentHistory = {};
  for (const [id, records] of Object.entries(state.history)) {
    history[Number(id)] = records.map(freezeRecord);
  }
  return {
    ...state,
    history,
    ledger: { ...state.ledger, records: state.ledger.records.map(freezeRecord) },
  };
}
