import fs from "node:fs";
import path from "node:path";
import pino from "pino";
import type { EngineStatus } from "@feedrank/core";

export interface ReplayEvent {
  run_id: string;
  step: number;
  experiment: number;
  /** Episode the step recorded; null when the engine was stopped and recorded nothing. */
  episode: number | null;
  status: EngineStatus;
  items_added: string[];
  feed_out: string[];
}

export interface EventLog {
  readonly filePath: string;
  emit(event: ReplayEvent): void;
  close(): void;
}

/**
 * Open the NDJSON events file of a replay, creating its directory. Lines are
 * appended synchronously, one per event, each stamped with `ts`.
 */
export function openEventLog(filePath: string): EventLog {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const destination = pino.destination({ dest: filePath, sync: true, append: true });
  const sink = pino(
    {
      base: undefined,
      formatters: { level: () => ({}) },
      timestamp: () => `,"ts":"${new Date().toISOString()}"`,
    },
    destination,
  );
  return {
    filePath,
    emit(event) {
      sink.info(event);
    },
    close() {
      destination.end();
    },
  };
}
