import { randomUUID } from "node:crypto";
import type pino from "pino";
import {
  FeedRankEngine,
  hasCheckpoint,
  loadEngine,
  saveEngine,
  type FeedItem,
  type Selector,
} from "@feedrank/core";
import type { ReplayConfig } from "../lib/config.js";
import { openEventLog } from "./events.js";
import { summarize, type ReplaySummary } from "./summary.js";

export interface ReplayOptions {
  config: ReplayConfig;
  feeds: readonly FeedItem[][];
  logger: pino.Logger;
  /** Continue from the checkpoint in `checkpointDir` when one exists. */
  resume?: boolean;
  /** Overrides `config.checkpointDir`. */
  checkpointDir?: string;
  runId?: string;
  selectors?: readonly Selector[];
}

function openEngine(opts: ReplayOptions, checkpointDir: string): FeedRankEngine {
  const engineOptions = {
    selectors: opts.selectors,
    logger: opts.logger.child({ module: "engine" }),
  };
  if (opts.resume && hasCheckpoint(checkpointDir)) {
    const engine = loadEngine(checkpointDir, engineOptions);
    opts.logger.info(
      { checkpointDir, experiment: engine.experimentId, episode: engine.episode },
      "resumed from checkpoint",
    );
    return engine;
  }
  if (opts.resume) {
    opts.logger.warn({ checkpointDir }, "no checkpoint to resume from, starting fresh");
  }
  return new FeedRankEngine(opts.config.engine, engineOptions);
}

/**
 * Replay a feedback log through an engine: one step per feed, one event per
 * step, checkpoints every `checkpointEvery` steps and once at the end.
 */
export function replay(opts: ReplayOptions): ReplaySummary {
  const { config, feeds, logger } = opts;
  const runId = opts.runId ?? randomUUID();
  const checkpointDir = opts.checkpointDir ?? config.checkpointDir;
  const engine = openEngine(opts, checkpointDir);
  const events = openEventLog(config.eventsFile);

  logger.info({ runId, feeds: feeds.length, checkpointDir }, "replay started");

  try {
    feeds.forEach((feed, index) => {
      const feedOut = engine.step(feed);
      const records = engine.experiments[engine.experimentId] ?? [];
      const latest = engine.status === "running" ? records.at(-1) : undefined;

      events.emit({
        run_id: runId,
        step: index + 1,
        experiment: engine.experimentId,
        episode: latest?.episode ?? null,
        status: engine.status,
        items_added: latest ? [...latest.itemsAdded] : [],
        feed_out: feedOut.map((item) => item.key),
      });

      if ((index + 1) % config.checkpointEvery === 0) {
        saveEngine(engine, checkpointDir);
        logger.debug({ step: index + 1 }, "checkpoint saved");
      }
    });
  } finally {
    events.close();
  }

  const filePath = saveEngine(engine, checkpointDir);
  const summary = summarize(engine, runId, feeds.length);
  logger.info({ ...summary, checkpoint: filePath }, "replay finished");
  return summary;
}
