import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import writeFileAtomic from "write-file-atomic";
import { formatZodErrors, safeJsonParse } from "@feedrank/kit";
import { FeedItemSchema, RankedItemSchema } from "../types/feed.js";
import { EngineConfigSchema } from "../types/config.js";
import type { EpisodeRecord, ExperimentHistory } from "../types/episode.js";
import { CheckpointError } from "../errors.js";
import { FeedRankEngine, type EngineOptions } from "../engine/engine.js";
import type { EngineState } from "../engine/engine-state.js";

export const CHECKPOINT_FILE = "feedrank-checkpoint.json";
const CHECKPOINT_VERSION = 1;

const EpisodeRecordSchema = z.object({
  episode: z.number().int().nonnegative(),
  isOptEpisode: z.boolean(),
  feed: z.array(FeedItemSchema),
  feedOut: z.array(RankedItemSchema),
  itemsAdded: z.array(z.string()),
});

const StopReasonSchema = z.enum(["episode_ceiling", "stagnation"]);

export const CheckpointSchema = z.object({
  version: z.literal(CHECKPOINT_VERSION),
  savedAt: z.string(),
  state: z.object({
    config: EngineConfigSchema,
    episode: z.number().int().nonnegative(),
    experimentId: z.number().int().nonnegative(),
    ledger: z.object({
      feeds: z.array(z.array(FeedItemSchema)),
      counter: z.array(z.tuple([z.string(), z.number().int().positive()])),
      observed: z.array(z.string()),
      feed: z.array(FeedItemSchema).nullable(),
      feedOut: z.array(RankedItemSchema).nullable(),
      itemsAdded: z.array(z.string()),
      records: z.array(EpisodeRecordSchema),
    }),
    history: z.record(z.string().regex(/^\d+$/), z.array(EpisodeRecordSchema)),
    monitor: z.object({
      stop: z.boolean(),
      restart: z.boolean(),
      stagnant: z.boolean(),
      stagnationCount: z.number().int().nonnegative(),
      lastKeyOrder: z.array(z.string()).nullable(),
      reason: StopReasonSchema.nullable(),
    }),
    machine: z.object({
      status: z.enum(["running", "stopped"]),
      restarts: z.number().int().nonnegative(),
      resets: z.number().int().nonnegative(),
      stopReason: StopReasonSchema.nullable(),
    }),
    randomState: z
      .number()
      .int()
      .gte(-(2 ** 31))
      .lte(2 ** 31 - 1),
  }),
});

type Checkpoint = z.output<typeof CheckpointSchema>;

type RecordJson = z.output<typeof EpisodeRecordSchema>;

function recordToJson(record: EpisodeRecord): RecordJson {
  return {
    ...record,
    feed: [...record.feed],
    feedOut: [...record.feedOut],
    itemsAdded: [...record.itemsAdded],
  };
}

function toCheckpoint(state: EngineState): Checkpoint {
  return {
    version: CHECKPOINT_VERSION,
    savedAt: new Date().toISOString(),
    state: {
      ...state,
      ledger: {
        ...state.ledger,
        counter: [...state.ledger.counter],
        observed: [...state.ledger.observed],
        records: state.ledger.records.map(recordToJson),
      },
      history: Object.fromEntries(
        Object.entries(state.history).map(([id, records]) => [id, records.map(recordToJson)]),
      ),
    },
  };
}

function fromCheckpoint(checkpoint: Checkpoint): EngineState {
  const { state } = checkpoint;
  const history: ExperimentHistory = {};
  for (const [id, records] of Object.entries(state.history)) {
    history[Number(id)] = records;
  }
  return {
    ...state,
    ledger: {
      ...state.ledger,
      counter: new Map(state.ledger.counter),
      observed: new Set(state.ledger.observed),
    },
    history,
  };
}

/**
 * Write the engine's complete state to `<dir>/feedrank-checkpoint.json`, atomically.
 * Creates `dir` if needed. Returns the file path. I/O errors propagate.
 */
export function saveEngine(engine: FeedRankEngine, dir: string): string {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
  const filePath = path.join(dir, CHECKPOINT_FILE);
  writeFileAtomic.sync(filePath, JSON.stringify(toCheckpoint(engine.toState()), null, 2), "utf8");
  return filePath;
}

/** True when `dir` holds a checkpoint file. */
export function hasCheckpoint(dir: string): boolean {
  return fs.existsSync(path.join(dir, CHECKPOINT_FILE));
}

/**
 * Rebuild an engine from a checkpoint written by saveEngine().
 * Custom selectors are not serialized; pass them again in `options.selectors`.
 *
 * @throws {CheckpointError} If the file is JSON but not a checkpoint
 * @throws {SyntaxError} If the file is not JSON
 */
export function loadEngine(dir: string, options: EngineOptions = {}): FeedRankEngine {
  const filePath = path.join(dir, CHECKPOINT_FILE);
  const raw = safeJsonParse(fs.readFileSync(filePath, "utf8"));
  const result = CheckpointSchema.safeParse(raw);
  if (!result.success) {
    throw new CheckpointError(filePath, formatZodErrors(result.error));
  }
  return FeedRankEngine.fromState(fromCheckpoint(result.data), options);
}
