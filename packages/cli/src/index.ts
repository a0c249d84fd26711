export { ReplayConfigSchema, loadReplayConfig } from "./lib/config.js";
export type { ReplayConfig } from "./lib/config.js";
export { loadEnv } from "./lib/env.js";
export type { Env } from "./lib/env.js";
export { createLogger } from "./lib/logger.js";
export { parseArgs } from "./replay/parse-args.js";
export type { ReplayArgs } from "./replay/parse-args.js";
export { readFeeds } from "./replay/read-feeds.js";
export { openEventLog } from "./replay/events.js";
export type { EventLog, ReplayEvent } from "./replay/events.js";
export { replay } from "./replay/replay.js";
export type { ReplayOptions } from "./replay/replay.js";
export { summarize, formatSummary } from "./replay/summary.js";
export type { ReplaySummary } from "./replay/summary.js";
export { main } from "./cli.js";
