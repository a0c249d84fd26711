import { isMainModule } from "@feedrank/kit";
import { loadEnv } from "./lib/env.js";
import { createLogger } from "./lib/logger.js";
import { loadReplayConfig } from "./lib/config.js";
import { parseArgs } from "./replay/parse-args.js";
import { readFeeds } from "./replay/read-feeds.js";
import { replay } from "./replay/replay.js";
import { formatSummary } from "./replay/summary.js";

export function main(argv: string[] = process.argv): number {
  const args = parseArgs(argv);
  if (!args) return 0;

  const env = loadEnv();
  const logger = createLogger(env.LOG_LEVEL);
  const config = loadReplayConfig(args.config);
  const feeds = readFeeds(args.feeds);

  const summary = replay({
    config,
    feeds,
    logger,
    resume: args.resume,
    checkpointDir: args.checkpointDir ?? env.FEEDRANK_CHECKPOINT_DIR,
    runId: args.runId,
  });
  process.stdout.write(`${formatSummary(summary)}\n`);
  return 0;
}

if (isMainModule(import.meta.url)) {
  try {
    process.exitCode = main();
  } catch (err) {
    console.error("feedrank error:", err instanceof Error ? err.message : err);
    process.exitCode = 1;
  }
}
