import { cac } from "cac";
import { z } from "zod";
import { ConfigError } from "@feedrank/core";
import { formatZodErrors } from "@feedrank/kit";

// cac turns numeric-looking values into numbers
const text = z.preprocess((value) => (typeof value === "number" ? String(value) : value), z.string().min(1));

const ReplayArgsSchema = z.object({
  config: text,
  feeds: text,
  resume: z.boolean().default(false),
  checkpointDir: text.optional(),
  runId: text.optional(),
});

export type ReplayArgs = z.output<typeof ReplayArgsSchema>;

/**
 * Parse `feedrank replay ...`. Returns null when help was shown instead of a
 * command being given.
 */
export function parseArgs(argv: string[]): ReplayArgs | null {
  const cli = cac("feedrank");
  cli
    .command("replay", "Replay an NDJSON feedback log through a re-ranking engine")
    .option("--config <file>", "Replay config (feedrank.config.json)")
    .option("--feeds <file>", "NDJSON file, one feed per line")
    .option("--resume", "Continue from the checkpoint when one exists")
    .option("--checkpoint-dir <dir>", "Checkpoint directory (overrides config and FEEDRANK_CHECKPOINT_DIR)")
    .option("--run-id <id>", "Run id written to every event");
  cli.help();

  const { options } = cli.parse(argv, { run: false });
  if (options.help) return null;
  if (cli.matchedCommandName !== "replay") {
    cli.outputHelp();
    return null;
  }

  const result = ReplayArgsSchema.safeParse(options);
  if (!result.success) {
    throw new ConfigError(formatZodErrors(result.error));
  }
  return result.data;
}
