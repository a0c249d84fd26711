import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { EngineConfigSchema, ConfigError } from "@feedrank/core";
import { formatZodErrors, safeJsonParse } from "@feedrank/kit";

export const ReplayConfigSchema = z
  .object({
    engine: EngineConfigSchema.default({}),
    checkpointDir: z.string().min(1).default("artifacts/checkpoint"),
    eventsFile: z.string().min(1).default("artifacts/events.ndjson"),
    /** Save a checkpoint after every N steps; a final one is always written. */
    checkpointEvery: z.number().int().positive().default(10),
  })
  .strict();

export type ReplayConfig = z.output<typeof ReplayConfigSchema>;

/**
 * Loads and validates feedrank.config.json. The file may be hand-edited, so
 * trailing commas and comments are repaired before parsing. Relative paths
 * resolve against the config file's directory.
 */
export function loadReplayConfig(configPath: string): ReplayConfig {
  const raw = fs.readFileSync(configPath, "utf8");
  const json = safeJsonParse(raw, { repair: true });
  const result = ReplayConfigSchema.safeParse(json);
  if (!result.success) {
    throw new ConfigError(formatZodErrors(result.error));
  }

  const baseDir = path.dirname(path.resolve(configPath));
  return {
    ...result.data,
    checkpointDir: path.resolve(baseDir, result.data.checkpointDir),
    eventsFile: path.resolve(baseDir, result.data.eventsFile),
  };
}
