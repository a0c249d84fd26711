import dotenv from "dotenv";
import { z } from "zod";
import { parseEnv } from "@feedrank/kit";

const EnvSchema = z.object({
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  FEEDRANK_CHECKPOINT_DIR: z.string().min(1).optional(),
});

export type Env = z.infer<typeof EnvSchema>;

/**
 * Load `.env` from the working directory into process.env, then validate.
 * Variables already set in the environment win over the file.
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  dotenv.config();
  return parseEnv(EnvSchema, source);
}
