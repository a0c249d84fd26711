import type { z } from "zod";

/**
 * Validate environment variables against a zod schema.
 * Defaults to `process.env`; pass a record to parse something else (tests, child envs).
 */
export function parseEnv<T extends z.ZodTypeAny>(
  schema: T,
  source: NodeJS.ProcessEnv = process.env,
): z.output<T> {
  return schema.parse(source);
}
