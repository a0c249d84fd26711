import { jsonrepair } from "jsonrepair";
import type { ZodType, ZodTypeDef } from "zod";

/**
 * Parse JSON with optional repair (hand-edited config files) and optional zod validation.
 *
 * @param opts.repair - run jsonrepair before JSON.parse
 * @param opts.schema - validate the parsed value; its output type becomes the return type
 * @throws {SyntaxError} If JSON is invalid and repair is not enabled
 * @throws {ZodError} If schema validation fails
 */
export function safeJsonParse<T>(
  raw: string,
  opts: { repair?: boolean; schema: ZodType<T, ZodTypeDef, unknown> },
): T;
export function safeJsonParse(raw: string, opts?: { repair?: boolean }): unknown;
export function safeJsonParse<T>(
  raw: string,
  opts?: { repair?: boolean; schema?: ZodType<T, ZodTypeDef, unknown> },
): T | unknown {
  const text = opts?.repair ? jsonrepair(raw) : raw;
  const parsed: unknown = JSON.parse(text);
  if (opts?.schema) {
    return opts.schema.parse(parsed);
  }
  return parsed;
}
