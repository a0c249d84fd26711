import type { z } from "zod";

/**
 * Render a zod path the way it reads in code: `feed[2].reward`, `scorer.normalization`.
 * The optional root names the value that was parsed.
 */
export function formatZodPath(path: (string | number)[], root?: string): string {
  let out = root ?? "";
  for (const segment of path) {
    if (typeof segment === "number") {
      out += `[${segment}]`;
    } else {
      out += out ? `.${segment}` : segment;
    }
  }
  return out;
}

export function formatZodErrors(error: z.ZodError, root?: string): string[] {
  return error.issues.map((i) => {
    const where = formatZodPath(i.path, root);
    return where ? `${where}: ${i.message}` : i.message;
  });
}
