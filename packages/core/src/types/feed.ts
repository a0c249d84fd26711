import { z } from "zod";
import { formatZodErrors } from "@feedrank/kit";
import { FeedShapeError } from "../errors.js";

export interface FeedItem {
  key: string;
  reward: number;
  pos?: number; // advisory, recomputed on reorder
}

export interface ScoredItem {
  key: string;
  reward: number;
  pos: number;
  score: number;
}

/** An entry of an output ordering. Trial items are injected without a score. */
export interface RankedItem {
  key: string;
  reward: number;
  pos: number;
  score?: number;
}

export const FeedItemSchema = z.object({
  key: z.string().min(1),
  reward: z.number().finite(),
  pos: z.number().int().nonnegative().optional(),
});

export const FeedSchema = z.array(FeedItemSchema).superRefine((items, ctx) => {
  const seen = new Map<string, number>();
  items.forEach((item, index) => {
    const first = seen.get(item.key);
    if (first !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [index, "key"],
        message: `duplicate key "${item.key}" (first at index ${first})`,
      });
    } else {
      seen.set(item.key, index);
    }
  });
});

export const RankedItemSchema = z.object({
  key: z.string().min(1),
  reward: z.number().finite(),
  pos: z.number().int().nonnegative(),
  score: z.number().optional(),
});

/**
 * Validate one submitted feed. Entries keep only the known fields.
 * Throws FeedShapeError naming every offending entry.
 */
export function parseFeed(input: unknown): FeedItem[] {
  const result = FeedSchema.safeParse(input);
  if (!result.success) {
    throw new FeedShapeError(formatZodErrors(result.error, "feed"));
  }
  return result.data;
}

/** Rewrite `pos` to match each item's index. */
export function reposition<T extends { pos?: number }>(items: readonly T[]): (T & { pos: number })[] {
  return items.map((item, index) => ({ ...item, pos: index }));
}
