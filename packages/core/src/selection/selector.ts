import type { RankedItem, ScoredItem } from "../types/feed.js";
import { reposition } from "../types/feed.js";
import { ConfigError } from "../errors.js";

/**
 * Turns the Scorer's ordering into the ordering handed back to the caller.
 * Must be a pure function of its input.
 */
export interface Selector {
  name: string;
  select(scored: readonly ScoredItem[]): RankedItem[];
}

/** Keeps the Scorer's descending-score order. */
export const scoreOrderSelector: Selector = {
  name: "score-order",
  select(scored) {
    return reposition(scored);
  },
};

const BUILTIN: readonly Selector[] = [scoreOrderSelector];

/**
 * Selector lookup by configured name: built-ins plus caller-supplied selectors
 * (a caller selector with a built-in's name replaces it).
 */
export const selectorRegistry = {
  /** Throws ConfigError if the name is not registered. */
  get(name: string, extra: readonly Selector[] = []): Selector {
    const found = [...extra, ...BUILTIN].find((s) => s.name === name);
    if (!found) {
      const available = selectorRegistry.list(extra).join(", ");
      throw new ConfigError([`selector: unknown selector "${name}". Available: ${available}`]);
    }
    return found;
  },

  list(extra: readonly Selector[] = []): string[] {
    return [...new Set([...BUILTIN, ...extra].map((s) => s.name))];
  },
};
