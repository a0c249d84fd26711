import fs from "node:fs";
import { FeedShapeError, parseFeed, type FeedItem } from "@feedrank/core";
import { safeJsonParse } from "@feedrank/kit";

/**
 * Read an NDJSON feedback log: one feed (a JSON array of `{ key, reward }`) per
 * line. Blank lines are skipped. Every line is validated before any is replayed;
 * problems are reported with their 1-based line number.
 */
export function readFeeds(filePath: string): FeedItem[][] {
  const lines = fs.readFileSync(filePath, "utf8").split("\n");
  const feeds: FeedItem[][] = [];
  const issues: string[] = [];

  lines.forEach((line, index) => {
    if (!line.trim()) return;
    const lineNo = index + 1;
    try {
      feeds.push(parseFeed(safeJsonParse(line)));
    } catch (err) {
      if (err instanceof FeedShapeError) {
        issues.push(...err.issues.map((issue) => `line ${lineNo}: ${issue}`));
      } else if (err instanceof SyntaxError) {
        issues.push(`line ${lineNo}: ${err.message}`);
      } else {
        throw err;
      }
    }
  });

  if (issues.length > 0) {
    throw new FeedShapeError(issues);
  }
  return feeds;
}
