import { describe, it, expect } from "vitest";
import { parseFeed, reposition } from "./feed.js";
import { FeedShapeError } from "../errors.js";

function issuesOf(input: unknown): string[] {
  try {
    parseFeed(input);
  } catch (err) {
    if (err instanceof FeedShapeError) return err.issues;
    throw err;
  }
  return [];
}

describe("parseFeed", () => {
  it("keeps key, reward and pos and drops unknown fields", () => {
    expect(parseFeed([{ key: "a", reward: 1, pos: 3, extra: true }, { key: "b", reward: -0.5 }])).toEqual([
      { key: "a", reward: 1, pos: 3 },
      { key: "b", reward: -0.5 },
    ]);
  });

  it("accepts an empty feed", () => {
    expect(parseFeed([])).toEqual([]);
  });

  it("names the entry and field of each problem", () => {
    expect(issuesOf([{ key: "a" }, { key: "b", reward: Infinity }])).toEqual([
      "feed[0].reward: Required",
      "feed[1].reward: Number must be finite",
    ]);
  });

  it("rejects empty keys", () => {
    expect(issuesOf([{ key: "", reward: 1 }])).toEqual([
      "feed[0].key: String must contain at least 1 character(s)",
    ]);
  });

  it("reports each repeated key against its first occurrence", () => {
    expect(
      issuesOf([
        { key: "a", reward: 1 },
        { key: "b", reward: 1 },
        { key: "a", reward: 2 },
        { key: "b", reward: 3 },
      ]),
    ).toEqual([
      'feed[2].key: duplicate key "a" (first at index 0)',
      'feed[3].key: duplicate key "b" (first at index 1)',
    ]);
  });

  it("rejects a value that is not an array", () => {
    expect(issuesOf("a,b")).toEqual(["feed: Expected array, received string"]);
  });

  it("throws FeedShapeError with a prefixed message", () => {
    expect(() => parseFeed([{ reward: 1 }])).toThrow("INVALID_FEED: feed[0].key: Required");
  });
});

describe("reposition", () => {
  it("rewrites pos to each item's index", () => {
    expect(reposition([{ key: "x", pos: 4 }, { key: "y" }])).toEqual([
      { key: "x", pos: 0 },
      { key: "y", pos: 1 },
    ]);
  });
});
