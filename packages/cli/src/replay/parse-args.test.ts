import { describe, it, expect, vi, afterEach } from "vitest";
import { ConfigError } from "@feedrank/core";
import { parseArgs } from "./parse-args.js";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("parseArgs", () => {
  it("parses the replay command", () => {
    const args = parseArgs([
      "node",
      "feedrank",
      "replay",
      "--config",
      "feedrank.config.json",
      "--feeds",
      "feeds.ndjson",
      "--resume",
      "--checkpoint-dir",
      "/tmp/ckpt",
      "--run-id",
      "nightly",
    ]);
    expect(args).toEqual({
      config: "feedrank.config.json",
      feeds: "feeds.ndjson",
      resume: true,
      checkpointDir: "/tmp/ckpt",
      runId: "nightly",
    });
  });

  it("defaults resume to false and keeps numeric run ids as strings", () => {
    const args = parseArgs(["node", "feedrank", "replay", "--config", "c.json", "--feeds", "f.ndjson", "--run-id", "42"]);
    expect(args?.resume).toBe(false);
    expect(args?.runId).toBe("42");
    expect(args?.checkpointDir).toBeUndefined();
  });

  it("requires --config and --feeds", () => {
    expect(() => parseArgs(["node", "feedrank", "replay", "--config", "c.json"])).toThrow(ConfigError);
    expect(() => parseArgs(["node", "feedrank", "replay", "--config", "c.json"])).toThrow("feeds: Required");
  });

  it("shows help when no command is given", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    expect(parseArgs(["node", "feedrank"])).toBeNull();
    expect(log).toHaveBeenCalled();
  });

  it("returns null for --help", () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    expect(parseArgs(["node", "feedrank", "replay", "--help"])).toBeNull();
  });
});
