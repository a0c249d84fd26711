import { describe, it, expect, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import pino from "pino";
import { hasCheckpoint, loadEngine, type FeedItem } from "@feedrank/core";
import { ReplayConfigSchema, type ReplayConfig } from "../lib/config.js";
import { replay } from "./replay.js";

let tmpDir: string;

afterEach(() => {
  if (tmpDir && fs.existsSync(tmpDir)) {
    fs.rmSync(tmpDir, { recursive: true });
  }
});

const logger = pino({ level: "silent" });

const feedAB: FeedItem[] = [
  { key: "a", reward: 1 },
  { key: "b", reward: 2 },
];

function makeConfig(engine: Record<string, unknown> = {}): ReplayConfig {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "feedrank-replay-"));
  return ReplayConfigSchema.parse({
    engine,
    checkpointDir: path.join(tmpDir, "ckpt"),
    eventsFile: path.join(tmpDir, "events.ndjson"),
    checkpointEvery: 2,
  });
}

function readEvents(config: ReplayConfig): Record<string, unknown>[] {
  return fs
    .readFileSync(config.eventsFile, "utf8")
    .trim()
    .split("\n")
    .map((line) => JSON.parse(line) as Record<string, unknown>);
}

describe("replay", () => {
  it("steps every feed and summarizes the run", () => {
    const config = makeConfig({ episodeCeiling: 2 });
    const summary = replay({ config, feeds: [feedAB, feedAB, feedAB], logger, runId: "run-1" });

    expect(summary).toEqual({
      runId: "run-1",
      steps: 3,
      experiments: 1,
      restarts: 0,
      status: "stopped",
      stopReason: "episode_ceiling",
      finalOrdering: ["b", "a"],
    });
  });

  it("writes one event per step", () => {
    const config = makeConfig({ episodeCeiling: 2 });
    replay({ config, feeds: [feedAB, feedAB, feedAB], logger, runId: "run-1" });

    const events = readEvents(config);
    expect(events).toHaveLength(3);
    expect(events[0]).toMatchObject({
      run_id: "run-1",
      step: 1,
      experiment: 0,
      episode: 0,
      status: "running",
      items_added: [],
      feed_out: ["b", "a"],
    });
    expect(events[1]).toMatchObject({ step: 2, episode: 1, status: "running" });
    expect(events[2]).toMatchObject({ step: 3, episode: null, status: "stopped", feed_out: ["b", "a"] });
  });

  it("records injected trial items in events", () => {
    const config = makeConfig({ population: ["a", "b", "c"], nTry: 1 });
    replay({ config, feeds: [feedAB], logger, runId: "run-2" });

    const [event] = readEvents(config);
    expect(event.items_added).toEqual(["c"]);
    expect(event.feed_out).toEqual(["b", "a", "c"]);
  });

  it("saves a checkpoint at the end", () => {
    const config = makeConfig();
    replay({ config, feeds: [feedAB], logger });

    expect(hasCheckpoint(config.checkpointDir)).toBe(true);
    expect(loadEngine(config.checkpointDir).episode).toBe(1);
  });

  it("resumes from the checkpoint", () => {
    const config = makeConfig();
    replay({ config, feeds: [feedAB, feedAB], logger, runId: "first" });
    const summary = replay({ config, feeds: [feedAB], logger, runId: "second", resume: true });

    expect(summary.steps).toBe(1);
    expect(loadEngine(config.checkpointDir).episode).toBe(3);
  });

  it("starts fresh without --resume", () => {
    const config = makeConfig();
    replay({ config, feeds: [feedAB, feedAB], logger });
    replay({ config, feeds: [feedAB], logger });

    expect(loadEngine(config.checkpointDir).episode).toBe(1);
  });

  it("starts fresh when resuming without a checkpoint", () => {
    const config = makeConfig();
    replay({ config, feeds: [feedAB], logger, resume: true });
    expect(loadEngine(config.checkpointDir).episode).toBe(1);
  });

  it("writes checkpoints to an overriding directory", () => {
    const config = makeConfig();
    const override = path.join(tmpDir, "other");
    replay({ config, feeds: [feedAB], logger, checkpointDir: override });

    expect(hasCheckpoint(override)).toBe(true);
    expect(hasCheckpoint(config.checkpointDir)).toBe(false);
  });
});
