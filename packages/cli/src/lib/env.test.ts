import { describe, it, expect } from "vitest";
import { loadEnv } from "./env.js";

describe("loadEnv", () => {
  it("defaults LOG_LEVEL to info", () => {
    expect(loadEnv({})).toEqual({ LOG_LEVEL: "info" });
  });

  it("reads the checkpoint directory override", () => {
    expect(loadEnv({ LOG_LEVEL: "debug", FEEDRANK_CHECKPOINT_DIR: "/data/ckpt" })).toEqual({
      LOG_LEVEL: "debug",
      FEEDRANK_CHECKPOINT_DIR: "/data/ckpt",
    });
  });

  it("rejects an unknown log level", () => {
    expect(() => loadEnv({ LOG_LEVEL: "loud" })).toThrow();
  });
});
