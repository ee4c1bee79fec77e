import { describe, it, expect, vi } from "vitest";
import { createLogger, isLogLevel } from "./logger.js";

function fakeSink() {
  return { debug: vi.fn(), log: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe("createLogger", () => {
  it("prefixes messages with the tag", () => {
    const sink = fakeSink();
    createLogger("worker", "info", sink).info("Processing task #3");
    expect(sink.log).toHaveBeenCalledWith("[worker] Processing task #3");
  });

  it("passes extra details through", () => {
    const sink = fakeSink();
    const err = new Error("boom");
    createLogger("store", "info", sink).error("claim failed:", err);
    expect(sink.error).toHaveBeenCalledWith("[store] claim failed:", err);
  });

  it("drops messages below the minimum level", () => {
    const sink = fakeSink();
    const log = createLogger("x", "warn", sink);
    log.debug("d");
    log.info("i");
    log.warn("w");
    expect(sink.debug).not.toHaveBeenCalled();
    expect(sink.log).not.toHaveBeenCalled();
    expect(sink.warn).toHaveBeenCalledWith("[x] w");
  });

  it("silent drops everything", () => {
    const sink = fakeSink();
    createLogger("x", "silent", sink).error("nope");
    expect(sink.error).not.toHaveBeenCalled();
  });

  it("child loggers nest tags and keep the level", () => {
    const sink = fakeSink();
    const child = createLogger("gateway", "info", sink).child("sweeper");
    child.debug("hidden");
    child.info("done");
    expect(sink.debug).not.toHaveBeenCalled();
    expect(sink.log).toHaveBeenCalledWith("[gateway:sweeper] done");
  });
});

describe("isLogLevel", () => {
  it("accepts known levels only", () => {
    expect(isLogLevel("debug")).toBe(true);
    expect(isLogLevel("silent")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
  });
});
