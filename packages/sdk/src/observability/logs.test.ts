import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { formatLogEntry, logger } from "./logs.js";

const TIMESTAMP = "2024-06-01T00:00:00.000Z";

describe("formatLogEntry", () => {
  it("should print the indexing context as key=value pairs", () => {
    const line = formatLogEntry({
      timestamp: TIMESTAMP,
      level: "info",
      event: "reindex.done",
      type: "article",
      documents: 2500,
      skipped: 1,
      chunks: 3,
      durationMs: 41.6,
    });

    expect(line).toBe(
      "[2024-06-01T00:00:00.000Z] [INFO] [reindex.done] type=article documents=2500 skipped=1 chunks=3 duration=42ms"
    );
  });

  it("should print the run start and trailing message", () => {
    const line = formatLogEntry({
      timestamp: TIMESTAMP,
      level: "debug",
      event: "reindex.start",
      type: "article",
      indexer: "articles",
      chunkSize: 1000,
      startedAt: new Date("2024-05-31T23:59:00.000Z"),
      message: "first pass",
    });

    expect(line).toBe(
      "[2024-06-01T00:00:00.000Z] [DEBUG] [reindex.start] type=article indexer=articles chunkSize=1000 " +
        "startedAt=2024-05-31T23:59:00.000Z first pass"
    );
  });

  it("should keep zero counts", () => {
    const line = formatLogEntry({ timestamp: TIMESTAMP, level: "warn", event: "indexer.delete", documents: 0 });

    expect(line).toBe("[2024-06-01T00:00:00.000Z] [WARN] [indexer.delete] documents=0");
  });
});

describe("logger", () => {
  let originalDebug: string | undefined;

  beforeEach(() => {
    originalDebug = process.env.SEARCHMAP_DEBUG;
  });

  afterEach(() => {
    if (originalDebug !== undefined) {
      process.env.SEARCHMAP_DEBUG = originalDebug;
    } else {
      delete process.env.SEARCHMAP_DEBUG;
    }
    logger.setEnabled(true);
    vi.restoreAllMocks();
  });

  it("should print debug lines only with SEARCHMAP_DEBUG", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);

    delete process.env.SEARCHMAP_DEBUG;
    logger.debug("indexer.commit", { type: "article" });
    expect(debug).not.toHaveBeenCalled();

    process.env.SEARCHMAP_DEBUG = "1";
    logger.debug("indexer.commit", { type: "article" });
    expect(debug).toHaveBeenCalledTimes(1);
    expect(String(debug.mock.calls[0]?.[0])).toMatch(/\[DEBUG\] \[indexer\.commit\] type=article$/);
  });

  it("should route levels to the matching console method", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);

    logger.info("reindex.start", { type: "article" });
    logger.error("reindex.failed", { type: "article", message: "Backend commit failed: timeout" });

    expect(log).toHaveBeenCalledTimes(1);
    expect(String(error.mock.calls[0]?.[0])).toMatch(
      /\[ERROR\] \[reindex\.failed\] type=article Backend commit failed: timeout$/
    );
  });

  it("should print nothing when disabled", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);

    logger.setEnabled(false);
    logger.info("reindex.start", { type: "article" });

    expect(log).not.toHaveBeenCalled();
  });
});
