import { describe, it, expect, beforeAll, afterAll, beforeEach, vi } from "vitest";
import {
  ARTICLE_SCHEMA,
  arraySource,
  asyncSource,
  createManualClock,
  generatedSource,
  type ManualClock,
} from "@searchmap/testkit";
import { attr, defineIndexer } from "./definition.js";
import { BackendWriteError, FieldResolutionError, ReindexStateError } from "./errors.js";
import { BatchIndexer } from "./indexer.js";
import { MemorySearchBackend } from "./memory/backend.js";
import { logger } from "./observability/logs.js";
import { metrics } from "./observability/metrics.js";
import { createReindexer, ReconcilingReindexer } from "./reindexer.js";
import type { Filter, IndexDocument, RecordSource } from "./types.js";

interface Article {
  id: string;
  title: string | null;
}

const articles = defineIndexer<Article>({
  name: "articles",
  config: { type: "article" },
  fields: {
    id: attr("id"),
    title: attr("title"),
  },
});

const START = "2024-06-01T00:00:00.000Z";
const EARLIER = "2024-05-01T00:00:00.000Z";

function makeArticle(index: number): Article {
  return { id: `a-${index}`, title: `Article ${index}` };
}

function seeded(id: string, type: string, timestamp: string): IndexDocument {
  return { id, title: `Seeded ${id}`, meta_type_s: type, meta_index_timestamp_dt: timestamp };
}

function ids(backend: MemorySearchBackend): string[] {
  return backend
    .all()
    .map((doc) => String(doc.id))
    .sort();
}

describe("ReconcilingReindexer", () => {
  let backend: MemorySearchBackend;
  let clock: ManualClock;

  function createFor(
    source: RecordSource<Article>,
    options: { onRecordError?: () => "skip" | "abort" } = {}
  ): ReconcilingReindexer<Article, Filter> {
    const indexer = new BatchIndexer(articles, backend, { clock: clock.now });
    return new ReconcilingReindexer(indexer, source, options);
  }

  beforeAll(() => {
    logger.setEnabled(false);
  });

  afterAll(() => {
    logger.setEnabled(true);
  });

  beforeEach(() => {
    metrics.reset();
    backend = new MemorySearchBackend(ARTICLE_SCHEMA);
    clock = createManualClock(START);
  });

  it("should open its first run at construction", () => {
    const reindexer = createFor(arraySource([]));

    expect(reindexer.state).toBe("idle");
    expect(reindexer.pendingRun).toEqual({ startedAt: new Date(START), typeTag: "article" });
    expect(Object.isFrozen(reindexer.pendingRun)).toBe(true);
  });

  it("should stream in chunks, commit once and delete stale documents once", async () => {
    const add = vi.spyOn(backend, "add");
    const commit = vi.spyOn(backend, "commit");
    const remove = vi.spyOn(backend, "delete");
    const reindexer = createFor(generatedSource(2500, makeArticle));

    const indexed = await reindexer.reindex();

    expect(indexed).toBe(2500);
    expect(add.mock.calls.map(([documents]) => documents.length)).toEqual([1000, 1000, 500]);
    expect(commit).toHaveBeenCalledTimes(1);
    expect(remove).toHaveBeenCalledTimes(1);
    expect(remove).toHaveBeenCalledWith({
      query: {
        $and: [{ meta_type_s: { $eq: "article" } }, { meta_index_timestamp_dt: { $lt: START } }],
      },
    });
    expect(backend.count()).toBe(2500);
    expect(reindexer.state).toBe("done");
  });

  it("should keep a summary of the last run", async () => {
    const reindexer = createFor(arraySource([makeArticle(1), makeArticle(2)]));

    await reindexer.reindex();

    expect(reindexer.lastSummary).toMatchObject({
      indexed: 2,
      skipped: 0,
      chunks: 1,
      typeTag: "article",
      startedAt: new Date(START),
    });
    expect(reindexer.pendingRun).toBeNull();
    expect(metrics.getMetrics("article")?.reindexTimeMs).toHaveLength(1);
  });

  it("should remove only stale documents of its own type", async () => {
    backend.load([
      seeded("stale-1", "article", EARLIER),
      seeded("page-1", "page", EARLIER),
      seeded("a-0", "article", EARLIER),
      seeded("fresh-1", "article", START),
    ]);
    const reindexer = createFor(arraySource([makeArticle(0), makeArticle(1)]));

    await reindexer.reindex();

    expect(ids(backend)).toEqual(["a-0", "a-1", "fresh-1", "page-1"]);
    expect(backend.get("a-0")).toEqual({
      id: "a-0",
      title: "Article 0",
      meta_type_s: "article",
      meta_index_timestamp_dt: START,
    });
  });

  it("should be idempotent across runs and sweep records that left the source", async () => {
    const records = [makeArticle(0), makeArticle(1), makeArticle(2)];
    const reindexer = createFor(arraySource(records));

    await reindexer.reindex();
    await reindexer.reindex();
    expect(ids(backend)).toEqual(["a-0", "a-1", "a-2"]);

    records.pop();
    clock.advance(60_000);
    await reindexer.reindex();

    expect(ids(backend)).toEqual(["a-0", "a-1"]);
    expect(backend.get("a-0")?.meta_index_timestamp_dt).toBe("2024-06-01T00:01:00.000Z");
    expect(reindexer.lastSummary?.startedAt).toEqual(new Date("2024-06-01T00:01:00.000Z"));
  });

  it("should keep documents stamped during a run when the clock moves", async () => {
    clock = createManualClock(START, 1000);
    const reindexer = createFor(arraySource([makeArticle(0), makeArticle(1)]));

    await reindexer.reindex();

    expect(backend.get("a-0")?.meta_index_timestamp_dt).toBe("2024-06-01T00:00:01.000Z");
    expect(backend.get("a-1")?.meta_index_timestamp_dt).toBe("2024-06-01T00:00:02.000Z");
    expect(backend.count()).toBe(2);
  });

  it("should fail without committing when a required field is missing", async () => {
    const commit = vi.spyOn(backend, "commit");
    const remove = vi.spyOn(backend, "delete");
    const reindexer = createFor(arraySource([makeArticle(0), { id: "a-1", title: null }]));

    await expect(reindexer.reindex()).rejects.toBeInstanceOf(FieldResolutionError);

    expect(reindexer.state).toBe("failed");
    expect(commit).not.toHaveBeenCalled();
    expect(remove).not.toHaveBeenCalled();
  });

  it("should sweep the previous document of a skipped record", async () => {
    backend.load([seeded("bad", "article", EARLIER)]);
    const reindexer = createFor(arraySource([makeArticle(0), { id: "bad", title: null }]), {
      onRecordError: () => "skip",
    });

    const indexed = await reindexer.reindex();

    expect(indexed).toBe(1);
    expect(reindexer.lastSummary?.skipped).toBe(1);
    expect(ids(backend)).toEqual(["a-0"]);
  });

  it("should stop in failed on a commit failure and recover on the next run", async () => {
    backend.load([seeded("stale-1", "article", EARLIER)]);
    vi.spyOn(backend, "commit").mockRejectedValueOnce(new Error("timeout"));
    const remove = vi.spyOn(backend, "delete");
    const reindexer = createFor(arraySource([makeArticle(0)]));

    await expect(reindexer.reindex()).rejects.toThrow("Backend commit failed: timeout");
    expect(reindexer.state).toBe("failed");
    expect(remove).not.toHaveBeenCalled();
    expect(ids(backend)).toEqual(["stale-1"]);

    await reindexer.reindex();
    expect(reindexer.state).toBe("done");
    expect(ids(backend)).toEqual(["a-0"]);
  });

  it("should fail on a delete failure after committing", async () => {
    vi.spyOn(backend, "delete").mockRejectedValueOnce(new Error("read only"));
    const reindexer = createFor(arraySource([makeArticle(0)]));

    await expect(reindexer.reindex()).rejects.toBeInstanceOf(BackendWriteError);

    expect(reindexer.state).toBe("failed");
    expect(backend.count()).toBe(1);
  });

  it("should reject a reindex while one is running", async () => {
    const reindexer = createFor(asyncSource([makeArticle(0)]));

    const running = reindexer.reindex();
    const second = reindexer.reindex();
    await expect(second).rejects.toBeInstanceOf(ReindexStateError);
    await expect(second).rejects.toMatchObject({
      code: "E_REINDEX_STATE",
      typeTag: "article",
      message: 'Reindex of "article" is already running',
    });
    await expect(running).resolves.toBe(1);
  });

  it("should sweep by time when stored timestamps carry offsets", async () => {
    backend.load([
      seeded("fresh", "article", "2024-06-01T09:00:00-05:00"),
      seeded("stale", "article", "2024-06-01T10:00:00+05:00"),
    ]);
    clock = createManualClock("2024-06-01T10:00:00.000Z");
    const reindexer = createFor(arraySource([]));

    await reindexer.reindex();

    expect(ids(backend)).toEqual(["fresh"]);
  });

  it("should delete every document of its type for an empty source", async () => {
    backend.load([seeded("stale-1", "article", EARLIER), seeded("page-1", "page", EARLIER)]);
    const add = vi.spyOn(backend, "add");
    const reindexer = createFor(arraySource([]));

    const indexed = await reindexer.reindex();

    expect(indexed).toBe(0);
    expect(add).not.toHaveBeenCalled();
    expect(ids(backend)).toEqual(["page-1"]);
  });

  it("should drain async sources", async () => {
    const reindexer = createFor(asyncSource([makeArticle(0), makeArticle(1), makeArticle(2)]));

    await expect(reindexer.reindex()).resolves.toBe(3);
    expect(backend.count()).toBe(3);
  });

  it("should build the indexer and reindexer together", async () => {
    const add = vi.spyOn(backend, "add");
    const reindexer = createReindexer(articles, backend, arraySource([0, 1, 2, 3, 4].map(makeArticle)), {
      commitChunkSize: 2,
      clock: clock.now,
    });

    await reindexer.reindex();

    expect(add.mock.calls.map(([documents]) => documents.length)).toEqual([2, 2, 1]);
    expect(reindexer.indexer.options.commitChunkSize).toBe(2);
  });
});
