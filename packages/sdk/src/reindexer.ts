/**
 * Reconciling reindexer
 *
 * Runs a full pass over a record source and then removes documents of the
 * same type tag that the pass did not refresh:
 *
 *   started -> streaming <-> flushing -> committed -> reconciled -> done
 *
 * Every document written during a run carries an index timestamp taken when
 * it was transformed, never earlier than the run's start. After the single
 * commit, one delete-by-query removes documents with this type tag and a
 * timestamp older than the start.
 *
 * Runs for the same type tag must not overlap; nothing here enforces that
 * across processes.
 */

import { META_TIMESTAMP_FIELD, META_TYPE_FIELD, type IndexerDefinition } from "./definition.js";
import { ReindexStateError } from "./errors.js";
import { BatchIndexer } from "./indexer.js";
import { logger } from "./observability/logs.js";
import { metrics } from "./observability/metrics.js";
import type {
  IndexRun,
  IndexerOptions,
  RecordErrorHandler,
  RecordSource,
  ReindexState,
  ReindexSummary,
  SearchBackend,
} from "./types.js";

export interface ReindexOptions<R> {
  /**
   * Consulted when a record fails to transform. Without a handler the
   * failure aborts the run. Skipped records are swept by reconciliation.
   */
  onRecordError?: RecordErrorHandler<R>;
}

const TRANSITIONS: Record<ReindexState, readonly ReindexState[]> = {
  idle: ["started"],
  started: ["streaming", "failed"],
  streaming: ["flushing", "committed", "failed"],
  flushing: ["streaming", "failed"],
  committed: ["reconciled", "failed"],
  reconciled: ["done", "failed"],
  done: ["started"],
  failed: ["started"],
};

export class ReconcilingReindexer<R, Q = unknown> {
  readonly indexer: BatchIndexer<R, Q>;
  readonly source: RecordSource<R>;
  #onRecordError: RecordErrorHandler<R> | undefined;
  #run: IndexRun | null;
  #state: ReindexState = "idle";
  #lastSummary: ReindexSummary | null = null;

  constructor(indexer: BatchIndexer<R, Q>, source: RecordSource<R>, options: ReindexOptions<R> = {}) {
    this.indexer = indexer;
    this.source = source;
    this.#onRecordError = options.onRecordError;
    this.#run = this.#openRun();
  }

  get state(): ReindexState {
    return this.#state;
  }

  /**
   * Run opened at construction, adopted by the first reindex() as its
   * watermark. Null once that run has started; later reindex() calls open
   * their own run when they begin.
   */
  get pendingRun(): IndexRun | null {
    return this.#run;
  }

  get lastSummary(): ReindexSummary | null {
    return this.#lastSummary;
  }

  /**
   * Query selecting documents of this type tag not refreshed since the run began
   */
  staleQuery(run: IndexRun): Q {
    const backend = this.indexer.backend;
    return backend.and(
      backend.buildQuery({ [META_TYPE_FIELD]: { $eq: run.typeTag } }),
      backend.buildQuery({ [META_TIMESTAMP_FIELD]: { $lt: run.startedAt } })
    );
  }

  /**
   * Index every record from the source, commit once, then delete stale
   * documents of this type tag
   *
   * @returns Number of records transformed and added
   * @throws FieldResolutionError when a required field fails and no handler skips it
   * @throws BackendWriteError on any backend failure; the run stops in "failed"
   */
  async reindex(): Promise<number> {
    if (!["idle", "done", "failed"].includes(this.#state)) {
      throw new ReindexStateError(
        this.indexer.typeTag,
        `Reindex of "${this.indexer.typeTag}" is already running`
      );
    }

    // The run opened at construction is used once, then discarded
    const run = this.#run ?? this.#openRun();
    this.#run = null;

    const start = performance.now();
    this.#transition("started");
    logger.info("reindex.start", {
      type: run.typeTag,
      indexer: this.indexer.definition.name,
      startedAt: run.startedAt,
      chunkSize: this.indexer.options.commitChunkSize,
    });

    try {
      this.#transition("streaming");
      const stream = await this.indexer.indexStream(this.source.getRecords(), {
        onRecordError: this.#onRecordError,
        onFlush: (phase) => this.#transition(phase === "start" ? "flushing" : "streaming"),
      });

      await this.indexer.commit();
      this.#transition("committed");

      await this.indexer.deleteByQuery(this.staleQuery(run));
      this.#transition("reconciled");

      const durationMs = performance.now() - start;
      this.#lastSummary = { ...stream, typeTag: run.typeTag, startedAt: run.startedAt, durationMs };
      metrics.recordReindexTime(run.typeTag, durationMs);
      this.#transition("done");

      logger.info("reindex.done", {
        type: run.typeTag,
        documents: stream.indexed,
        skipped: stream.skipped,
        chunks: stream.chunks,
        durationMs,
      });
      return stream.indexed;
    } catch (err) {
      this.#transition("failed");
      logger.error("reindex.failed", {
        type: run.typeTag,
        message: err instanceof Error ? err.message : String(err),
      });
      throw err;
    }
  }

  #openRun(): IndexRun {
    return Object.freeze({
      startedAt: this.indexer.options.clock(),
      typeTag: this.indexer.typeTag,
    });
  }

  #transition(next: ReindexState): void {
    if (!TRANSITIONS[this.#state].includes(next)) {
      throw new ReindexStateError(
        this.indexer.typeTag,
        `Invalid reindex transition: ${this.#state} -> ${next}`
      );
    }
    logger.debug("reindex.state", { type: this.indexer.typeTag, transition: `${this.#state} -> ${next}` });
    this.#state = next;
  }
}

/**
 * Build a batch indexer and a reconciling reindexer over it in one step
 */
export function createReindexer<R, Q>(
  definition: IndexerDefinition<R>,
  backend: SearchBackend<Q>,
  source: RecordSource<R>,
  options: IndexerOptions & ReindexOptions<R> = {}
): ReconcilingReindexer<R, Q> {
  return new ReconcilingReindexer(new BatchIndexer(definition, backend, options), source, {
    onRecordError: options.onRecordError,
  });
}
