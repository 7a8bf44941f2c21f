/**
 * Batch indexer
 *
 * Transforms records and writes them to a search backend: single add,
 * update and delete calls, and chunked streaming of a record source.
 *
 * Invariants:
 * - Field bindings are resolved against the backend schema at construction
 * - A streamed batch never exceeds `commitChunkSize` documents
 * - Streaming never commits; chunk boundaries only bound payload size
 * - Backend failures surface as BackendWriteError and are never retried
 */

import { bindFields } from "./binder.js";
import { resolveIndexerOptions } from "./config.js";
import type { IndexerDefinition } from "./definition.js";
import { toBackendWriteError, type BackendOperation } from "./errors.js";
import { logger } from "./observability/logs.js";
import { metrics } from "./observability/metrics.js";
import { DocumentTransformer } from "./transformer.js";
import type {
  IndexDocument,
  IndexerOptions,
  RecordErrorHandler,
  ResolvedIndexerOptions,
  SearchBackend,
  StreamSummary,
  WriteOptions,
} from "./types.js";

/**
 * Options for streaming a record source
 */
export interface StreamOptions<R> {
  /** Decide whether a record that fails to transform is skipped or aborts the stream */
  onRecordError?: RecordErrorHandler<R>;
  /** Called around every backend add issued by the stream */
  onFlush?: (phase: "start" | "end", size: number) => void;
}

function isRecordList<R>(value: R | readonly R[]): value is readonly R[] {
  return Array.isArray(value);
}

function toList<R>(records: R | readonly R[]): readonly R[] {
  return isRecordList(records) ? records : [records];
}

export class BatchIndexer<R, Q = unknown> {
  readonly definition: IndexerDefinition<R>;
  readonly backend: SearchBackend<Q>;
  readonly options: ResolvedIndexerOptions;
  readonly transformer: DocumentTransformer<R>;

  /**
   * @throws ConfigurationError for invalid options or unresolvable computed fields
   * @throws SchemaBindingError when a field is unknown to the backend schema
   */
  constructor(definition: IndexerDefinition<R>, backend: SearchBackend<Q>, options: IndexerOptions = {}) {
    this.definition = definition;
    this.backend = backend;
    this.options = resolveIndexerOptions(options);

    const bindings = bindFields(definition, backend.schema, {
      validateSchema: this.options.validateSchema,
      clock: this.options.clock,
    });
    this.transformer = new DocumentTransformer(bindings, {
      idField: definition.idField,
      typeTag: definition.typeTag,
    });

    logger.debug("indexer.bound", {
      type: definition.typeTag,
      indexer: definition.name,
      message: bindings.map((binding) => `${binding.name}:${binding.policy}`).join(", "),
    });
  }

  get typeTag(): string {
    return this.definition.typeTag;
  }

  /**
   * Transform one record into a document
   */
  transform(record: R): IndexDocument {
    return this.transformer.transform(record);
  }

  /**
   * Add one record or a list as a single backend write. Documents whose id
   * already exists are overwritten by the backend.
   */
  async add(records: R | readonly R[], options: WriteOptions = {}): Promise<void> {
    const documents = toList(records).map((record) => this.transform(record));

    await this.#write(documents);
    if (options.commit ?? true) {
      await this.commit();
    }
  }

  /**
   * Overwrite documents for the given records and commit
   */
  async update(records: R | readonly R[]): Promise<void> {
    await this.add(records, { commit: true });
  }

  /**
   * Delete the documents of the given records by identifier
   */
  async delete(records: R | readonly R[], options: WriteOptions = {}): Promise<void> {
    const ids = toList(records).map((record) => this.transformer.transformId(record));

    await this.#call("delete", () => this.backend.delete({ ids }));
    metrics.recordDelete(this.typeTag);
    logger.debug("indexer.delete", { type: this.typeTag, documents: ids.length });

    if (options.commit ?? true) {
      await this.commit();
    }
  }

  /**
   * Delete every document matching a backend query
   */
  async deleteByQuery(query: Q): Promise<void> {
    await this.#call("delete", () => this.backend.delete({ query }));
    metrics.recordDelete(this.typeTag);
    logger.debug("indexer.delete", { type: this.typeTag, message: "by query" });
  }

  async commit(): Promise<void> {
    await this.#call("commit", () => this.backend.commit());
    metrics.recordCommit(this.typeTag);
    logger.debug("indexer.commit", { type: this.typeTag });
  }

  /**
   * Drain a lazy record source in order, adding documents in chunks of at
   * most `commitChunkSize`. Does not commit.
   */
  async indexStream(
    source: Iterable<R> | AsyncIterable<R>,
    options: StreamOptions<R> = {}
  ): Promise<StreamSummary> {
    const summary: StreamSummary = { indexed: 0, skipped: 0, chunks: 0 };
    let batch: IndexDocument[] = [];

    const flush = async (): Promise<void> => {
      options.onFlush?.("start", batch.length);
      await this.#write(batch);
      summary.chunks++;
      summary.indexed += batch.length;
      options.onFlush?.("end", batch.length);
      batch = [];
    };

    for await (const record of source) {
      let document: IndexDocument;
      try {
        document = this.transform(record);
      } catch (err) {
        if (err instanceof Error && options.onRecordError?.(err, record) === "skip") {
          summary.skipped++;
          metrics.recordSkip(this.typeTag);
          logger.warn("indexer.record.skipped", { type: this.typeTag, message: err.message });
          continue;
        }
        throw err;
      }

      batch.push(document);
      if (batch.length >= this.options.commitChunkSize) {
        await flush();
      }
    }

    if (batch.length > 0) {
      await flush();
    }

    return summary;
  }

  async #write(documents: IndexDocument[]): Promise<void> {
    const start = performance.now();
    await this.#call("add", () => this.backend.add(documents));
    const duration = performance.now() - start;

    metrics.recordAdd(this.typeTag, documents.length, duration);
    logger.debug("indexer.add", {
      type: this.typeTag,
      documents: documents.length,
      durationMs: duration,
    });
  }

  async #call(operation: BackendOperation, fn: () => Promise<void>): Promise<void> {
    try {
      await fn();
    } catch (err) {
      const error = toBackendWriteError(operation, err);
      metrics.recordFailure(this.typeTag);
      logger.error(`indexer.${operation}.failed`, { type: this.typeTag, message: error.message });
      throw error;
    }
  }
}
