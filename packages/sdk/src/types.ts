/**
 * Core types for searchmap
 */

/**
 * Document sent to a search backend: field name to value.
 *
 * Documents are sparse. A key is present only when its field produced a
 * non-empty value; an absent key means "not set".
 */
export type IndexDocument = Record<string, unknown>;

/**
 * Value of a document's identifier field
 */
export type Identifier = string | number;

/**
 * Clock used for run watermarks and per-record index timestamps
 */
export type Clock = () => Date;

/**
 * Mango field-level operators
 */
export interface FieldOperator {
  $eq?: unknown;
  $ne?: unknown;
  $in?: unknown[];
  $nin?: unknown[];
  $gt?: unknown;
  $gte?: unknown;
  $lt?: unknown;
  $lte?: unknown;
  $exists?: boolean;
  $type?: "string" | "number" | "boolean" | "object" | "array" | "null";
}

/**
 * Mango logical operators
 */
export interface LogicalOperator {
  $and?: Filter[];
  $or?: Filter[];
  $not?: Filter;
}

/**
 * Field predicates used to build backend queries. Keys are field names
 * (mapping to a literal or a {@link FieldOperator}) or {@link LogicalOperator}
 * keys.
 * @example { meta_type_s: { $eq: "article" } }
 */
export type Filter = Record<string, unknown>;

/**
 * Computed-value hook: derives one field value from a record
 */
export type ComputedHook<R> = (record: R) => unknown;

/**
 * One declared mapping rule
 */
export interface FieldSpec {
  /** Document field name */
  name: string;
  /** Dotted attribute path walked from the record (e.g. "author.name") */
  attributePath?: string;
  /** Omit the field instead of failing when its path cannot be resolved */
  isOptional: boolean;
}

/**
 * Per-indexer group metadata. `type` tags every document written by the
 * indexer and selects documents during reconciliation.
 */
export interface IndexerConfig {
  type: string;
  [key: string]: unknown;
}

/**
 * Backend metadata for one field
 */
export interface FieldMetadata {
  /** Field name as declared */
  name: string;
  /** True when the name matched a dynamic (wildcard) field */
  isDynamic: boolean;
  /** Name used to look up computed hooks for dynamic fields */
  displayName: string;
}

/**
 * Live field schema exposed by a search backend
 */
export interface IndexSchema {
  /**
   * Resolve a declared field name to backend metadata
   * @returns Metadata, or null when the backend does not know the field
   */
  matchField(name: string): FieldMetadata | null;

  /**
   * Check that every name is resolvable
   * @throws SchemaError when any name is unknown
   */
  checkFields(names: Iterable<string>): void;
}

/**
 * Target of a delete call: explicit identifiers or a backend query
 */
export type DeleteTarget<Q> = { ids: readonly Identifier[] } | { query: Q };

/**
 * Minimum surface a search backend must offer
 *
 * @typeParam Q - backend-specific query representation
 */
export interface SearchBackend<Q = unknown> {
  /** Live field schema */
  readonly schema: IndexSchema;

  /**
   * Submit documents for indexing (visible after commit)
   * @throws BackendWriteError on transport or validation failure
   */
  add(documents: readonly IndexDocument[]): Promise<void>;

  /**
   * Make pending writes durable and visible
   * @throws BackendWriteError
   */
  commit(): Promise<void>;

  /**
   * Delete by identifiers or by query
   * @throws BackendWriteError
   */
  delete(target: DeleteTarget<Q>): Promise<void>;

  /**
   * Build a query from field predicates ($eq and $lt at minimum)
   */
  buildQuery(predicates: Filter): Q;

  /**
   * Combine queries with logical AND
   */
  and(...queries: Q[]): Q;
}

/**
 * Lazy, finite, single-pass record sequence
 */
export interface RecordSource<R> {
  getRecords(): Iterable<R> | AsyncIterable<R>;
}

/**
 * One reindex pass. Its start time is the reconciliation watermark.
 */
export interface IndexRun {
  readonly startedAt: Date;
  readonly typeTag: string;
}

/**
 * Options accepted by BatchIndexer and ReconcilingReindexer
 */
export interface IndexerOptions {
  /** Maximum documents per backend add call while streaming (default: 1000) */
  commitChunkSize?: number;
  /** Reject fields unknown to the backend schema at construction (default: true) */
  validateSchema?: boolean;
  /** Time source for watermarks and index timestamps (default: system clock) */
  clock?: Clock;
}

/**
 * Options with defaults applied
 */
export interface ResolvedIndexerOptions {
  commitChunkSize: number;
  validateSchema: boolean;
  clock: Clock;
}

/**
 * Options for add and delete
 */
export interface WriteOptions {
  /** Commit after the write (default: true) */
  commit?: boolean;
}

/**
 * Result of streaming a record source into the backend
 */
export interface StreamSummary {
  /** Records transformed and added */
  indexed: number;
  /** Records skipped by the record error policy */
  skipped: number;
  /** Backend add calls issued */
  chunks: number;
}

/**
 * Decision returned by a record error handler
 */
export type RecordErrorAction = "skip" | "abort";

/**
 * Handler consulted when a record cannot be transformed during a stream
 */
export type RecordErrorHandler<R> = (error: Error, record: R) => RecordErrorAction;

/**
 * Reindex state machine
 */
export type ReindexState =
  | "idle"
  | "started"
  | "streaming"
  | "flushing"
  | "committed"
  | "reconciled"
  | "done"
  | "failed";

/**
 * Summary of the last completed reindex
 */
export interface ReindexSummary extends StreamSummary {
  typeTag: string;
  startedAt: Date;
  durationMs: number;
}
