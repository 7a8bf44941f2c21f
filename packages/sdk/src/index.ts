/**
 * searchmap SDK
 *
 * Declarative mapping of domain records to search documents, batch
 * indexing, and reindexing with timestamp-watermark reconciliation
 */

// Re-export types
export type {
  IndexDocument,
  Identifier,
  Clock,
  FieldOperator,
  LogicalOperator,
  Filter,
  ComputedHook,
  FieldSpec,
  IndexerConfig,
  FieldMetadata,
  IndexSchema,
  DeleteTarget,
  SearchBackend,
  RecordSource,
  IndexRun,
  IndexerOptions,
  ResolvedIndexerOptions,
  WriteOptions,
  StreamSummary,
  RecordErrorAction,
  RecordErrorHandler,
  ReindexState,
  ReindexSummary,
} from "./types.js";

// Definitions
export {
  defineIndexer,
  attr,
  computed,
  IndexerDefinition,
  META_TYPE_FIELD,
  META_TIMESTAMP_FIELD,
  RESERVED_HOOKS,
  type FieldDeclaration,
  type IndexerDefinitionInput,
} from "./definition.js";
export { parseDefinition, definitionFileSchema, type DefinitionFile } from "./definition-file.js";

// Binding and transformation
export { bindFields, type FieldBinding, type ValuePolicy, type BindOptions } from "./binder.js";
export {
  walkPath,
  createPathResolver,
  selectResolver,
  describeRecord,
  SEGMENT_RESOLVERS,
  type SegmentResolver,
  type SegmentResolverKind,
} from "./resolver.js";
export { DocumentTransformer } from "./transformer.js";
export { isEmptyValue, toStoredValue } from "./values.js";

// Indexing
export { BatchIndexer, type StreamOptions } from "./indexer.js";
export { ReconcilingReindexer, createReindexer, type ReindexOptions } from "./reindexer.js";
export { resolveIndexerOptions, DEFAULT_COMMIT_CHUNK_SIZE } from "./config.js";

// In-memory backend
export { MemorySearchBackend } from "./memory/backend.js";
export {
  MemoryIndexSchema,
  parseIndexSchema,
  indexSchemaDefinitionSchema,
  type IndexSchemaDefinition,
  type FieldType,
  type FieldDefinition,
  type DynamicFieldDefinition,
  type ResolvedField,
} from "./memory/schema.js";
export { DocumentValidator, buildDocumentJsonSchema } from "./memory/validator.js";
export { matches, getPath } from "./query.js";

// Observability
export { logger, formatLogEntry, type LogLevel, type LogEntry, type LogContext } from "./observability/logs.js";
export { metrics, type IndexerMetrics } from "./observability/metrics.js";

// Errors
export {
  SearchMapError,
  ConfigurationError,
  SchemaError,
  SchemaBindingError,
  FieldResolutionError,
  BackendWriteError,
  ReindexStateError,
  toBackendWriteError,
  type BackendOperation,
} from "./errors.js";
