/**
 * Error types for searchmap operations
 *
 * Invariants:
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 */

/**
 * Base class for all searchmap errors
 */
export abstract class SearchMapError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when an indexer definition is invalid (missing type tag, a field
 * with neither attribute path nor computed hook)
 */
export class ConfigurationError extends SearchMapError {
  readonly code = "E_CONFIG";

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
  }
}

/**
 * Thrown by a schema collaborator when names cannot be resolved
 */
export class SchemaError extends SearchMapError {
  readonly code = "E_SCHEMA";

  constructor(
    public readonly unknownFields: string[],
    options?: ErrorOptions
  ) {
    super(`Unknown fields: ${unknownFields.join(", ")}`, options);
  }
}

/**
 * Thrown at indexer construction when declared fields do not exist in the
 * backend schema
 */
export class SchemaBindingError extends SearchMapError {
  readonly code = "E_SCHEMA_BINDING";

  constructor(
    public readonly indexer: string,
    public readonly fields: string[],
    options?: ErrorOptions
  ) {
    super(`Indexer "${indexer}" declares fields unknown to the backend schema: ${fields.join(", ")}`, options);
  }
}

/**
 * Thrown when an attribute path cannot be walked on a record
 */
export class FieldResolutionError extends SearchMapError {
  readonly code = "E_FIELD_RESOLUTION";

  constructor(
    public readonly record: string,
    public readonly path: string,
    public readonly segment: string,
    options?: ErrorOptions
  ) {
    super(`Record: ${record} does not contain: ${path} currently trying to get: ${segment}`, options);
  }
}

/**
 * Operations a backend write error can come from
 */
export type BackendOperation = "add" | "commit" | "delete";

/**
 * Thrown when a backend add, commit or delete fails
 */
export class BackendWriteError extends SearchMapError {
  readonly code = "E_BACKEND_WRITE";

  constructor(
    public readonly operation: BackendOperation,
    detail: string,
    options?: ErrorOptions
  ) {
    super(`Backend ${operation} failed: ${detail}`, options);
  }
}

/**
 * Thrown when a reindex is started while another is running on the same
 * reindexer, or a run moves to a state it cannot reach
 */
export class ReindexStateError extends SearchMapError {
  readonly code = "E_REINDEX_STATE";

  constructor(
    public readonly typeTag: string,
    message: string,
    options?: ErrorOptions
  ) {
    super(message, options);
  }
}

/**
 * Wrap any failure of a backend call as a BackendWriteError
 */
export function toBackendWriteError(operation: BackendOperation, err: unknown): BackendWriteError {
  if (err instanceof BackendWriteError) {
    return err;
  }
  const detail = err instanceof Error ? err.message : String(err);
  return new BackendWriteError(operation, detail, { cause: err });
}
