/**
 * Record to document transformation
 */

import type { FieldBinding } from "./binder.js";
import { ConfigurationError, FieldResolutionError } from "./errors.js";
import { logger } from "./observability/logs.js";
import { describeRecord } from "./resolver.js";
import type { Identifier, IndexDocument } from "./types.js";
import { isEmptyValue } from "./values.js";

/**
 * Converts domain records into sparse documents using bound fields
 */
export class DocumentTransformer<R> {
  readonly #bindings: readonly FieldBinding<R>[];
  readonly #idBinding: FieldBinding<R> | undefined;
  readonly #typeTag: string;

  constructor(bindings: readonly FieldBinding<R>[], options: { idField: string; typeTag: string }) {
    this.#bindings = bindings;
    this.#idBinding = bindings.find((binding) => binding.name === options.idField);
    this.#typeTag = options.typeTag;
  }

  get bindings(): readonly FieldBinding<R>[] {
    return this.#bindings;
  }

  /**
   * Transform one record into a document
   *
   * Optional fields that fail to resolve are omitted; empty values are never
   * written.
   *
   * @throws FieldResolutionError when a required field cannot be resolved
   */
  transform(record: R): IndexDocument {
    const document: IndexDocument = {};

    for (const binding of this.#bindings) {
      let value: unknown;
      try {
        value = binding.resolve(record);
      } catch (err) {
        if (err instanceof FieldResolutionError && binding.isOptional) {
          logger.debug("transform.field.omitted", {
            type: this.#typeTag,
            field: binding.name,
            message: err.message,
          });
          continue;
        }
        throw err;
      }

      if (!isEmptyValue(value)) {
        document[binding.name] = value;
      }
    }

    return document;
  }

  /**
   * Resolve only the identifier field of a record
   * @throws ConfigurationError when the definition has no identifier field
   * @throws FieldResolutionError when the identifier is missing or not a string/number
   */
  transformId(record: R): Identifier {
    const binding = this.#idBinding;
    if (!binding) {
      throw new ConfigurationError(`Indexer "${this.#typeTag}" has no identifier field to delete by`);
    }

    const value = binding.resolve(record);
    if ((typeof value === "string" && value.length > 0) || typeof value === "number") {
      return value;
    }
    throw new FieldResolutionError(describeRecord(record), binding.attributePath ?? binding.name, binding.name);
  }
}
