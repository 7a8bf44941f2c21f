/**
 * In-memory search backend
 *
 * Queries are Mango filters. Adds are staged and become visible on commit;
 * deletes apply at once to committed and staged documents. Documents are
 * validated against the index schema, so a batch with any invalid document
 * is rejected whole. Values of date fields are stored, and compared in
 * queries, as UTC ISO-8601 strings with milliseconds, so text order is
 * time order whatever offset a timestamp was written with.
 */

import { BackendWriteError } from "../errors.js";
import { matches } from "../query.js";
import type { DeleteTarget, Filter, Identifier, IndexDocument, SearchBackend } from "../types.js";
import { toStoredValue } from "../values.js";
import { MemoryIndexSchema, type IndexSchemaDefinition } from "./schema.js";
import { DocumentValidator } from "./validator.js";

function normalizeDocument(document: IndexDocument): IndexDocument {
  const stored: IndexDocument = {};
  for (const [field, value] of Object.entries(document)) {
    stored[field] = toStoredValue(value);
  }
  return stored;
}

/**
 * Rewrite a date-time string as UTC with milliseconds
 */
function toCanonicalDate(value: string): string {
  const time = Date.parse(value);
  return Number.isNaN(time) ? value : new Date(time).toISOString();
}

function canonicalizeDates(value: unknown): unknown {
  if (typeof value === "string") {
    return toCanonicalDate(value);
  }
  if (Array.isArray(value)) {
    return value.map(canonicalizeDates);
  }
  return value;
}

/**
 * Rewrite query values the way documents are stored
 * @param isDate - Whether the predicate targets a date field
 */
function normalizeQueryValue(value: unknown, isDate: boolean): unknown {
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === "string" && isDate) {
    return toCanonicalDate(value);
  }
  if (Array.isArray(value)) {
    return value.map((inner) => normalizeQueryValue(inner, isDate));
  }
  if (value !== null && typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value).map(([key, inner]) => [key, normalizeQueryValue(inner, isDate)])
    );
  }
  return value;
}

export class MemorySearchBackend implements SearchBackend<Filter> {
  readonly schema: MemoryIndexSchema;
  readonly #validator: DocumentValidator;
  #committed = new Map<string, IndexDocument>();
  #staged = new Map<string, IndexDocument>();

  /**
   * @throws ConfigurationError when given an invalid schema definition
   */
  constructor(schema: MemoryIndexSchema | IndexSchemaDefinition) {
    this.schema = schema instanceof MemoryIndexSchema ? schema : new MemoryIndexSchema(schema);
    this.#validator = new DocumentValidator(this.schema);
  }

  async add(documents: readonly IndexDocument[]): Promise<void> {
    const prepared = this.#prepare(documents, "add");
    for (const [key, document] of prepared) {
      this.#staged.set(key, document);
    }
  }

  async commit(): Promise<void> {
    for (const [key, document] of this.#staged) {
      this.#committed.set(key, document);
    }
    this.#staged.clear();
  }

  async delete(target: DeleteTarget<Filter>): Promise<void> {
    if ("ids" in target) {
      for (const id of target.ids) {
        this.#committed.delete(String(id));
        this.#staged.delete(String(id));
      }
      return;
    }

    for (const store of [this.#committed, this.#staged]) {
      for (const [key, document] of store) {
        if (matches(document, target.query)) {
          store.delete(key);
        }
      }
    }
  }

  buildQuery(predicates: Filter): Filter {
    return Object.fromEntries(
      Object.entries(predicates).map(([field, value]) => [
        field,
        normalizeQueryValue(value, this.#isDateField(field)),
      ])
    );
  }

  and(...queries: Filter[]): Filter {
    return { $and: queries };
  }

  /**
   * Seed committed documents directly (e.g. from a snapshot)
   * @throws BackendWriteError when a document is invalid
   */
  load(documents: readonly IndexDocument[]): void {
    for (const [key, document] of this.#prepare(documents, "add")) {
      this.#committed.set(key, document);
    }
  }

  /**
   * Committed documents matching a filter
   */
  find(filter: Filter = {}): IndexDocument[] {
    const query = this.buildQuery(filter);
    return Array.from(this.#committed.values()).filter((document) => matches(document, query));
  }

  count(filter: Filter = {}): number {
    return this.find(filter).length;
  }

  get(id: Identifier): IndexDocument | null {
    return this.#committed.get(String(id)) ?? null;
  }

  /** All committed documents, in insertion order */
  all(): IndexDocument[] {
    return Array.from(this.#committed.values());
  }

  /** Number of staged, uncommitted documents */
  get stagedCount(): number {
    return this.#staged.size;
  }

  #isDateField(name: string): boolean {
    return this.schema.resolve(name)?.type === "date";
  }

  #prepare(documents: readonly IndexDocument[], operation: "add"): Array<[string, IndexDocument]> {
    return documents.map((document, index) => {
      const stored = normalizeDocument(document);
      const errors = this.#validator.validate(stored);
      if (errors.length > 0) {
        throw new BackendWriteError(operation, `document ${index} rejected: ${errors.join("; ")}`);
      }
      for (const [field, value] of Object.entries(stored)) {
        if (this.#isDateField(field)) {
          stored[field] = canonicalizeDates(value);
        }
      }

      const key = stored[this.schema.uniqueKey];
      if (typeof key !== "string" && typeof key !== "number") {
        throw new BackendWriteError(
          operation,
          `document ${index} has no usable "${this.schema.uniqueKey}" value`
        );
      }
      return [String(key), stored];
    });
  }
}
