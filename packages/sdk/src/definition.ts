/**
 * Indexer definitions: the registry of declared fields, computed hooks and
 * group config for one kind of record.
 *
 * Definitions are built once at startup. `extend()` derives a subtype by
 * copying the parent's fields, hooks and config and overriding by key.
 */

import { z } from "zod";
import { ConfigurationError } from "./errors.js";
import type { ComputedHook, FieldSpec, IndexerConfig } from "./types.js";

/** System field holding the indexer type tag */
export const META_TYPE_FIELD = "meta_type_s";

/** System field holding the time each document was transformed */
export const META_TIMESTAMP_FIELD = "meta_index_timestamp_dt";

/** Hook names reserved for the system fields */
export const RESERVED_HOOKS: ReadonlySet<string> = new Set([
  "meta_type",
  META_TYPE_FIELD,
  "meta_index_timestamp",
  META_TIMESTAMP_FIELD,
]);

/**
 * Field declaration as written in a definition
 */
export interface FieldDeclaration {
  path?: string;
  optional?: boolean;
}

/**
 * Declare a field read from a dotted attribute path
 * @example attr("author.name", { optional: true })
 */
export function attr(path: string, options: { optional?: boolean } = {}): FieldDeclaration {
  return { path, optional: options.optional ?? false };
}

/**
 * Declare a field whose value comes from a computed hook
 */
export function computed(options: { optional?: boolean } = {}): FieldDeclaration {
  return { optional: options.optional ?? false };
}

export interface IndexerDefinitionInput<R> {
  /** Name used in logs and errors */
  name: string;
  /** Group metadata; must carry a non-empty `type` once merged */
  config?: Record<string, unknown>;
  fields?: Record<string, FieldDeclaration>;
  hooks?: Record<string, ComputedHook<R>>;
  /** Field holding the document identifier (default: "id") */
  idField?: string;
}

const configSchema = z
  .object({
    type: z.string().trim().min(1),
  })
  .passthrough();

const fieldNamePattern = /^[A-Za-z_][A-Za-z0-9_]*$/;

function parseConfig(name: string, config: Record<string, unknown>): Readonly<IndexerConfig> {
  const parsed = configSchema.safeParse(config);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Indexer "${name}" requires a type in its config to group indexed documents`,
      { cause: parsed.error }
    );
  }
  return Object.freeze({ ...parsed.data });
}

function toFieldSpec(indexer: string, name: string, decl: FieldDeclaration): FieldSpec {
  if (!fieldNamePattern.test(name)) {
    throw new ConfigurationError(`Indexer "${indexer}" declares an invalid field name "${name}"`);
  }
  if (name === META_TYPE_FIELD || name === META_TIMESTAMP_FIELD) {
    throw new ConfigurationError(`Indexer "${indexer}" cannot redeclare system field "${name}"`);
  }
  if (decl.path !== undefined && decl.path.split(".").some((segment) => segment.length === 0)) {
    throw new ConfigurationError(
      `Indexer "${indexer}" field "${name}" has an invalid attribute path "${decl.path}"`
    );
  }

  const spec: FieldSpec = { name, isOptional: decl.optional ?? false };
  if (decl.path !== undefined) {
    spec.attributePath = decl.path;
  }
  return spec;
}

/**
 * Immutable registry of mapping rules for one record kind
 */
export class IndexerDefinition<R> {
  readonly name: string;
  readonly config: Readonly<IndexerConfig>;
  readonly idField: string;
  #fields: ReadonlyMap<string, FieldSpec>;
  #hooks: ReadonlyMap<string, ComputedHook<R>>;

  private constructor(
    name: string,
    config: Readonly<IndexerConfig>,
    fields: Map<string, FieldSpec>,
    hooks: Map<string, ComputedHook<R>>,
    idField: string
  ) {
    this.name = name;
    this.config = config;
    this.#fields = fields;
    this.#hooks = hooks;
    this.idField = idField;
  }

  /**
   * Build a definition from a declaration
   * @throws ConfigurationError
   */
  static create<R>(
    input: IndexerDefinitionInput<R>,
    parent?: IndexerDefinition<R>
  ): IndexerDefinition<R> {
    const config = parseConfig(input.name, { ...parent?.config, ...input.config });

    const fields = new Map(parent == null ? undefined : parent.#fields);
    for (const [name, decl] of Object.entries(input.fields ?? {})) {
      fields.set(name, toFieldSpec(input.name, name, decl));
    }

    const hooks = new Map(parent == null ? undefined : parent.#hooks);
    for (const [name, hook] of Object.entries(input.hooks ?? {})) {
      if (RESERVED_HOOKS.has(name)) {
        throw new ConfigurationError(`Indexer "${input.name}" cannot override system hook "${name}"`);
      }
      hooks.set(name, hook);
    }

    return new IndexerDefinition(
      input.name,
      config,
      fields,
      hooks,
      input.idField ?? parent?.idField ?? "id"
    );
  }

  /** Type tag written to every document and used for reconciliation */
  get typeTag(): string {
    return this.config.type;
  }

  /** Declared fields, in declaration order (parent fields first) */
  fields(): FieldSpec[] {
    return Array.from(this.#fields.values(), (spec) => ({ ...spec }));
  }

  hook(name: string): ComputedHook<R> | undefined {
    return this.#hooks.get(name);
  }

  hookNames(): string[] {
    return Array.from(this.#hooks.keys());
  }

  /**
   * Derive a subtype definition; child fields, hooks and config keys
   * override the parent's
   */
  extend<S extends R>(input: IndexerDefinitionInput<S>): IndexerDefinition<S> {
    // A parent hook accepting R also accepts the narrower S
    const parent: IndexerDefinition<S> = this;
    return IndexerDefinition.create(input, parent);
  }
}

/**
 * Define an indexer for records of type R
 * @throws ConfigurationError when the config has no type tag
 */
export function defineIndexer<R>(input: IndexerDefinitionInput<R>): IndexerDefinition<R> {
  return IndexerDefinition.create(input);
}
