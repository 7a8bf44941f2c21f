/**
 * Schema binding
 *
 * Joins an indexer definition's fields (plus the two system fields) with the
 * backend's live schema and fixes each field's value policy. Runs once per
 * indexer construction so mapping errors surface before any write.
 */

import {
  META_TIMESTAMP_FIELD,
  META_TYPE_FIELD,
  type IndexerDefinition,
} from "./definition.js";
import { ConfigurationError, SchemaBindingError, SchemaError } from "./errors.js";
import { createPathResolver } from "./resolver.js";
import type { Clock, ComputedHook, FieldMetadata, FieldSpec, IndexSchema } from "./types.js";

/**
 * How a bound field obtains its value, in precedence order
 */
export type ValuePolicy = "attribute" | "dynamic-hook" | "static-hook";

export interface FieldBinding<R> extends FieldSpec {
  isDynamicField: boolean;
  displayName: string;
  policy: ValuePolicy;
  /** Hook the value comes from; unset for attribute fields */
  hookName?: string;
  resolve: (record: R) => unknown;
}

export interface BindOptions {
  validateSchema: boolean;
  clock: Clock;
}

const SYSTEM_FIELDS: readonly FieldSpec[] = [
  { name: META_TYPE_FIELD, isOptional: false },
  { name: META_TIMESTAMP_FIELD, isOptional: false },
];

/**
 * Hooks backing the system fields, registered under both the dynamic display
 * name and the full field name
 */
function builtinHooks<R>(typeTag: string, clock: Clock): Map<string, ComputedHook<R>> {
  const metaType: ComputedHook<R> = () => typeTag;
  // Evaluated per record so timestamps never fall behind the run watermark
  const metaTimestamp: ComputedHook<R> = () => clock();

  return new Map([
    ["meta_type", metaType],
    [META_TYPE_FIELD, metaType],
    ["meta_index_timestamp", metaTimestamp],
    [META_TIMESTAMP_FIELD, metaTimestamp],
  ]);
}

/**
 * Resolve every field of a definition against the backend schema
 *
 * @throws SchemaBindingError when validation is on and a field is unknown
 * @throws ConfigurationError when a field has neither a path nor a hook
 */
export function bindFields<R>(
  definition: IndexerDefinition<R>,
  schema: IndexSchema,
  options: BindOptions
): FieldBinding<R>[] {
  const specs = [...definition.fields(), ...SYSTEM_FIELDS];
  const hooks = builtinHooks<R>(definition.typeTag, options.clock);

  const unknown: string[] = [];
  const matched = specs.map((spec): [FieldSpec, FieldMetadata] => {
    const meta = schema.matchField(spec.name);
    if (meta) {
      return [spec, meta];
    }
    if (options.validateSchema) {
      unknown.push(spec.name);
    }
    return [spec, { name: spec.name, isDynamic: false, displayName: spec.name }];
  });

  if (unknown.length > 0) {
    throw new SchemaBindingError(definition.name, unknown);
  }

  if (options.validateSchema) {
    try {
      schema.checkFields(specs.map((spec) => spec.name));
    } catch (err) {
      if (err instanceof SchemaError) {
        throw new SchemaBindingError(definition.name, err.unknownFields, { cause: err });
      }
      throw err;
    }
  }

  return matched.map(([spec, meta]): FieldBinding<R> => {
    const base = {
      ...spec,
      isDynamicField: meta.isDynamic,
      displayName: meta.displayName,
    };

    if (spec.attributePath !== undefined) {
      return { ...base, policy: "attribute", resolve: createPathResolver(spec.attributePath) };
    }

    const policy: ValuePolicy = meta.isDynamic ? "dynamic-hook" : "static-hook";
    const hookName = meta.isDynamic ? meta.displayName : spec.name;
    const hook = hooks.get(hookName) ?? definition.hook(hookName);
    if (!hook) {
      throw new ConfigurationError(
        `Field "${spec.name}" of indexer "${definition.name}" has no attribute path and no computed hook named "${hookName}"`
      );
    }

    return { ...base, policy, hookName, resolve: hook };
  });
}
