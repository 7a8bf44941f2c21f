/**
 * In-memory index schema
 *
 * Static fields match by exact name. Dynamic fields match by a wildcard
 * pattern (`*_s` or `attr_*`); the longest matching pattern wins and the part
 * matched by the wildcard becomes the field's display name, so `meta_type_s`
 * against `*_s` has display name `meta_type`.
 */

import { z } from "zod";
import { ConfigurationError, SchemaError } from "../errors.js";
import type { FieldMetadata, IndexSchema } from "../types.js";

export const fieldTypeSchema = z.enum(["string", "text", "int", "long", "float", "double", "boolean", "date"]);

export type FieldType = z.infer<typeof fieldTypeSchema>;

const fieldDefinitionSchema = z.object({
  name: z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, "field names are letters, digits and underscores"),
  type: fieldTypeSchema,
  multiValued: z.boolean().default(false),
  required: z.boolean().default(false),
});

const dynamicFieldDefinitionSchema = z.object({
  pattern: z
    .string()
    .regex(/^(\*[A-Za-z0-9_]+|[A-Za-z0-9_]+\*)$/, "patterns have one leading or trailing '*'"),
  type: fieldTypeSchema,
  multiValued: z.boolean().default(false),
});

export const indexSchemaDefinitionSchema = z
  .object({
    uniqueKey: z.string().min(1).default("id"),
    fields: z.array(fieldDefinitionSchema).default([]),
    dynamicFields: z.array(dynamicFieldDefinitionSchema).default([]),
  })
  .superRefine((def, ctx) => {
    if (!def.fields.some((field) => field.name === def.uniqueKey)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["uniqueKey"],
        message: `uniqueKey "${def.uniqueKey}" must be a declared field`,
      });
    }
  });

/** Schema definition as written (defaults optional) */
export type IndexSchemaDefinition = z.input<typeof indexSchemaDefinitionSchema>;

export type FieldDefinition = z.infer<typeof fieldDefinitionSchema>;
export type DynamicFieldDefinition = z.infer<typeof dynamicFieldDefinitionSchema>;

/**
 * Field type information for one resolved name
 */
export interface ResolvedField {
  meta: FieldMetadata;
  type: FieldType;
  multiValued: boolean;
  required: boolean;
}

interface DynamicMatcher {
  definition: DynamicFieldDefinition;
  fixed: string;
  isSuffix: boolean;
}

function toMatcher(definition: DynamicFieldDefinition): DynamicMatcher {
  const isSuffix = definition.pattern.startsWith("*");
  return {
    definition,
    fixed: isSuffix ? definition.pattern.slice(1) : definition.pattern.slice(0, -1),
    isSuffix,
  };
}

function parseDefinition(json: unknown): z.output<typeof indexSchemaDefinitionSchema> {
  const parsed = indexSchemaDefinitionSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid index schema: ${issues}`, { cause: parsed.error });
  }
  return parsed.data;
}

export class MemoryIndexSchema implements IndexSchema {
  readonly uniqueKey: string;
  readonly #fields: Map<string, FieldDefinition>;
  readonly #dynamic: DynamicMatcher[];

  /**
   * @throws ConfigurationError when the definition is invalid
   */
  constructor(definition: IndexSchemaDefinition) {
    const parsed = parseDefinition(definition);

    this.uniqueKey = parsed.uniqueKey;
    this.#fields = new Map(parsed.fields.map((field) => [field.name, field]));
    // Longest fixed part first, so the most specific pattern wins
    this.#dynamic = parsed.dynamicFields
      .map(toMatcher)
      .sort((a, b) => b.fixed.length - a.fixed.length);
  }

  /**
   * Resolve a name to its type information
   */
  resolve(name: string): ResolvedField | null {
    const field = this.#fields.get(name);
    if (field) {
      return {
        meta: { name, isDynamic: false, displayName: name },
        type: field.type,
        multiValued: field.multiValued,
        required: field.required,
      };
    }

    for (const matcher of this.#dynamic) {
      const { fixed, isSuffix, definition } = matcher;
      if (name.length <= fixed.length) continue;

      const hit = isSuffix ? name.endsWith(fixed) : name.startsWith(fixed);
      if (hit) {
        const displayName = isSuffix ? name.slice(0, -fixed.length) : name.slice(fixed.length);
        return {
          meta: { name, isDynamic: true, displayName },
          type: definition.type,
          multiValued: definition.multiValued,
          required: false,
        };
      }
    }

    return null;
  }

  matchField(name: string): FieldMetadata | null {
    return this.resolve(name)?.meta ?? null;
  }

  checkFields(names: Iterable<string>): void {
    const unknown = Array.from(names).filter((name) => this.resolve(name) === null);
    if (unknown.length > 0) {
      throw new SchemaError(unknown);
    }
  }

  staticFields(): FieldDefinition[] {
    return Array.from(this.#fields.values());
  }

  dynamicFields(): DynamicFieldDefinition[] {
    return this.#dynamic.map((matcher) => matcher.definition);
  }
}

/**
 * Build a schema from parsed JSON of unknown shape
 * @throws ConfigurationError when the JSON is not a valid schema definition
 */
export function parseIndexSchema(json: unknown): MemoryIndexSchema {
  return new MemoryIndexSchema(parseDefinition(json));
}
