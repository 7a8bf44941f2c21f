/**
 * Document validation for the in-memory backend
 *
 * Compiles a JSON Schema from the index schema (static fields as
 * properties, dynamic fields as patternProperties, unknown fields rejected)
 * and validates stored documents against it.
 */

import { Ajv, type ErrorObject, type ValidateFunction } from "ajv";
import ajvFormats from "ajv-formats";
import type { FieldType, MemoryIndexSchema } from "./schema.js";

function typeSchema(type: FieldType): Record<string, unknown> {
  switch (type) {
    case "string":
    case "text":
      return { type: "string" };
    case "int":
    case "long":
      return { type: "integer" };
    case "float":
    case "double":
      return { type: "number" };
    case "boolean":
      return { type: "boolean" };
    case "date":
      return { type: "string", format: "date-time" };
  }
}

function fieldSchema(type: FieldType, multiValued: boolean): Record<string, unknown> {
  const single = typeSchema(type);
  if (!multiValued) {
    return single;
  }
  return { anyOf: [single, { type: "array", items: single }] };
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Build the JSON Schema stored documents must satisfy
 */
export function buildDocumentJsonSchema(schema: MemoryIndexSchema): Record<string, unknown> {
  const properties: Record<string, unknown> = {};
  const required = new Set<string>([schema.uniqueKey]);

  for (const field of schema.staticFields()) {
    properties[field.name] = fieldSchema(field.type, field.multiValued);
    if (field.required) {
      required.add(field.name);
    }
  }

  const patternProperties: Record<string, unknown> = {};
  for (const field of schema.dynamicFields()) {
    const pattern = field.pattern.startsWith("*")
      ? `^.+${escapeRegExp(field.pattern.slice(1))}$`
      : `^${escapeRegExp(field.pattern.slice(0, -1))}.+$`;
    patternProperties[pattern] = fieldSchema(field.type, field.multiValued);
  }

  return {
    type: "object",
    properties,
    patternProperties,
    required: Array.from(required),
    additionalProperties: false,
  };
}

function formatError(error: ErrorObject): string {
  const pointer = error.instancePath || "/";
  if (error.keyword === "additionalProperties") {
    return `${pointer}: unknown field "${String(error.params.additionalProperty)}"`;
  }
  return `${pointer}: ${error.message ?? error.keyword}`;
}

/**
 * Validates stored documents against an index schema
 */
export class DocumentValidator {
  readonly #validate: ValidateFunction;

  constructor(schema: MemoryIndexSchema) {
    const ajv = new Ajv({ strict: true, allowUnionTypes: true, allowMatchingProperties: true, allErrors: true });
    // ajv-formats is CommonJS; its plugin is the module's `default`
    ajvFormats.default(ajv, ["date-time"]);
    this.#validate = ajv.compile(buildDocumentJsonSchema(schema));
  }

  /**
   * @returns Error messages; empty when the document is valid
   */
  validate(document: Record<string, unknown>): string[] {
    if (this.#validate(document)) {
      return [];
    }
    return (this.#validate.errors ?? []).map(formatError);
  }
}
