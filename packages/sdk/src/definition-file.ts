/**
 * Indexer definitions stored as JSON
 *
 * The JSON form declares attribute-path fields only; computed hooks need
 * code. The system fields are always available.
 *
 * @example
 * {
 *   "name": "articles",
 *   "config": { "type": "article" },
 *   "fields": {
 *     "id": { "path": "id" },
 *     "author_s": { "path": "author.name", "optional": true }
 *   }
 * }
 */

import { z } from "zod";
import { defineIndexer, type IndexerDefinition } from "./definition.js";
import { ConfigurationError } from "./errors.js";

export const definitionFileSchema = z
  .object({
    name: z.string().min(1),
    config: z.record(z.string(), z.unknown()),
    idField: z.string().min(1).optional(),
    fields: z.record(
      z.string(),
      z
        .object({
          path: z.string().min(1),
          optional: z.boolean().default(false),
        })
        .strict()
    ),
  })
  .strict();

export type DefinitionFile = z.input<typeof definitionFileSchema>;

/**
 * Build an indexer definition from parsed JSON
 * @throws ConfigurationError when the JSON does not describe a valid definition
 */
export function parseDefinition(json: unknown): IndexerDefinition<unknown> {
  const parsed = definitionFileSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid indexer definition: ${issues}`, { cause: parsed.error });
  }

  const { name, config, idField, fields } = parsed.data;
  return defineIndexer<unknown>({ name, config, idField, fields });
}
