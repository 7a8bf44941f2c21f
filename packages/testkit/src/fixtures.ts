/**
 * Shared index schema used across tests
 */

import type { IndexSchemaDefinition } from "@searchmap/sdk";

/**
 * Articles index: static id/title/published fields plus common dynamic
 * suffixes (`*_s`, `*_i`, `*_b`, `*_dt`, multi-valued `*_ss`)
 */
export const ARTICLE_SCHEMA: IndexSchemaDefinition = {
  uniqueKey: "id",
  fields: [
    { name: "id", type: "string", required: true },
    { name: "title", type: "text" },
    { name: "published", type: "date" },
  ],
  dynamicFields: [
    { pattern: "*_s", type: "string" },
    { pattern: "*_i", type: "int" },
    { pattern: "*_b", type: "boolean" },
    { pattern: "*_dt", type: "date" },
    { pattern: "*_ss", type: "string", multiValued: true },
  ],
};
