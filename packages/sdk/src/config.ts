/**
 * Indexer configuration resolution
 * Priority: explicit options > SEARCHMAP_* environment variables > defaults
 */

import { z } from "zod";
import { ConfigurationError } from "./errors.js";
import type { IndexerOptions, ResolvedIndexerOptions } from "./types.js";

/** Documents per backend add call while streaming */
export const DEFAULT_COMMIT_CHUNK_SIZE = 1000;

const booleanFromEnv = z.preprocess((value) => {
  if (typeof value === "boolean") return value;
  if (typeof value === "string") {
    const normalized = value.trim().toLowerCase();
    if (normalized === "true" || normalized === "1") return true;
    if (normalized === "false" || normalized === "0") return false;
  }
  return value;
}, z.boolean());

const envSchema = z.object({
  SEARCHMAP_COMMIT_CHUNK_SIZE: z.coerce.number().int().positive().optional(),
  SEARCHMAP_SCHEMA_VALIDATION: booleanFromEnv.optional(),
});

const optionsSchema = z.object({
  commitChunkSize: z.number().int().positive().optional(),
  validateSchema: z.boolean().optional(),
});

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
}

/**
 * Apply environment overrides and defaults to indexer options
 * @throws ConfigurationError when an option or environment value is invalid
 */
export function resolveIndexerOptions(
  options: IndexerOptions = {},
  env: NodeJS.ProcessEnv = process.env
): ResolvedIndexerOptions {
  const parsedEnv = envSchema.safeParse({
    SEARCHMAP_COMMIT_CHUNK_SIZE: env.SEARCHMAP_COMMIT_CHUNK_SIZE,
    SEARCHMAP_SCHEMA_VALIDATION: env.SEARCHMAP_SCHEMA_VALIDATION,
  });
  if (!parsedEnv.success) {
    throw new ConfigurationError(`Invalid environment configuration: ${formatIssues(parsedEnv.error)}`, {
      cause: parsedEnv.error,
    });
  }

  const parsedOptions = optionsSchema.safeParse({
    commitChunkSize: options.commitChunkSize,
    validateSchema: options.validateSchema,
  });
  if (!parsedOptions.success) {
    throw new ConfigurationError(`Invalid indexer options: ${formatIssues(parsedOptions.error)}`, {
      cause: parsedOptions.error,
    });
  }

  return {
    commitChunkSize:
      parsedOptions.data.commitChunkSize ??
      parsedEnv.data.SEARCHMAP_COMMIT_CHUNK_SIZE ??
      DEFAULT_COMMIT_CHUNK_SIZE,
    validateSchema:
      parsedOptions.data.validateSchema ?? parsedEnv.data.SEARCHMAP_SCHEMA_VALIDATION ?? true,
    clock: options.clock ?? (() => new Date()),
  };
}
