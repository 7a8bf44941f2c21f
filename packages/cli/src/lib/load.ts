/**
 * Loaders for the files CLI commands operate on: indexer definitions, index
 * schemas and document snapshots
 */

import { z } from "zod";
import {
  parseDefinition,
  parseIndexSchema,
  type IndexDocument,
  type IndexerDefinition,
  type MemoryIndexSchema,
} from "@searchmap/sdk";
import { resolveFilePath } from "./env.js";
import { CliError } from "./errors.js";
import { isNotFound, readJsonFromFile, writeJsonToFile } from "./io.js";

const snapshotSchema = z.array(z.record(z.string(), z.unknown()));

async function readInput(filePath: string, what: string): Promise<unknown> {
  try {
    return await readJsonFromFile(resolveFilePath(filePath));
  } catch (err) {
    if (isNotFound(err)) {
      throw new CliError(`${what} file not found: ${filePath}`, { cause: err });
    }
    throw err;
  }
}

/**
 * Load an indexer definition file
 */
export async function loadDefinition(filePath: string): Promise<IndexerDefinition<unknown>> {
  return parseDefinition(await readInput(filePath, "Definition"));
}

/**
 * Load an index schema file
 */
export async function loadSchema(filePath: string): Promise<MemoryIndexSchema> {
  return parseIndexSchema(await readInput(filePath, "Schema"));
}

/**
 * Load the documents of a snapshot; a missing snapshot is an empty index
 */
export async function loadSnapshot(filePath: string): Promise<IndexDocument[]> {
  let json: unknown;
  try {
    json = await readJsonFromFile(resolveFilePath(filePath));
  } catch (err) {
    if (isNotFound(err)) {
      return [];
    }
    throw err;
  }

  const parsed = snapshotSchema.safeParse(json);
  if (!parsed.success) {
    throw new CliError(`Snapshot ${filePath} must contain a JSON array of documents`, { cause: parsed.error });
  }
  return parsed.data;
}

export async function saveSnapshot(filePath: string, documents: readonly IndexDocument[]): Promise<void> {
  await writeJsonToFile(resolveFilePath(filePath), documents);
}
