/**
 * I/O helpers for CLI
 */

import { createReadStream } from "node:fs";
import * as fs from "node:fs/promises";
import { createInterface } from "node:readline";
import { parseJson } from "./arg.js";
import { CliError } from "./errors.js";

/**
 * Read JSON from a file
 */
export async function readJsonFromFile(filePath: string): Promise<unknown> {
  const content = await fs.readFile(filePath, "utf8");
  return parseJson(content, `file ${filePath}`);
}

/**
 * Write JSON (pretty-printed) to a file
 */
export async function writeJsonToFile(filePath: string, data: unknown): Promise<void> {
  await fs.writeFile(filePath, JSON.stringify(data, null, 2) + "\n", "utf8");
}

function isLineDelimited(filePath: string): boolean {
  return /\.(jsonl|ndjson)$/i.test(filePath);
}

/**
 * Stream records from a JSON array file or a JSON Lines file.
 * JSON Lines files are read line by line and never held in memory whole.
 */
export async function* readRecords(filePath: string): AsyncGenerator<unknown> {
  if (isLineDelimited(filePath)) {
    const lines = createInterface({
      input: createReadStream(filePath, { encoding: "utf8" }),
      crlfDelay: Infinity,
    });

    let lineNumber = 0;
    for await (const line of lines) {
      lineNumber++;
      if (!line.trim()) continue;
      yield parseJson(line, `${filePath}:${lineNumber}`);
    }
    return;
  }

  const data = await readJsonFromFile(filePath);
  if (!Array.isArray(data)) {
    throw new CliError(`Records file ${filePath} must contain a JSON array`);
  }
  yield* data;
}

/**
 * Check whether an error is a missing-file error
 */
export function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Write to stderr
 */
export function writeStderr(content: string): void {
  process.stderr.write(content);
}
