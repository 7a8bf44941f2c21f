/**
 * reindex: run a reconciling reindex into a snapshot of an in-memory index
 */

import type { Command } from "commander";
import {
  createReindexer,
  FieldResolutionError,
  META_TYPE_FIELD,
  MemorySearchBackend,
  type RecordErrorHandler,
} from "@searchmap/sdk";
import { parsePositiveInt } from "../lib/arg.js";
import { resolveFilePath, type GlobalOptions } from "../lib/env.js";
import { CliError } from "../lib/errors.js";
import { readRecords } from "../lib/io.js";
import { loadDefinition, loadSchema, loadSnapshot, saveSnapshot } from "../lib/load.js";
import { colorize, printJson, printLines } from "../lib/render.js";
import { emitIndexerMetrics, withTiming } from "../lib/telemetry.js";

interface ReindexCommandOptions {
  definition: string;
  schema: string;
  records: string;
  snapshot: string;
  chunkSize?: number;
  skipInvalid?: boolean;
  json?: boolean;
}

const skipFieldErrors: RecordErrorHandler<unknown> = (error) =>
  error instanceof FieldResolutionError ? "skip" : "abort";

export function createReindexCommand(program: Command): Command {
  return program
    .command("reindex")
    .description("Reindex every record and remove stale documents of the definition's type")
    .requiredOption("--definition <path>", "Indexer definition JSON file")
    .requiredOption("--schema <path>", "Index schema JSON file")
    .requiredOption("--records <path>", "Records as a JSON array (.json) or JSON Lines (.jsonl)")
    .requiredOption("--snapshot <path>", "Index snapshot to update (created when missing)")
    .option("--chunk-size <n>", "Documents per add call", (value) => parsePositiveInt(value, "--chunk-size"))
    .option("--skip-invalid", "Skip records missing a required field instead of failing")
    .option("--json", "Output the summary as JSON")
    .addHelpText(
      "after",
      `
Examples:
  $ searchmap reindex --definition ./articles.indexer.json --schema ./schema.json \\
      --records ./articles.jsonl --snapshot ./index.json
  $ SEARCHMAP_COMMIT_CHUNK_SIZE=500 searchmap reindex ... --json`
    )
    .action(async (options: ReindexCommandOptions) => {
      await withTiming("cli.reindex", async () => {
        const opts = program.opts<GlobalOptions>();
        const definition = await loadDefinition(options.definition);
        const schema = await loadSchema(options.schema);

        const backend = new MemorySearchBackend(schema);
        backend.load(await loadSnapshot(options.snapshot));
        const previous = backend
          .find({ [META_TYPE_FIELD]: definition.typeTag })
          .map((document) => String(document[schema.uniqueKey]));

        const recordsPath = resolveFilePath(options.records);
        const reindexer = createReindexer(
          definition,
          backend,
          { getRecords: () => readRecords(recordsPath) },
          {
            commitChunkSize: options.chunkSize,
            onRecordError: options.skipInvalid ? skipFieldErrors : undefined,
          }
        );

        await reindexer.reindex();
        const summary = reindexer.lastSummary;
        if (!summary) {
          throw new CliError(`Reindex of "${definition.typeTag}" finished without a summary`);
        }

        const removed = previous.filter((id) => backend.get(id) === null).length;
        await saveSnapshot(options.snapshot, backend.all());
        emitIndexerMetrics(definition.typeTag);

        if (options.json) {
          printJson({
            type: summary.typeTag,
            startedAt: summary.startedAt.toISOString(),
            indexed: summary.indexed,
            skipped: summary.skipped,
            chunks: summary.chunks,
            removed,
            documents: backend.count(),
          });
          return;
        }

        if (!opts.quiet) {
          console.log(
            colorize(
              `✓ Reindexed ${summary.indexed} record(s) of type "${summary.typeTag}" in ${summary.chunks} chunk(s)`,
              "green"
            )
          );
          printLines([
            `  Skipped: ${summary.skipped}`,
            `  Removed: ${removed}`,
            `  Documents in snapshot: ${backend.count()}`,
          ]);
        }
      });
    });
}
