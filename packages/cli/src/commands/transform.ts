/**
 * transform: print the documents a definition produces for a records file
 */

import type { Command } from "commander";
import {
  bindFields,
  DocumentTransformer,
  FieldResolutionError,
  type IndexSchema,
} from "@searchmap/sdk";
import { resolveFilePath, type GlobalOptions } from "../lib/env.js";
import { readRecords, writeStderr } from "../lib/io.js";
import { loadDefinition, loadSchema } from "../lib/load.js";
import { colorize, printJson } from "../lib/render.js";
import { withTiming } from "../lib/telemetry.js";

interface TransformOptions {
  definition: string;
  records: string;
  schema?: string;
  skipInvalid?: boolean;
}

/**
 * Schema that knows no fields; every field binds under its own name
 */
const UNTYPED_SCHEMA: IndexSchema = {
  matchField: () => null,
  checkFields: () => undefined,
};

export function createTransformCommand(program: Command): Command {
  return program
    .command("transform")
    .description("Transform records into documents and print them as JSON Lines")
    .requiredOption("--definition <path>", "Indexer definition JSON file")
    .requiredOption("--records <path>", "Records as a JSON array (.json) or JSON Lines (.jsonl)")
    .option("--schema <path>", "Index schema JSON file to bind against")
    .option("--skip-invalid", "Skip records missing a required field instead of failing")
    .action(async (options: TransformOptions) => {
      await withTiming("cli.transform", async () => {
        const opts = program.opts<GlobalOptions>();
        const definition = await loadDefinition(options.definition);
        const schema = options.schema ? await loadSchema(options.schema) : UNTYPED_SCHEMA;

        const bindings = bindFields(definition, schema, {
          validateSchema: options.schema !== undefined,
          clock: () => new Date(),
        });
        const transformer = new DocumentTransformer(bindings, {
          idField: definition.idField,
          typeTag: definition.typeTag,
        });

        let index = 0;
        for await (const record of readRecords(resolveFilePath(options.records))) {
          try {
            printJson(transformer.transform(record), { raw: true });
          } catch (err) {
            if (!(err instanceof FieldResolutionError) || !options.skipInvalid) {
              throw err;
            }
            if (!opts.quiet) {
              writeStderr(colorize(`Skipped record ${index}: ${err.message}\n`, "yellow", process.stderr));
            }
          }
          index++;
        }
      });
    });
}
