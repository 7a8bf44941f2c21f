/**
 * check: bind a definition against a schema without touching any data
 */

import type { Command } from "commander";
import { bindFields } from "@searchmap/sdk";
import type { GlobalOptions } from "../lib/env.js";
import { loadDefinition, loadSchema } from "../lib/load.js";
import { colorize, formatTable, printJson, printLines } from "../lib/render.js";
import { withTiming } from "../lib/telemetry.js";

interface CheckOptions {
  definition: string;
  schema: string;
  json?: boolean;
}

export function createCheckCommand(program: Command): Command {
  return program
    .command("check")
    .description("Bind an indexer definition against an index schema and list its fields")
    .requiredOption("--definition <path>", "Indexer definition JSON file")
    .requiredOption("--schema <path>", "Index schema JSON file")
    .option("--json", "Output bindings as JSON")
    .addHelpText(
      "after",
      `
Examples:
  $ searchmap check --definition ./articles.indexer.json --schema ./schema.json
  $ searchmap check --definition ./articles.indexer.json --schema ./schema.json --json`
    )
    .action(async (options: CheckOptions) => {
      await withTiming("cli.check", async () => {
        const opts = program.opts<GlobalOptions>();
        const definition = await loadDefinition(options.definition);
        const schema = await loadSchema(options.schema);

        const bindings = bindFields(definition, schema, { validateSchema: true, clock: () => new Date() });
        const rows = bindings.map((binding) => ({
          field: binding.name,
          policy: binding.policy,
          source: binding.attributePath ?? binding.hookName ?? "",
          dynamic: binding.isDynamicField,
          optional: binding.isOptional,
        }));

        if (options.json) {
          printJson(rows);
          return;
        }

        if (!opts.quiet) {
          console.log(
            colorize(
              `✓ Indexer "${definition.name}" (type "${definition.typeTag}") binds ${bindings.length} field(s)`,
              "green"
            )
          );
        }
        printLines(
          formatTable([
            ["FIELD", "POLICY", "SOURCE", "OPTIONAL"],
            ...rows.map((row) => [row.field, row.policy, row.source, row.optional ? "yes" : "no"]),
          ])
        );
      });
    });
}
