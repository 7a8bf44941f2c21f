/**
 * searchmap command definitions
 */

import { readFileSync } from "node:fs";
import { Command } from "commander";
import { z } from "zod";
import { logger } from "@searchmap/sdk";
import { createCheckCommand } from "./commands/check.js";
import { createReindexCommand } from "./commands/reindex.js";
import { createTransformCommand } from "./commands/transform.js";
import { isVerbose, type GlobalOptions } from "./lib/env.js";
import { colorize } from "./lib/render.js";

const packageJsonSchema = z.object({ version: z.string() });

// src/ and dist/ both sit one level below the package root
const packageJson = packageJsonSchema.parse(
  JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"))
);

/**
 * Build the CLI program. Errors, including usage errors, are thrown from
 * `parseAsync` rather than exiting the process.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .configureOutput({
      writeErr: (str) => process.stderr.write(colorize(str, "red", process.stderr)),
    })
    .exitOverride();

  program
    .name("searchmap")
    .description("searchmap - map records to search documents and reindex them")
    .version(packageJson.version)
    .option("--verbose", "Verbose diagnostics (indexer logs and metrics)")
    .option("--quiet", "Suppress non-error output");

  // Indexer logs go to stdout, so they stay off unless asked for
  program.hook("preAction", () => {
    const opts = program.opts<GlobalOptions>();
    logger.setEnabled(Boolean(opts.verbose) || isVerbose());
  });

  createCheckCommand(program);
  createTransformCommand(program);
  createReindexCommand(program);

  return program;
}
