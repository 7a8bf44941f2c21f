#!/usr/bin/env node

/**
 * searchmap CLI entry point
 */

import { CommanderError } from "commander";
import { createProgram } from "./program.js";
import { isVerbose, type GlobalOptions } from "./lib/env.js";
import { formatCliError, mapSdkErrorToExitCode } from "./lib/errors.js";

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    const exitCode = mapSdkErrorToExitCode(err);

    // Commander has already written its own usage errors, help and version
    if (!(err instanceof CommanderError)) {
      const opts = program.opts<GlobalOptions>();
      console.error(`Error: ${formatCliError(err, Boolean(opts.verbose) || isVerbose())}`);
    }

    process.exit(exitCode);
  }
}

await main();
