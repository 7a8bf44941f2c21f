/**
 * CLI error handling and exit code mapping
 */

import { CommanderError } from "commander";
import {
  BackendWriteError,
  ConfigurationError,
  FieldResolutionError,
  ReindexStateError,
  SchemaBindingError,
  SchemaError,
} from "@searchmap/sdk";

/**
 * Base CLI error class
 */
export class CliError extends Error {
  exitCode: number;

  constructor(message: string, options?: { exitCode?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "CliError";
    this.exitCode = options?.exitCode ?? 1;
  }
}

/**
 * Map SDK errors to CLI exit codes
 * - 0: success
 * - 1: usage/IO/unknown error
 * - 3: invalid definition, schema or configuration
 * - 4: a record is missing a required field
 * - 5: the search backend rejected a write
 * - 6: a reindex was already running
 */
export function mapSdkErrorToExitCode(error: unknown): number {
  if (error instanceof CliError) {
    return error.exitCode;
  }

  if (error instanceof CommanderError) {
    return error.exitCode;
  }

  if (error instanceof ConfigurationError || error instanceof SchemaBindingError || error instanceof SchemaError) {
    return 3;
  }

  if (error instanceof FieldResolutionError) {
    return 4;
  }

  if (error instanceof BackendWriteError) {
    return 5;
  }

  if (error instanceof ReindexStateError) {
    return 6;
  }

  return 1;
}

/**
 * Format an error for CLI output
 */
export function formatCliError(error: unknown, verbose = false): string {
  if (error instanceof Error) {
    let message = error.message;

    // Redact large payloads from error messages
    if (message.length > 2000) {
      message = message.substring(0, 2000) + "... (truncated)";
    }

    if (verbose && error.cause) {
      message += `\n  Cause: ${error.cause instanceof Error ? error.cause.message : String(error.cause)}`;
    }

    if (verbose && error.stack) {
      message += `\n${error.stack}`;
    }

    return message;
  }

  return String(error);
}
