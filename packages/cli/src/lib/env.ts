/**
 * Environment and path resolution
 */

import * as path from "node:path";
import { homedir } from "node:os";

/**
 * Expand tilde (~) to home directory
 */
function expandTilde(input: string): string {
  if (!input.startsWith("~")) {
    return input;
  }

  if (input === "~") {
    return homedir();
  }

  const match = input.match(/^~([\\/]|$)(.*)/);
  if (!match) {
    // Leave "~user" style references untouched for now.
    return input;
  }

  const rest = match[2] ?? "";
  return path.join(homedir(), rest);
}

/**
 * Resolve a file argument to an absolute path
 */
export function resolveFilePath(input: string): string {
  return path.resolve(expandTilde(input));
}

/**
 * Check if running in verbose mode
 */
export function isVerbose(): boolean {
  return process.env.SEARCHMAP_CLI_DEBUG === "1";
}

/**
 * Options shared by every command
 */
export type GlobalOptions = {
  verbose?: boolean;
  quiet?: boolean;
};
