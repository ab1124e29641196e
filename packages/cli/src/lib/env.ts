/**
 * Environment and configuration resolution
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
 * Resolve the records file
 * Priority: CLI option > HEAPDEX_RECORDS env var > default "./records.json"
 */
export function resolveRecordsPath(cliPath?: string): string {
  const file = cliPath ?? process.env.HEAPDEX_RECORDS ?? "./records.json";
  return path.resolve(expandTilde(file));
}

/**
 * Check if running in verbose mode
 */
export function isVerbose(): boolean {
  return process.env.HEAPDEX_CLI_DEBUG === "1";
}
