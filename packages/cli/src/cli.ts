#!/usr/bin/env node

/**
 * heapdex CLI entry point
 */

import { CommanderError } from "commander";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { dirname, join } from "node:path";
import { createProgram, type GlobalOptions } from "./program.js";
import { isVerbose } from "./lib/env.js";
import { formatCliError, mapSdkErrorToExitCode } from "./lib/errors.js";
import { colorize } from "./lib/render.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Read the version from package.json (one level up from src/ and dist/)
 */
function readVersion(): string {
  const packageJson: unknown = JSON.parse(readFileSync(join(__dirname, "../package.json"), "utf-8"));
  if (
    typeof packageJson === "object" &&
    packageJson !== null &&
    "version" in packageJson &&
    typeof packageJson.version === "string"
  ) {
    return packageJson.version;
  }
  return "0.0.0";
}

// Top-level error handler
async function main(): Promise<void> {
  const program = createProgram(readVersion());

  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    // Commander has already reported its own errors (and help/version output)
    if (err instanceof CommanderError) {
      process.exit(err.exitCode);
    }

    const opts = program.opts<GlobalOptions>();
    const message = formatCliError(err, (opts.verbose ?? false) || isVerbose());
    console.error(colorize(`Error: ${message}`, "red", process.stderr));

    process.exit(mapSdkErrorToExitCode(err));
  }
}

void main();
