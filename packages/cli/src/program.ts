/**
 * heapdex command definitions
 */

import { Command } from "commander";
import { createInterface } from "node:readline";
import { createEngine, type Engine, type ScanResult } from "@heapdex/sdk";
import { parseInteger, parseNonNegativeInt } from "./lib/arg.js";
import { resolveRecordsPath } from "./lib/env.js";
import { CliError } from "./lib/errors.js";
import { isStdinTTY } from "./lib/io.js";
import { loadEngine, type StudentRecord } from "./lib/records.js";
import {
  colorize,
  formatComparisons,
  formatRecord,
  formatScan,
  formatStats,
  printJson,
  printLines,
} from "./lib/render.js";
import { runShell } from "./lib/shell.js";
import { withTiming } from "./lib/telemetry.js";

export type GlobalOptions = {
  records?: string;
  json?: boolean;
  strict?: boolean;
  verbose?: boolean;
};

interface ScanOptions {
  limit?: number;
}

/**
 * Build the command tree. Commander errors are thrown rather than exiting,
 * so callers decide the exit code.
 */
export function createProgram(version: string): Command {
  const program = new Command();

  // Configure error output with color
  program
    .configureOutput({
      writeErr: (str) => process.stderr.write(colorize(str, "red", process.stderr)),
    })
    .exitOverride();

  // Global options
  program
    .name("heapdex")
    .description("heapdex - student records indexed by instrumented binary search trees")
    .version(version)
    .option("--records <path>", "Records JSON file")
    .option("--json", "Output as JSON")
    .option("--strict", "Reject duplicate ids in the records file")
    .option("--verbose", "Verbose diagnostics");

  async function openEngine(): Promise<Engine<StudentRecord>> {
    const opts = program.opts<GlobalOptions>();
    return loadEngine(resolveRecordsPath(opts.records), {
      duplicateIds: opts.strict ? "reject" : "upsert",
    });
  }

  function printScan(result: ScanResult<StudentRecord>, options: ScanOptions): void {
    if (program.opts<GlobalOptions>().json) {
      const shown =
        options.limit === undefined ? result.records : result.records.slice(0, options.limit);
      printJson({ records: shown, total: result.records.length, comparisons: result.comparisons });
      return;
    }
    printLines(formatScan(result, options.limit));
  }

  // Find command
  program
    .command("find")
    .description("Look up a record by id")
    .argument("<id>", "Record id", (value: string) => parseInteger(value, "id"))
    .action(async (id: number) => {
      await withTiming("cli.find", async () => {
        const engine = await openEngine();
        const result = engine.findById(id);

        if (program.opts<GlobalOptions>().json) {
          printJson(result);
        } else if (result.record) {
          printLines([formatRecord(result.record), formatComparisons(result.comparisons)]);
        }

        if (!result.record) {
          throw new CliError(
            `Record not found: ${id} (${formatComparisons(result.comparisons)})`,
            { exitCode: 2 }
          );
        }
      });
    });

  // Range command
  program
    .command("range")
    .description("List records with lo <= id <= hi, ascending by id")
    .argument("<lo>", "Lower bound (inclusive)", (value: string) => parseInteger(value, "lo"))
    .argument("<hi>", "Upper bound (inclusive)", (value: string) => parseInteger(value, "hi"))
    .option("--limit <n>", "Maximum records to print", (value: string) =>
      parseNonNegativeInt(value, "limit")
    )
    .action(async (lo: number, hi: number, options: ScanOptions) => {
      await withTiming("cli.range", async () => {
        const engine = await openEngine();
        printScan(engine.rangeById(lo, hi), options);
      });
    });

  // Prefix command
  program
    .command("prefix")
    .description("List records whose last name starts with a prefix (case-insensitive)")
    .argument("<prefix>", "Last name prefix")
    .option("--limit <n>", "Maximum records to print", (value: string) =>
      parseNonNegativeInt(value, "limit")
    )
    .action(async (prefix: string, options: ScanOptions) => {
      await withTiming("cli.prefix", async () => {
        const engine = await openEngine();
        printScan(engine.prefixByLast(prefix), options);
      });
    });

  // Stats command
  program
    .command("stats")
    .description("Show record counts and index shape")
    .action(async () => {
      await withTiming("cli.stats", async () => {
        const engine = await openEngine();
        const stats = engine.stats();

        if (program.opts<GlobalOptions>().json) {
          printJson(stats);
        } else {
          printLines(formatStats(stats));
        }
      });
    });

  // Shell command
  program
    .command("shell")
    .description("Run commands read line by line from stdin (one JSON line per command with --json)")
    .option("--empty", "Start from an empty engine instead of the records file")
    .action(async (options: { empty?: boolean }) => {
      const engine = options.empty ? createEngine<StudentRecord>() : await openEngine();
      const interactive = isStdinTTY();
      const rl = createInterface({
        input: process.stdin,
        output: interactive ? process.stdout : undefined,
        terminal: interactive,
      });
      rl.setPrompt("heapdex> ");

      try {
        await runShell(engine, rl, (line) => console.log(line), {
          prompt: interactive ? () => rl.prompt() : undefined,
          format: program.opts<GlobalOptions>().json ? "json" : "text",
        });
      } finally {
        rl.close();
      }
    });

  return program;
}
