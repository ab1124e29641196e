/**
 * Line-oriented command shell over an engine
 *
 * Each line is one command. Errors are reported as an "error: ..." line (or
 * an {"error": ...} object in JSON mode) and the shell keeps going; only a
 * heap invariant failure ends the session.
 */

import {
  HeapInvariantError,
  type Engine,
  type EngineStats,
  type LookupResult,
  type Rid,
  type ScanResult,
} from "@heapdex/sdk";
import { parseInteger, parseJson } from "./arg.js";
import { CliError, formatCliError } from "./errors.js";
import { parseRecord, type StudentRecord } from "./records.js";
import { formatComparisons, formatRecord, formatScan, formatStats } from "./render.js";

export type ShellFormat = "text" | "json";

export interface ShellStep {
  output: string[];
  quit: boolean;
}

export interface ShellOptions {
  /** Called before each line is read */
  prompt?: () => void;
  /** Output format (default: "text") */
  format?: ShellFormat;
}

export const SHELL_HELP = [
  "insert <json>    add a record, e.g. insert {\"id\":7,\"first\":\"Ann\",\"last\":\"Lee\",\"major\":\"Art\",\"gpa\":3.1}",
  "delete <id>      soft-delete the record with this id",
  "find <id>        look up a record by id",
  "range <lo> <hi>  records with lo <= id <= hi",
  "prefix [text]    records whose last name starts with text",
  "stats            record and index counts",
  "help             show this help",
  "quit             leave the shell",
];

/**
 * Turns command results into output lines
 */
interface ShellRenderer {
  inserted(id: number, rid: Rid): string[];
  deleted(id: number, deleted: boolean): string[];
  found(id: number, result: LookupResult<StudentRecord>): string[];
  scanned(result: ScanResult<StudentRecord>): string[];
  stats(stats: EngineStats): string[];
  help(): string[];
  error(message: string): string[];
}

const textRenderer: ShellRenderer = {
  inserted: (id, rid) => [`inserted id ${id} at RID ${rid}`],
  deleted: (id, deleted) => [deleted ? `deleted id ${id}` : `not found: id ${id}`],
  found: (id, { record, comparisons }) => [
    record ? formatRecord(record) : `not found: id ${id}`,
    formatComparisons(comparisons),
  ],
  scanned: (result) => formatScan(result),
  stats: (stats) => formatStats(stats),
  help: () => SHELL_HELP,
  error: (message) => [`error: ${message}`],
};

// One compact JSON document per command
const jsonRenderer: ShellRenderer = {
  inserted: (id, rid) => [JSON.stringify({ id, rid })],
  deleted: (id, deleted) => [JSON.stringify({ id, deleted })],
  found: (_id, result) => [JSON.stringify(result)],
  scanned: (result) => [
    JSON.stringify({
      records: result.records,
      total: result.records.length,
      comparisons: result.comparisons,
    }),
  ],
  stats: (stats) => [JSON.stringify(stats)],
  help: () => [JSON.stringify({ commands: SHELL_HELP })],
  error: (message) => [JSON.stringify({ error: message })],
};

function say(output: string[]): ShellStep {
  return { output, quit: false };
}

function requireArg(args: string[], position: number, name: string): string {
  const value = args[position];
  if (value === undefined) {
    throw new CliError(`missing ${name}`);
  }
  return value;
}

/**
 * Execute one shell line
 */
export function executeShellLine(
  engine: Engine<StudentRecord>,
  line: string,
  format: ShellFormat = "text"
): ShellStep {
  const trimmed = line.trim();
  if (trimmed === "" || trimmed.startsWith("#")) {
    return say([]);
  }

  const render = format === "json" ? jsonRenderer : textRenderer;
  const [command = "", ...args] = trimmed.split(/\s+/);
  const rest = trimmed.slice(command.length).trim();

  try {
    switch (command.toLowerCase()) {
      case "insert": {
        if (rest === "") {
          throw new CliError("missing record");
        }
        const record = parseRecord(parseJson(rest, "insert"));
        return say(render.inserted(record.id, engine.insertRecord(record)));
      }

      case "delete": {
        const id = parseInteger(requireArg(args, 0, "id"), "id");
        return say(render.deleted(id, engine.deleteById(id)));
      }

      case "find": {
        const id = parseInteger(requireArg(args, 0, "id"), "id");
        return say(render.found(id, engine.findById(id)));
      }

      case "range": {
        const lo = parseInteger(requireArg(args, 0, "lo"), "lo");
        const hi = parseInteger(requireArg(args, 1, "hi"), "hi");
        return say(render.scanned(engine.rangeById(lo, hi)));
      }

      case "prefix":
        return say(render.scanned(engine.prefixByLast(rest)));

      case "stats":
        return say(render.stats(engine.stats()));

      case "help":
        return say(render.help());

      case "quit":
      case "exit":
        return { output: [], quit: true };

      default:
        return say(render.error(`unknown command "${command}" (try "help")`));
    }
  } catch (err) {
    if (err instanceof HeapInvariantError) {
      throw err;
    }
    return say(render.error(formatCliError(err)));
  }
}

/**
 * Run lines until input ends or a quit command
 * @returns Number of commands executed, comments and blank lines excluded
 */
export async function runShell(
  engine: Engine<StudentRecord>,
  lines: AsyncIterable<string>,
  write: (line: string) => void,
  options: ShellOptions = {}
): Promise<number> {
  let executed = 0;

  options.prompt?.();
  for await (const line of lines) {
    const trimmed = line.trim();
    if (trimmed !== "" && !trimmed.startsWith("#")) {
      executed++;
    }

    const step = executeShellLine(engine, line, options.format);
    step.output.forEach(write);
    if (step.quit) {
      break;
    }
    options.prompt?.();
  }

  return executed;
}
