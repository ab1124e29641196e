/**
 * Output rendering helpers
 */

import type { EngineStats, ScanResult } from "@heapdex/sdk";
import type { StudentRecord } from "./records.js";

type Color = "red";

/**
 * Print pretty-printed JSON to stdout
 */
export function printJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

/**
 * Print lines to stdout (one per line)
 */
export function printLines(lines: string[]): void {
  lines.forEach((line) => console.log(line));
}

/**
 * Apply ANSI color only if output stream is a TTY
 */
export function colorize(
  text: string,
  color: Color,
  stream: NodeJS.WriteStream = process.stdout
): string {
  if (!(stream.isTTY ?? false)) {
    return text;
  }

  const codes: Record<Color, string> = {
    red: "\x1b[31m",
  };

  const reset = "\x1b[0m";
  return `${codes[color]}${text}${reset}`;
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? "" : "s"}`;
}

/**
 * One-line summary of a record, e.g. "#3 Smith, Ann (Math, GPA 3.50)"
 */
export function formatRecord(record: Readonly<StudentRecord>): string {
  return `#${record.id} ${record.last}, ${record.first} (${record.major}, GPA ${record.gpa.toFixed(2)})`;
}

export function formatComparisons(comparisons: number): string {
  return plural(comparisons, "comparison");
}

/**
 * Records of a scan followed by a summary line
 * @param limit - Cap on printed records; the summary still reports the full count
 */
export function formatScan(result: ScanResult<StudentRecord>, limit?: number): string[] {
  const shown = limit === undefined ? result.records : result.records.slice(0, limit);
  let summary = `${plural(result.records.length, "record")}, ${formatComparisons(result.comparisons)}`;
  if (shown.length < result.records.length) {
    summary += ` (showing ${shown.length})`;
  }
  return [...shown.map(formatRecord), summary];
}

export function formatStats(stats: EngineStats): string[] {
  return [
    `Records: ${stats.records} (${stats.live} live, ${stats.deleted} deleted)`,
    `id index: ${plural(stats.idIndex.keys, "key")}, height ${stats.idIndex.height}`,
    `last index: ${plural(stats.lastIndex.keys, "key")}, height ${stats.lastIndex.height}`,
  ];
}
