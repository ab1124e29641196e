/**
 * Engine event log
 *
 * One line per event:
 *   [timestamp] [LEVEL] [event] index=<name> id=<id> rid=<rid> {details}
 *
 * Debug events print only when HEAPDEX_DEBUG is set.
 */

import type { IndexName } from "./metrics.js";

export type LogLevel = "debug" | "warn";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  /** Index the event concerns */
  index?: IndexName;
  /** Record id */
  id?: number;
  rid?: number;
  details?: Record<string, unknown>;
}

export type LogFields = Omit<LogEntry, "timestamp" | "level" | "event">;

/**
 * Render an entry as a single log line
 */
export function formatLogEntry(entry: LogEntry): string {
  const parts = [`[${entry.timestamp}] [${entry.level.toUpperCase()}] [${entry.event}]`];

  if (entry.index !== undefined) {
    parts.push(`index=${entry.index}`);
  }
  if (entry.id !== undefined) {
    parts.push(`id=${entry.id}`);
  }
  if (entry.rid !== undefined) {
    parts.push(`rid=${entry.rid}`);
  }
  if (entry.details && Object.keys(entry.details).length > 0) {
    parts.push(JSON.stringify(entry.details));
  }

  return parts.join(" ");
}

class Logger {
  #enabled = true;

  log(level: LogLevel, event: string, fields: LogFields = {}): void {
    if (!this.#enabled) return;
    if (level === "debug" && !process.env.HEAPDEX_DEBUG) return;

    const line = formatLogEntry({
      timestamp: new Date().toISOString(),
      level,
      event,
      ...fields,
    });

    if (level === "debug") {
      console.debug(line);
    } else {
      console.warn(line);
    }
  }

  debug(event: string, fields?: LogFields): void {
    this.log("debug", event, fields);
  }

  warn(event: string, fields?: LogFields): void {
    this.log("warn", event, fields);
  }

  /**
   * Enable/disable logging
   */
  setEnabled(enabled: boolean): void {
    this.#enabled = enabled;
  }
}

/**
 * Global logger instance
 */
export const logger = new Logger();
