/**
 * Command diagnostics: wall time plus the lookup cost the engine recorded
 * while the command ran. Written to stderr when HEAPDEX_CLI_DEBUG=1.
 */

import { performance } from "node:perf_hooks";
import { metrics } from "@heapdex/sdk";
import { isVerbose } from "./env.js";
import { writeStderr } from "./io.js";

const SANITIZE_NEWLINES = /[\r\n]+/g;

/**
 * Sanitize metric part by removing newlines
 */
function sanitizeMetricPart(part: unknown): string {
  return String(part).replace(SANITIZE_NEWLINES, " ").trim();
}

/**
 * Lookup counts and p95 comparisons per index that saw any lookups
 */
function lookupFields(): Record<string, number> {
  const fields: Record<string, number> = {};
  for (const [index, indexMetrics] of metrics.getAllMetrics()) {
    if (indexMetrics.lookups === 0) continue;
    fields[`${index}_lookups`] = indexMetrics.lookups;
    fields[`${index}_p95_comparisons`] = metrics.getP95Comparisons(index);
  }
  return fields;
}

/**
 * Emit a metric to stderr if verbose mode is enabled
 */
export function emitMetric(key: string, fields: Record<string, unknown>): void {
  if (!isVerbose()) {
    return;
  }

  const parts = [`metric ${sanitizeMetricPart(key)}`];
  for (const [k, v] of Object.entries(fields)) {
    parts.push(`${sanitizeMetricPart(k)}=${sanitizeMetricPart(v)}`);
  }

  writeStderr(parts.join(" ") + "\n");
}

/**
 * Run a command and emit its duration, outcome and lookup cost
 */
export async function withTiming<T>(label: string, fn: () => Promise<T>): Promise<T> {
  const start = performance.now();
  let success = false;

  try {
    const result = await fn();
    success = true;
    return result;
  } finally {
    emitMetric(label, {
      duration_ms: (performance.now() - start).toFixed(1),
      success,
      ...lookupFields(),
    });
  }
}
