/**
 * Unit tests for command diagnostics
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { metrics } from "@heapdex/sdk";
import { emitMetric, withTiming } from "../src/lib/telemetry.js";

describe("telemetry", () => {
  let originalDebug: string | undefined;
  let written: string[];

  beforeEach(() => {
    originalDebug = process.env.HEAPDEX_CLI_DEBUG;
    metrics.reset();
    written = [];
    vi.spyOn(process.stderr, "write").mockImplementation((chunk: string | Uint8Array) => {
      written.push(String(chunk));
      return true;
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    if (originalDebug !== undefined) {
      process.env.HEAPDEX_CLI_DEBUG = originalDebug;
    } else {
      delete process.env.HEAPDEX_CLI_DEBUG;
    }
  });

  it("should stay silent unless HEAPDEX_CLI_DEBUG=1", () => {
    delete process.env.HEAPDEX_CLI_DEBUG;

    emitMetric("cli.find", { success: true });

    expect(written).toEqual([]);
  });

  it("should write one sanitized line per metric", () => {
    process.env.HEAPDEX_CLI_DEBUG = "1";

    emitMetric("cli.find", { success: true, note: "two\nlines" });

    expect(written).toEqual(["metric cli.find success=true note=two lines\n"]);
  });

  it("should report lookup cost recorded during the command", async () => {
    process.env.HEAPDEX_CLI_DEBUG = "1";

    const result = await withTiming("cli.range", async () => {
      metrics.recordLookup("id", 6, true);
      metrics.recordLookup("id", 2, false);
      return 42;
    });

    expect(result).toBe(42);
    expect(written).toHaveLength(1);
    expect(written[0]).toMatch(
      /^metric cli\.range duration_ms=\d+\.\d success=true id_lookups=2 id_p95_comparisons=6\n$/
    );
  });

  it("should report failures and rethrow", async () => {
    process.env.HEAPDEX_CLI_DEBUG = "1";

    await expect(
      withTiming("cli.stats", async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");

    expect(written[0]).toMatch(/^metric cli\.stats duration_ms=\d+\.\d success=false\n$/);
  });
});
