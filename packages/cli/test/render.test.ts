/**
 * Unit tests for output rendering
 */

import { describe, it, expect, afterEach, vi } from "vitest";
import { formatRecord, formatScan, printJson, printLines } from "../src/lib/render.js";
import { SAMPLE_RECORDS } from "./fixtures.js";

describe("render", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should pretty-print JSON in one write", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);

    printJson({ comparisons: 3 });

    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith('{\n  "comparisons": 3\n}');
  });

  it("should print one line per entry", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);

    printLines(["a", "b"]);

    expect(log.mock.calls).toEqual([["a"], ["b"]]);
  });

  it("should format a record with a two-decimal GPA", () => {
    expect(formatRecord({ id: 9, first: "Lea", last: "Moreau", major: "Law", gpa: 3 })).toBe(
      "#9 Moreau, Lea (Law, GPA 3.00)"
    );
  });

  it("should note when a limit hides records", () => {
    const result = { records: SAMPLE_RECORDS.map((r) => ({ ...r, deleted: false })), comparisons: 1 };

    expect(formatScan(result, 1)).toEqual([
      "#3 Smith, Ann (Math, GPA 3.50)",
      "3 records, 1 comparison (showing 1)",
    ]);
    expect(formatScan(result, 5)).toHaveLength(4);
  });
});
