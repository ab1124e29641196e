/**
 * Integration tests for CLI commands, run in-process
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { join } from "node:path";
import { CommanderError } from "commander";
import { DuplicateIdError, logger } from "@heapdex/sdk";
import { createTempDir, removeDir, writeJsonFile } from "@heapdex/testkit";
import { createProgram } from "../src/program.js";
import { CliError } from "../src/lib/errors.js";
import { SAMPLE_RECORDS } from "./fixtures.js";

/**
 * Helper to run CLI command, capturing console.log output
 */
async function runCli(args: string[]): Promise<{ stdout: string[]; error: unknown }> {
  const stdout: string[] = [];
  const log = vi.spyOn(console, "log").mockImplementation((...parts: unknown[]) => {
    stdout.push(parts.map(String).join(" "));
  });
  const stderr = vi.spyOn(process.stderr, "write").mockImplementation(() => true);

  try {
    await createProgram("0.0.0-test").parseAsync(args, { from: "user" });
    return { stdout, error: undefined };
  } catch (error) {
    return { stdout, error };
  } finally {
    log.mockRestore();
    stderr.mockRestore();
  }
}

describe("CLI", () => {
  let tmpDir: string;
  let recordsFile: string;
  let originalRecords: string | undefined;

  beforeEach(async () => {
    logger.setEnabled(false);
    originalRecords = process.env.HEAPDEX_RECORDS;
    delete process.env.HEAPDEX_RECORDS;

    tmpDir = await createTempDir();
    recordsFile = await writeJsonFile(join(tmpDir, "records.json"), SAMPLE_RECORDS);
  });

  afterEach(async () => {
    logger.setEnabled(true);
    if (originalRecords !== undefined) {
      process.env.HEAPDEX_RECORDS = originalRecords;
    } else {
      delete process.env.HEAPDEX_RECORDS;
    }
    await removeDir(tmpDir);
  });

  describe("find", () => {
    it("should print the record and its comparisons", async () => {
      const { stdout, error } = await runCli(["--records", recordsFile, "find", "2"]);

      expect(error).toBeUndefined();
      expect(stdout).toEqual(["#2 Jones, Cy (History, GPA 4.00)", "3 comparisons"]);
    });

    it("should print JSON with --json", async () => {
      const { stdout } = await runCli(["--records", recordsFile, "--json", "find", "3"]);

      expect(stdout).toHaveLength(1);
      expect(JSON.parse(stdout[0] ?? "")).toEqual({
        record: { ...SAMPLE_RECORDS[0], deleted: false },
        comparisons: 1,
      });
    });

    it("should fail with exit code 2 for an unknown id", async () => {
      const { stdout, error } = await runCli(["--records", recordsFile, "find", "42"]);

      expect(stdout).toEqual([]);
      expect(error).toBeInstanceOf(CliError);
      if (error instanceof CliError) {
        expect(error.exitCode).toBe(2);
        expect(error.message).toBe("Record not found: 42 (1 comparison)");
      }
    });

    it("should reject a non-integer id as a usage error", async () => {
      const { error } = await runCli(["--records", recordsFile, "find", "abc"]);

      expect(error).toBeInstanceOf(CommanderError);
      if (error instanceof CommanderError) {
        expect(error.code).toBe("commander.invalidArgument");
        expect(error.exitCode).toBe(1);
      }
    });
  });

  describe("range", () => {
    it("should list records ascending by id", async () => {
      const { stdout } = await runCli(["--records", recordsFile, "range", "2", "3"]);

      expect(stdout).toEqual([
        "#2 Jones, Cy (History, GPA 4.00)",
        "#3 Smith, Ann (Math, GPA 3.50)",
        "2 records, 6 comparisons",
      ]);
    });

    it("should cap printed records with --limit", async () => {
      const { stdout } = await runCli(["--records", recordsFile, "range", "1", "3", "--limit", "1"]);

      expect(stdout).toEqual([
        "#1 smith, Bob (Physics, GPA 2.75)",
        "3 records, 6 comparisons (showing 1)",
      ]);
    });
  });

  describe("prefix", () => {
    it("should match last names case-insensitively", async () => {
      const { stdout } = await runCli(["--records", recordsFile, "--json", "prefix", "SM"]);

      expect(JSON.parse(stdout[0] ?? "")).toEqual({
        records: [
          { ...SAMPLE_RECORDS[0], deleted: false },
          { ...SAMPLE_RECORDS[1], deleted: false },
        ],
        total: 2,
        comparisons: 4,
      });
    });
  });

  describe("stats", () => {
    it("should describe the heap and both indexes", async () => {
      const { stdout } = await runCli(["--records", recordsFile, "stats"]);

      expect(stdout).toEqual([
        "Records: 3 (3 live, 0 deleted)",
        "id index: 3 keys, height 3",
        "last index: 2 keys, height 2",
      ]);
    });

    it("should read the records path from HEAPDEX_RECORDS", async () => {
      process.env.HEAPDEX_RECORDS = recordsFile;

      const { stdout } = await runCli(["--json", "stats"]);

      expect(JSON.parse(stdout[0] ?? "")).toEqual({
        records: 3,
        live: 3,
        deleted: 0,
        idIndex: { keys: 3, height: 3 },
        lastIndex: { keys: 2, height: 2 },
      });
    });
  });

  describe("records file errors", () => {
    it("should report a missing file", async () => {
      const missing = join(tmpDir, "absent.json");
      const { error } = await runCli(["--records", missing, "stats"]);

      expect(error).toBeInstanceOf(CliError);
      if (error instanceof CliError) {
        expect(error.message).toBe(`Cannot read records file ${missing}`);
        expect(error.exitCode).toBe(1);
      }
    });

    it("should reject duplicate ids with --strict", async () => {
      const file = await writeJsonFile(join(tmpDir, "dupes.json"), [
        ...SAMPLE_RECORDS,
        { id: 1, first: "Eve", last: "Moss", major: "Law", gpa: 3.2 },
      ]);

      const { error } = await runCli(["--records", file, "--strict", "stats"]);

      expect(error).toBeInstanceOf(DuplicateIdError);
    });

    it("should let the later duplicate win without --strict", async () => {
      const file = await writeJsonFile(join(tmpDir, "dupes.json"), [
        ...SAMPLE_RECORDS,
        { id: 1, first: "Eve", last: "Moss", major: "Law", gpa: 3.2 },
      ]);

      const { stdout } = await runCli(["--records", file, "find", "1"]);

      expect(stdout).toEqual(["#1 Moss, Eve (Law, GPA 3.20)", "2 comparisons"]);
    });
  });
});
