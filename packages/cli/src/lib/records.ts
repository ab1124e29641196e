/**
 * Student record schema and records-file loading
 */

import { z } from "zod";
import { InvalidArgumentError } from "commander";
import { createEngine, type Engine, type EngineOptions } from "@heapdex/sdk";
import { CliError } from "./errors.js";
import { readJsonFromFile } from "./io.js";

export const StudentRecordSchema = z.object({
  id: z.number().int(),
  first: z.string(),
  last: z.string(),
  major: z.string(),
  gpa: z.number().min(0).max(4),
});

export type StudentRecord = z.infer<typeof StudentRecordSchema>;

export const RecordsFileSchema = z.array(StudentRecordSchema);

// Keep messages readable when a whole file is malformed
const MAX_REPORTED_ISSUES = 5;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .slice(0, MAX_REPORTED_ISSUES)
    .map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${where}: ${issue.message}`;
    })
    .join("; ");
}

/**
 * Validate a single record
 * @throws CliError describing every failing field
 */
export function parseRecord(data: unknown): StudentRecord {
  const result = StudentRecordSchema.safeParse(data);
  if (!result.success) {
    throw new CliError(`Invalid record: ${formatIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Validate the contents of a records file
 * @param source - Where the data came from, for error messages
 */
export function parseRecords(data: unknown, source: string): StudentRecord[] {
  const result = RecordsFileSchema.safeParse(data);
  if (!result.success) {
    throw new CliError(`Invalid records in ${source}: ${formatIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Build an engine from a records file, inserting in file order
 * @throws CliError if the file cannot be read or fails validation
 * @throws DuplicateIdError under the "reject" policy
 */
export async function loadEngine(
  filePath: string,
  options: EngineOptions = {}
): Promise<Engine<StudentRecord>> {
  let data: unknown;
  try {
    data = await readJsonFromFile(filePath);
  } catch (err) {
    if (err instanceof InvalidArgumentError) {
      throw new CliError(err.message, { cause: err });
    }
    throw new CliError(`Cannot read records file ${filePath}`, { cause: err });
  }

  const engine = createEngine<StudentRecord>(options);
  for (const record of parseRecords(data, filePath)) {
    engine.insertRecord(record);
  }
  return engine;
}
