/**
 * Validation utilities for engine inputs
 */

import { InvalidRecordError } from "./errors.js";

/**
 * Validate that a value carries the fields the engine indexes
 * @throws InvalidRecordError if `id` is not a safe integer or `last` is not a string
 */
export function validateRecord(record: unknown): void {
  if (record === null || typeof record !== "object" || Array.isArray(record)) {
    throw new InvalidRecordError("record must be an object");
  }

  const id = "id" in record ? record.id : undefined;
  const last = "last" in record ? record.last : undefined;

  if (typeof id !== "number" || !Number.isSafeInteger(id)) {
    throw new InvalidRecordError(`id must be an integer, got ${String(id)}`);
  }

  if (typeof last !== "string") {
    throw new InvalidRecordError(`last must be a string (id ${id})`);
  }
}
