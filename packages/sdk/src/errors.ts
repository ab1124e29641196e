/**
 * Error types for heapdex operations
 *
 * Invariants:
 * - "Not found" is never an error: lookups return null, false or an empty list
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 */

/**
 * Base class for all heapdex errors
 */
export abstract class HeapdexError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when a record does not carry an integer id and a string last name
 */
export class InvalidRecordError extends HeapdexError {
  readonly code = "E_RECORD";

  constructor(reason: string, options?: ErrorOptions) {
    super(`Invalid record: ${reason}`, options);
  }
}

/**
 * Thrown under the "reject" policy when an id already maps to a live record
 */
export class DuplicateIdError extends HeapdexError {
  readonly code = "E_DUPLICATE";

  constructor(
    public readonly id: number,
    public readonly rid: number,
    options?: ErrorOptions
  ) {
    super(`Duplicate id ${id}: already stored at RID ${rid}`, options);
  }
}

/**
 * Thrown when an index references a heap slot that does not exist.
 * This is a programming-invariant failure, not a recoverable condition.
 */
export class HeapInvariantError extends HeapdexError {
  readonly code = "E_INVARIANT";

  constructor(
    public readonly rid: number,
    public readonly length: number,
    options?: ErrorOptions
  ) {
    super(`RID ${rid} is outside the heap (length ${length})`, options);
  }
}
