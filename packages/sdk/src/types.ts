/**
 * Core types for heapdex
 */

/**
 * Record Identifier: the stable position of a record in the heap
 */
export type Rid = number;

/**
 * Three-way key comparison (negative, zero or positive)
 */
export type Comparator<K> = (a: K, b: K) => number;

/**
 * Callback invoked once per key by a range traversal
 */
export type RangeVisitor<K, V> = (key: K, value: V) => void;

/**
 * Fields the engine indexes. Every other field is carried through untouched.
 */
export interface IndexedRecord {
  /** Unique integer identifier */
  id: number;
  /** Grouping field, indexed case-insensitively */
  last: string;
}

/**
 * A record as held in the heap, with its soft-delete flag
 */
export type StoredRecord<R extends IndexedRecord> = R & { deleted: boolean };

/**
 * Policy for inserting an id that already maps to a live record
 */
export type DuplicateIdPolicy = "upsert" | "reject";

/**
 * Options for creating an engine
 */
export interface EngineOptions {
  /** Duplicate id handling (default: "upsert") */
  duplicateIds?: DuplicateIdPolicy;
  /** Upper bound used by prefix scans over the last-name index (default: "\uffff") */
  prefixSentinel?: string;
}

/**
 * Result of a point lookup
 */
export interface LookupResult<R extends IndexedRecord> {
  /** Matching live record, or null */
  record: Readonly<StoredRecord<R>> | null;
  /** Key comparisons performed by this lookup */
  comparisons: number;
}

/**
 * Result of a range or prefix scan
 */
export interface ScanResult<R extends IndexedRecord> {
  /** Matching live records */
  records: Array<Readonly<StoredRecord<R>>>;
  /** Key comparisons performed by this scan */
  comparisons: number;
}

/**
 * Shape statistics for one ordered index
 */
export interface IndexStats {
  keys: number;
  height: number;
}

/**
 * Engine statistics
 */
export interface EngineStats {
  /** Heap slots, live and deleted */
  records: number;
  live: number;
  deleted: number;
  idIndex: IndexStats;
  lastIndex: IndexStats;
}
