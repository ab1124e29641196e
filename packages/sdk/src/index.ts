/**
 * heapdex SDK
 *
 * An append-only record heap indexed by two instrumented binary search trees
 */

// Re-export types
export type {
  Rid,
  Comparator,
  RangeVisitor,
  IndexedRecord,
  StoredRecord,
  DuplicateIdPolicy,
  EngineOptions,
  LookupResult,
  ScanResult,
  IndexStats,
  EngineStats,
} from "./types.js";

// Core structures
export { OrderedIndex, naturalOrder } from "./ordered-index.js";
export type { NaturalKey } from "./ordered-index.js";
export { RecordHeap } from "./heap.js";
export { Engine, createEngine, foldCase, DEFAULT_PREFIX_SENTINEL } from "./engine.js";

// Re-export utilities
export { validateRecord } from "./validation.js";

// Observability
export { logger, formatLogEntry } from "./observability/logs.js";
export type { LogLevel, LogEntry, LogFields } from "./observability/logs.js";
export { metrics } from "./observability/metrics.js";
export type { IndexName, IndexMetrics } from "./observability/metrics.js";

// Re-export errors
export { HeapdexError, InvalidRecordError, DuplicateIdError, HeapInvariantError } from "./errors.js";
