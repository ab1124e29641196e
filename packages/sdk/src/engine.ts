/**
 * Engine: one record heap and two ordered indexes kept mutually consistent
 *
 * - idIndex: record id -> RID (unique)
 * - lastIndex: lowercase last name -> bucket of RIDs (non-unique)
 *
 * Invariants:
 * - idIndex holds an id iff the RID it maps to is live
 * - lastIndex never holds an empty bucket
 * - A deleted record is never returned, whatever the indexes say
 * - Each query resets the counter of the index it uses, so the reported
 *   comparison count covers exactly that call
 */

import { DuplicateIdError, HeapInvariantError } from "./errors.js";
import { RecordHeap } from "./heap.js";
import { OrderedIndex } from "./ordered-index.js";
import { logger } from "./observability/logs.js";
import { metrics } from "./observability/metrics.js";
import { validateRecord } from "./validation.js";
import type {
  DuplicateIdPolicy,
  EngineOptions,
  EngineStats,
  IndexedRecord,
  LookupResult,
  Rid,
  ScanResult,
  StoredRecord,
} from "./types.js";

/**
 * Sorts after every lowercase name in the Basic Multilingual Plane
 */
export const DEFAULT_PREFIX_SENTINEL = "\uffff";

/**
 * Case folding applied to last names and prefixes
 */
export function foldCase(value: string): string {
  return value.toLowerCase();
}

export class Engine<R extends IndexedRecord> {
  readonly #heap = new RecordHeap<R>();
  readonly #idIndex = OrderedIndex.natural<number, Rid>();
  readonly #lastIndex = OrderedIndex.natural<string, Rid[]>();
  /** Bucket key of each RID, captured when the record was inserted */
  readonly #bucketKeys: string[] = [];
  readonly #duplicateIds: DuplicateIdPolicy;
  readonly #prefixSentinel: string;

  constructor(options: EngineOptions = {}) {
    this.#duplicateIds = options.duplicateIds ?? "upsert";
    this.#prefixSentinel = options.prefixSentinel ?? DEFAULT_PREFIX_SENTINEL;
  }

  /**
   * Append a record and index it
   *
   * Under the default "upsert" policy an id that is already live is remapped
   * to the new RID; the older record stays live in its last-name bucket.
   *
   * @returns RID of the new record
   * @throws InvalidRecordError if the record lacks an integer id or string last name
   * @throws DuplicateIdError under the "reject" policy when the id is live
   */
  insertRecord(record: R): Rid {
    validateRecord(record);

    const previous = this.#idIndex.find(record.id);
    if (previous !== undefined && this.#duplicateIds === "reject") {
      throw new DuplicateIdError(record.id, previous);
    }

    const rid = this.#heap.append(record);
    this.#idIndex.insert(record.id, rid);
    if (previous !== undefined) {
      logger.warn("engine.duplicate.overwrite", {
        index: "id",
        id: record.id,
        rid,
        details: { previousRid: previous },
      });
    }

    const key = foldCase(record.last);
    this.#bucketKeys.push(key);

    const bucket = this.#lastIndex.find(key);
    if (bucket) {
      bucket.push(rid);
    } else {
      this.#lastIndex.insert(key, [rid]);
    }

    logger.debug("engine.insert", { id: record.id, rid });
    return rid;
  }

  /**
   * Soft-delete the live record with this id
   * @returns false if no live record has the id
   */
  deleteById(id: number): boolean {
    const rid = Number.isNaN(id) ? undefined : this.#idIndex.find(id);
    if (rid === undefined) {
      logger.debug("engine.delete.miss", { index: "id", id });
      return false;
    }

    const key = this.#bucketKeyOf(rid);
    this.#heap.markDeleted(rid);
    this.#idIndex.erase(id);

    const bucket = this.#lastIndex.find(key);
    if (bucket) {
      const at = bucket.indexOf(rid);
      if (at !== -1) {
        bucket.splice(at, 1);
      }
      if (bucket.length === 0) {
        this.#lastIndex.erase(key);
      }
    }

    logger.debug("engine.delete", { id, rid });
    return true;
  }

  /**
   * Point lookup by id
   */
  findById(id: number): LookupResult<R> {
    this.#idIndex.resetMetrics();

    // NaN compares equal to everything under natural order
    const rid = Number.isNaN(id) ? undefined : this.#idIndex.find(id);
    const record = rid !== undefined && this.#heap.isLive(rid) ? this.#heap.at(rid) : null;

    const comparisons = this.#idIndex.comparisons;
    metrics.recordLookup("id", comparisons, record !== null);
    return { record, comparisons };
  }

  /**
   * Live records with lo <= id <= hi, ascending by id
   */
  rangeById(lo: number, hi: number): ScanResult<R> {
    this.#idIndex.resetMetrics();

    const records: Array<StoredRecord<R>> = [];
    if (!Number.isNaN(lo) && !Number.isNaN(hi)) {
      this.#idIndex.rangeApply(lo, hi, (_id, rid) => {
        if (this.#heap.isLive(rid)) {
          records.push(this.#heap.at(rid));
        }
      });
    }

    const comparisons = this.#idIndex.comparisons;
    metrics.recordLookup("id", comparisons, records.length > 0);
    return { records, comparisons };
  }

  /**
   * Live records whose last name starts with `prefix`, case-insensitively.
   * Buckets come back in last-name order; records within a bucket keep
   * insertion order.
   */
  prefixByLast(prefix: string): ScanResult<R> {
    this.#lastIndex.resetMetrics();

    const folded = foldCase(prefix);
    const records: Array<StoredRecord<R>> = [];

    // The range admits keys that sort after the prefix without starting with it
    this.#lastIndex.rangeApply(folded, this.#prefixSentinel, (key, rids) => {
      if (!key.startsWith(folded)) return;
      for (const rid of rids) {
        if (this.#heap.isLive(rid)) {
          records.push(this.#heap.at(rid));
        }
      }
    });

    const comparisons = this.#lastIndex.comparisons;
    metrics.recordLookup("last", comparisons, records.length > 0);
    return { records, comparisons };
  }

  /**
   * Direct heap read
   * @returns the record, or null if the RID is unassigned or deleted
   */
  recordAt(rid: Rid): Readonly<StoredRecord<R>> | null {
    return this.#heap.isLive(rid) ? this.#heap.at(rid) : null;
  }

  stats(): EngineStats {
    return {
      records: this.#heap.length,
      live: this.#heap.liveCount,
      deleted: this.#heap.deletedCount,
      idIndex: { keys: this.#idIndex.size, height: this.#idIndex.height() },
      lastIndex: { keys: this.#lastIndex.size, height: this.#lastIndex.height() },
    };
  }

  #bucketKeyOf(rid: Rid): string {
    const key = this.#bucketKeys[rid];
    if (key === undefined) {
      throw new HeapInvariantError(rid, this.#heap.length);
    }
    return key;
  }
}

/**
 * Create an empty engine
 */
export function createEngine<R extends IndexedRecord>(options?: EngineOptions): Engine<R> {
  return new Engine<R>(options);
}
