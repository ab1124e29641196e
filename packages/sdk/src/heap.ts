/**
 * Append-only record heap
 *
 * Invariants:
 * - A record's position is its RID and never changes
 * - Records are never removed; deletion only sets `deleted`
 * - Deletion is terminal: there is no way back to live
 */

import { HeapInvariantError } from "./errors.js";
import type { IndexedRecord, Rid, StoredRecord } from "./types.js";

export class RecordHeap<R extends IndexedRecord> {
  #slots: Array<StoredRecord<R>> = [];
  #deleted = 0;

  get length(): number {
    return this.#slots.length;
  }

  get liveCount(): number {
    return this.#slots.length - this.#deleted;
  }

  get deletedCount(): number {
    return this.#deleted;
  }

  /**
   * Store a live copy of the record
   * @returns RID of the new slot (the prior heap length)
   */
  append(record: R): Rid {
    const rid = this.#slots.length;
    this.#slots.push({ ...record, deleted: false });
    return rid;
  }

  /**
   * Read a slot, live or deleted
   * @throws HeapInvariantError if the RID was never assigned
   */
  at(rid: Rid): StoredRecord<R> {
    const record = Number.isInteger(rid) ? this.#slots[rid] : undefined;
    if (record === undefined) {
      throw new HeapInvariantError(rid, this.#slots.length);
    }
    return record;
  }

  isLive(rid: Rid): boolean {
    const record = Number.isInteger(rid) ? this.#slots[rid] : undefined;
    return record !== undefined && !record.deleted;
  }

  markDeleted(rid: Rid): void {
    const record = this.at(rid);
    if (!record.deleted) {
      record.deleted = true;
      this.#deleted++;
    }
  }
}
