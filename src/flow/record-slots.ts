/**
 * Lock-striped record storage for concurrent phases.
 *
 * During the update and propagate phases every record sits in its own
 * slot with its own mutex. Steps touching different records never wait
 * on each other; steps touching the same record take turns. A step
 * should hold at most one slot lock at a time.
 */

import { Mutex } from "../concurrency/mutex.js";

export class RecordSlot<R> {
  readonly index: number;
  private record: R;
  private readonly mutex = new Mutex();

  constructor(index: number, record: R) {
    this.index = index;
    this.record = record;
  }

  /** Whether some step currently holds this record's lock */
  get isLocked(): boolean {
    return this.mutex.isLocked;
  }

  /**
   * Read the record without taking the lock.
   * Another step may be part-way through changing it.
   */
  peek(): R {
    return this.record;
  }

  /**
   * Run `fn` on the record while holding its lock.
   * Suited to records that are mutated in place.
   */
  withLock<T>(fn: (record: R) => T | Promise<T>): Promise<T> {
    return this.mutex.runExclusive(() => fn(this.record));
  }

  /**
   * Replace the record with `fn(record)` while holding its lock.
   * Suited to immutable records. Resolves to the new record.
   */
  update(fn: (record: R) => R | Promise<R>): Promise<R> {
    return this.mutex.runExclusive(async () => {
      this.record = await fn(this.record);
      return this.record;
    });
  }
}

export function createSlots<R>(records: readonly R[]): RecordSlot<R>[] {
  return records.map((record, index) => new RecordSlot(index, record));
}

export function collectRecords<R>(slots: readonly RecordSlot<R>[]): R[] {
  return slots.map((slot) => slot.peek());
}
