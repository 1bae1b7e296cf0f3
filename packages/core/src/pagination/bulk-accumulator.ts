import type { BulkEntry, SeriesRecord, TimePoint } from '../models/index.js';
import { tagSetKey } from '../models/index.js';

export type PageDirection = 'forward' | 'backward';

/**
 * Ordered collection of bulk entries keyed by timestamp.
 *
 * Records of an entry are keyed by their tag-set, so a record fetched later
 * for the same timestamp and series replaces the earlier one. New
 * timestamps from a page are appended (forward) or prepended as one block
 * (backward), which keeps the order chronological without re-sorting.
 */
export class BulkAccumulator {
  private readonly entries = new Map<TimePoint, Map<string, SeriesRecord>>();
  private order: TimePoint[] = [];

  get size(): number {
    return this.order.length;
  }

  /**
   * Merge one page of entries into the accumulator
   */
  merge(page: readonly BulkEntry[], direction: PageDirection): void {
    const added: TimePoint[] = [];

    for (const entry of page) {
      let group = this.entries.get(entry.t);
      if (!group) {
        group = new Map();
        this.entries.set(entry.t, group);
        added.push(entry.t);
      }
      for (const record of entry.bulk) {
        group.set(tagSetKey(record), record);
      }
    }

    this.order = direction === 'forward'
      ? [...this.order, ...added]
      : [...added, ...this.order];
  }

  /**
   * Entries in accumulator order
   */
  toEntries(): BulkEntry[] {
    return this.order.map((t) => ({
      t,
      bulk: [...(this.entries.get(t)?.values() ?? [])],
    }));
  }
}
