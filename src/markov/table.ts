/**
 * Per-context frequency table
 */

import type { Outcome, ReadonlyFrequencyTable, TableEntry } from './types.js';

// Index key for the end marker; a unique symbol can never collide with a caller's value
const END_KEY: unique symbol = Symbol('end-of-sequence');

type IndexKey<T> = T | typeof END_KEY;

function indexKey<T>(outcome: Outcome<T>): IndexKey<T> {
  return outcome.kind === 'end' ? END_KEY : outcome.symbol;
}

/**
 * Counts how often each outcome followed a context.
 *
 * Entries are kept sorted by descending frequency after every `add`. Because a
 * frequency only ever grows by one, an incremented entry is moved left past
 * neighbours with a strictly lower frequency and nothing else is re-sorted.
 * Entries that tie keep their previous relative order, so the ranking is a
 * deterministic function of the order of `add` calls.
 */
export class FrequencyTable<T> implements ReadonlyFrequencyTable<T> {
  private totalObservations = 0;
  private rows: TableEntry<T>[] = [];
  private positions: Map<IndexKey<T>, number> = new Map();

  get total(): number {
    return this.totalObservations;
  }

  get size(): number {
    return this.rows.length;
  }

  add(outcome: Outcome<T>): void {
    const key = indexKey(outcome);
    const index = this.positions.get(key);

    if (index === undefined) {
      this.positions.set(key, this.rows.length);
      this.rows.push({ outcome, frequency: 1 });
    } else {
      this.rows[index].frequency += 1;
      this.promote(index);
    }

    this.totalObservations += 1;
  }

  /**
   * Highest-ranked outcome, or `undefined` for an empty table
   */
  mostFrequent(): Outcome<T> | undefined {
    return this.rows[0]?.outcome;
  }

  /**
   * Selects an outcome proportionally to its frequency.
   *
   * `value` must lie in [0, 1). It is scaled to an index into the entries laid
   * end to end, each repeated `frequency` times in ranked order. Values outside
   * that range are not rejected: a value of 1 or more can run past the last
   * entry and yield `undefined` for a non-empty table, and a negative value
   * yields the first entry.
   */
  sample(value: number): Outcome<T> | undefined {
    let remaining = Math.floor(value * this.totalObservations);

    for (const row of this.rows) {
      if (remaining < row.frequency) {
        return row.outcome;
      }
      remaining -= row.frequency;
    }

    return undefined;
  }

  frequencyOf(outcome: Outcome<T>): number {
    const index = this.positions.get(indexKey(outcome));
    return index === undefined ? 0 : this.rows[index].frequency;
  }

  /**
   * Snapshot of the entries in ranked order
   */
  entries(): TableEntry<T>[] {
    return this.rows.map(row => ({ outcome: row.outcome, frequency: row.frequency }));
  }

  private promote(index: number): void {
    const row = this.rows[index];
    let target = index;

    while (target > 0 && this.rows[target - 1].frequency < row.frequency) {
      target--;
    }

    if (target === index) {
      return;
    }

    // Shift the overtaken block right by one and drop the entry in front of it
    for (let i = index; i > target; i--) {
      this.rows[i] = this.rows[i - 1];
      this.positions.set(indexKey(this.rows[i].outcome), i);
    }
    this.rows[target] = row;
    this.positions.set(indexKey(row.outcome), target);
  }
}
