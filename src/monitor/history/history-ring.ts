/**
 * History Ring
 *
 * Fixed-capacity FIFO of readings for one quantity. Backed by a circular
 * array so pushes are O(1); snapshots are frozen copies and never expose
 * the backing store.
 */

import type { Reading } from '../types/index.js';

export interface HistoryStats {
  min: number;
  max: number;
  /** Most recent present value */
  latest: number;
  /** Number of present values the stats were computed over */
  count: number;
}

export class HistoryRing {
  private readonly slots: Array<Reading | undefined>;
  private head = 0;
  private size = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`History capacity must be a positive integer, got ${capacity}`);
    }
    this.slots = new Array<Reading | undefined>(capacity);
  }

  get length(): number {
    return this.size;
  }

  /**
   * Appends a reading, evicting the oldest one when full
   */
  push(reading: Reading): void {
    const tail = (this.head + this.size) % this.capacity;
    this.slots[tail] = reading;

    if (this.size < this.capacity) {
      this.size++;
    } else {
      this.head = (this.head + 1) % this.capacity;
    }
  }

  /**
   * Readings oldest first
   */
  snapshot(): readonly Reading[] {
    const ordered: Reading[] = [];
    for (let i = 0; i < this.size; i++) {
      const reading = this.slots[(this.head + i) % this.capacity];
      if (reading) {
        ordered.push(reading);
      }
    }
    return Object.freeze(ordered);
  }

  /**
   * Min/max over retained present values; null when none are present
   */
  stats(): HistoryStats | null {
    return computeStats(this.snapshot());
  }
}

export function computeStats(readings: readonly Reading[]): HistoryStats | null {
  let min = Infinity;
  let max = -Infinity;
  let latest: number | null = null;
  let count = 0;

  for (const reading of readings) {
    if (reading.value === null) continue;
    min = Math.min(min, reading.value);
    max = Math.max(max, reading.value);
    latest = reading.value;
    count++;
  }

  if (latest === null) {
    return null;
  }

  return { min, max, latest, count };
}
