/**
 * History Store
 *
 * Owns one HistoryRing per tracked quantity. This is the only state that
 * outlives a tick; the refresh loop is its single writer.
 */

import { HistoryRing, computeStats, type HistoryStats } from './history-ring.js';
import type { HistoryView, Reading, TrackedQuantity } from '../types/index.js';

export class HistoryStore {
  private readonly rings: Record<TrackedQuantity, HistoryRing>;

  constructor(readonly capacity: number) {
    this.rings = {
      cpu_temperature: new HistoryRing(capacity),
      gpu_temperature: new HistoryRing(capacity),
    };
  }

  push(quantity: TrackedQuantity, reading: Reading): void {
    if (reading.quantity !== quantity) {
      throw new TypeError(`Reading for ${reading.quantity} pushed into ${quantity} history`);
    }
    this.rings[quantity].push(reading);
  }

  snapshot(quantity: TrackedQuantity): readonly Reading[] {
    return this.rings[quantity].snapshot();
  }

  stats(quantity: TrackedQuantity): HistoryStats | null {
    return this.rings[quantity].stats();
  }

  /**
   * Frozen views of every ring, for one frame
   */
  views(): Readonly<Record<TrackedQuantity, HistoryView>> {
    return Object.freeze({
      cpu_temperature: this.view('cpu_temperature'),
      gpu_temperature: this.view('gpu_temperature'),
    });
  }

  private view(quantity: TrackedQuantity): HistoryView {
    const readings = this.rings[quantity].snapshot();
    return Object.freeze({ readings, stats: computeStats(readings) });
  }
}
