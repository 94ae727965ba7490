/**
 * DashboardSnapshot Interface
 *
 * Everything the renderer needs for one frame. Built fresh each tick by the
 * refresh loop and dropped after the frame is drawn.
 */

import type { Reading, TrackedQuantity } from './reading.js';
import type {
  CpuUsageSample,
  DiskSample,
  GpuSample,
  MemorySample,
  NetworkSample,
} from './metrics.js';
import type { HistoryStats } from '../history/history-ring.js';
import type { Severity } from '../thresholds/classifier.js';

export interface HistoryView {
  readings: readonly Reading[];
  stats: HistoryStats | null;
}

export interface SnapshotSeverities {
  cpuTemperature: Severity;
  gpuTemperature: Severity;
  cpuUsage: Severity;
  memory: Severity;
  gpuUsage: Severity;
  gpuMemory: Severity;
}

export interface DashboardSnapshot {
  tick: number;
  timestamp: Date;
  cpu: CpuUsageSample | null;
  cpuTemperature: Reading;
  gpuTemperature: Reading;
  gpu: GpuSample | null;
  memory: MemorySample | null;
  /** Mounts that passed the configured filters */
  disks: readonly DiskSample[] | null;
  network: NetworkSample | null;
  history: Readonly<Record<TrackedQuantity, HistoryView>>;
  severities: SnapshotSeverities;
}
