/**
 * Sampled Metric Shapes
 *
 * What each metric source returns on success. Individual fields stay
 * nullable where a tool can report some columns and not others.
 */

export interface CpuUsageSample {
  /** Aggregate utilization across all cores (0-100) */
  usage: number;
  coreCount: number;
  /** Current clock of the first core in MHz, when the OS exposes it */
  frequencyMhz: number | null;
}

export interface CpuTemperatureSample {
  celsius: number;
  /** Which part of the sensor output (or fallback file) produced the value */
  source: string;
}

export interface GpuSample {
  name: string;
  temperature: number | null;
  utilization: number | null;
  /** VRAM in MiB as reported by the tool */
  memoryUsed: number | null;
  memoryTotal: number | null;
  /** Board power draw in watts */
  powerDraw: number | null;
}

export interface MemorySample {
  total: number;
  used: number;
  available: number;
  percent: number;
  swapTotal: number;
  swapUsed: number;
  swapPercent: number;
}

export interface MountInfo {
  device: string;
  fsType: string;
  mountPoint: string;
}

export interface DiskSample extends MountInfo {
  total: number;
  used: number;
  free: number;
  percent: number;
}

export interface NetworkSample {
  bytesSent: number;
  bytesRecv: number;
  interfaces: number;
}
