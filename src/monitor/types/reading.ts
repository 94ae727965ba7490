/**
 * Reading Types
 *
 * A reading is one normalized metric value taken during a tick. An absent
 * value (`null`) means the sensor or tool could not deliver one and is never
 * the same thing as zero.
 */

export type Quantity =
  | 'cpu_usage'
  | 'cpu_temperature'
  | 'gpu_usage'
  | 'gpu_temperature'
  | 'gpu_memory_used'
  | 'gpu_memory_total'
  | 'gpu_power'
  | 'memory_used'
  | 'memory_total'
  | 'memory_percent'
  | 'swap_used'
  | 'swap_total'
  | 'disk_used'
  | 'disk_total'
  | 'disk_percent'
  | 'net_bytes_sent'
  | 'net_bytes_recv';

export type Unit = 'percent' | 'celsius' | 'bytes' | 'mebibytes' | 'watts';

/** Why a sampler could not produce a value */
export type FailureTag = 'unavailable' | 'tool_error' | 'parse_error';

export interface Reading {
  quantity: Quantity;
  /** Measured value, or null when the source was unavailable */
  value: number | null;
  unit: Unit;
  timestamp: Date;
  failure?: FailureTag;
}

/** Quantities that keep a rolling history for graphing */
export type TrackedQuantity = Extract<Quantity, 'cpu_temperature' | 'gpu_temperature'>;

export const TRACKED_QUANTITIES: readonly TrackedQuantity[] = ['cpu_temperature', 'gpu_temperature'];

export function presentReading(quantity: Quantity, value: number, unit: Unit, timestamp: Date): Reading {
  return { quantity, value, unit, timestamp };
}

export function absentReading(quantity: Quantity, unit: Unit, timestamp: Date, failure: FailureTag): Reading {
  return { quantity, value: null, unit, timestamp, failure };
}
