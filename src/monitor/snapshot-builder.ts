/**
 * Snapshot Builder
 *
 * Turns one tick's samples into readings, records the temperature readings
 * in history, and assembles the frozen snapshot the renderer draws.
 */

import { classify, percentSeverity } from './thresholds/classifier.js';
import { absentReading, presentReading, type DashboardConfig, type DashboardSnapshot, type Reading } from './types/index.js';
import type { HistoryStore } from './history/history-store.js';
import type { SampleResult } from './samplers/metric-source.js';
import type { TickSamples } from './sources.js';

function valueOf<T>(result: SampleResult<T> | null): T | null {
  return result && result.ok ? result.value : null;
}

export function cpuTemperatureReading(samples: TickSamples, timestamp: Date): Reading {
  const result = samples.cpuTemperature;
  return result.ok
    ? presentReading('cpu_temperature', result.value.celsius, 'celsius', timestamp)
    : absentReading('cpu_temperature', 'celsius', timestamp, result.failure);
}

export function gpuTemperatureReading(samples: TickSamples, timestamp: Date): Reading {
  const result = samples.gpu;
  if (!result) {
    return absentReading('gpu_temperature', 'celsius', timestamp, 'unavailable');
  }
  if (!result.ok) {
    return absentReading('gpu_temperature', 'celsius', timestamp, result.failure);
  }
  return result.value.temperature === null
    ? absentReading('gpu_temperature', 'celsius', timestamp, 'parse_error')
    : presentReading('gpu_temperature', result.value.temperature, 'celsius', timestamp);
}

/**
 * Records this tick's temperatures. Called exactly once per tick.
 */
export function recordTemperatures(history: HistoryStore, samples: TickSamples, timestamp: Date): {
  cpuTemperature: Reading;
  gpuTemperature: Reading;
} {
  const cpuTemperature = cpuTemperatureReading(samples, timestamp);
  const gpuTemperature = gpuTemperatureReading(samples, timestamp);

  history.push('cpu_temperature', cpuTemperature);
  if (samples.gpu) {
    history.push('gpu_temperature', gpuTemperature);
  }

  return { cpuTemperature, gpuTemperature };
}

export function buildSnapshot(
  tick: number,
  timestamp: Date,
  samples: TickSamples,
  temperatures: { cpuTemperature: Reading; gpuTemperature: Reading },
  history: HistoryStore,
  config: DashboardConfig,
): DashboardSnapshot {
  const cpu = valueOf(samples.cpuUsage);
  const memory = valueOf(samples.memory);
  const gpu = valueOf(samples.gpu);
  const disks = valueOf(samples.disks);

  const gpuMemoryPercent =
    gpu && gpu.memoryUsed !== null && gpu.memoryTotal !== null && gpu.memoryTotal > 0
      ? (gpu.memoryUsed / gpu.memoryTotal) * 100
      : null;

  return Object.freeze({
    tick,
    timestamp,
    cpu,
    cpuTemperature: temperatures.cpuTemperature,
    gpuTemperature: temperatures.gpuTemperature,
    gpu,
    memory,
    disks: disks ? Object.freeze([...disks]) : null,
    network: valueOf(samples.network),
    history: history.views(),
    severities: {
      cpuTemperature: classify(temperatures.cpuTemperature.value, config.temperatureThresholds),
      gpuTemperature: classify(temperatures.gpuTemperature.value, config.temperatureThresholds),
      cpuUsage: percentSeverity(cpu?.usage ?? null),
      memory: percentSeverity(memory?.percent ?? null),
      gpuUsage: percentSeverity(gpu?.utilization ?? null),
      gpuMemory: percentSeverity(gpuMemoryPercent),
    },
  });
}
