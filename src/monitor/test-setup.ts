/**
 * Test Setup for the Dashboard
 *
 * fast-check generators and in-process fakes shared by the monitor tests.
 * Nothing here touches the real terminal or spawns a tool.
 */

import * as fc from 'fast-check';
import { vi } from 'vitest';
import { DEFAULT_CONFIG } from './config/config-loader.js';
import { presentReading, absentReading } from './types/index.js';
import type { CommandResult, CommandRunner } from './samplers/command-runner.js';
import type { MetricSource, SampleResult } from './samplers/metric-source.js';
import type { Frame } from './renderer/renderer.js';
import type { TerminalWriter } from './renderer/terminal-writer.js';
import type { DashboardSources } from './sources.js';
import type {
  CpuTemperatureSample,
  CpuUsageSample,
  DashboardConfig,
  DiskSample,
  FailureTag,
  MemorySample,
  Reading,
  TemperatureThresholds,
} from './types/index.js';

/**
 * Fast-check generators
 */

export const temperatureArbitrary: fc.Arbitrary<number> = fc.double({ min: -20, max: 120, noNaN: true });

// Temperature readings, roughly one in five absent
export const temperatureReadingArbitrary: fc.Arbitrary<Reading> = fc
  .tuple(fc.option(temperatureArbitrary, { freq: 4 }), fc.integer({ min: 0, max: 2_000_000_000_000 }))
  .map(([value, ms]) =>
    value === null
      ? absentReading('cpu_temperature', 'celsius', new Date(ms), 'unavailable')
      : presentReading('cpu_temperature', value, 'celsius', new Date(ms)),
  );

export const thresholdsArbitrary: fc.Arbitrary<TemperatureThresholds> = fc
  .tuple(fc.integer({ min: 30, max: 90 }), fc.integer({ min: 1, max: 30 }))
  .map(([warning, gap]) => ({ warning, critical: warning + gap }));

/**
 * Test configuration for property-based tests
 */
export const propertyTestConfig = {
  numRuns: 30,
  timeout: 5000,
  verbose: false,
};

/**
 * Fakes
 */

export function cpuReading(value: number | null, at = new Date(0)): Reading {
  return value === null
    ? absentReading('cpu_temperature', 'celsius', at, 'unavailable')
    : presentReading('cpu_temperature', value, 'celsius', at);
}

export function mockCommandRunner() {
  return vi.fn<Parameters<CommandRunner>, ReturnType<CommandRunner>>();
}

export function commandOutput(stdout: string, exitCode = 0, stderr = ''): CommandResult {
  return { stdout, stderr, exitCode };
}

/** A source that replays results, repeating the last one once exhausted */
export class ScriptedSource<T> implements MetricSource<T> {
  readonly calls = { count: 0 };
  private readonly results: SampleResult<T>[];

  constructor(readonly name: string, ...results: SampleResult<T>[]) {
    this.results = results;
  }

  async sample(): Promise<SampleResult<T>> {
    const result = this.results[Math.min(this.calls.count, this.results.length - 1)];
    this.calls.count++;
    return result;
  }
}

export function ok<T>(value: T): SampleResult<T> {
  return { ok: true, value };
}

export function failed<T>(failure: FailureTag, message = 'test failure'): SampleResult<T> {
  return { ok: false, failure, message };
}

export const CPU_USAGE: CpuUsageSample = { usage: 25, coreCount: 4, frequencyMhz: 2400 };
export const CPU_TEMPERATURE: CpuTemperatureSample = { celsius: 55, source: 'sensors:Core x4' };
export const MEMORY: MemorySample = {
  total: 16 * 1024 ** 3,
  used: 4 * 1024 ** 3,
  available: 12 * 1024 ** 3,
  percent: 25,
  swapTotal: 0,
  swapUsed: 0,
  swapPercent: 0,
};
export const ROOT_DISK: DiskSample = {
  device: '/dev/sda1',
  fsType: 'ext4',
  mountPoint: '/',
  total: 100 * 1024 ** 3,
  used: 40 * 1024 ** 3,
  free: 60 * 1024 ** 3,
  percent: 40,
};

/** Healthy sources without GPU or network */
export function healthySources(overrides: Partial<DashboardSources> = {}): DashboardSources {
  return {
    cpuUsage: new ScriptedSource('cpu-usage', ok(CPU_USAGE)),
    cpuTemperature: new ScriptedSource('cpu-temperature', ok(CPU_TEMPERATURE)),
    memory: new ScriptedSource('memory', ok(MEMORY)),
    disks: new ScriptedSource('disk', ok([ROOT_DISK])),
    gpu: null,
    network: null,
    ...overrides,
  };
}

export function fakeWriter(columns = 80) {
  const frames: Frame[] = [];
  const quitListeners: Array<() => void> = [];
  const writer = {
    frames,
    enter: vi.fn(),
    draw: vi.fn((frame: Frame) => {
      frames.push(frame);
    }),
    leave: vi.fn(),
    columns: () => columns,
    onQuit: (listener: () => void) => {
      quitListeners.push(listener);
    },
    /** Simulates the quit key */
    pressQuit: () => {
      for (const listener of quitListeners) listener();
    },
  } satisfies TerminalWriter & { frames: Frame[]; pressQuit: () => void };
  return writer;
}

export function testConfig(overrides: Partial<DashboardConfig> = {}): DashboardConfig {
  return { ...DEFAULT_CONFIG, ...overrides };
}
