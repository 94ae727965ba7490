/**
 * CPU Temperature Sampler
 *
 * Reads `sensors` output first. Per-core lines are averaged; package or
 * control readings are used when no core lines exist. When the tool is
 * missing or prints nothing usable, the kernel thermal zone is read instead.
 */

import { readFileSync, existsSync } from 'node:fs';
import { BaseMetricSource } from './metric-source.js';
import { execCommand, type CommandRunner } from './command-runner.js';
import { ParseError, SensorUnavailableError, ToolMissingError } from '../errors.js';
import type { CpuTemperatureSample } from '../types/index.js';

export const DEFAULT_THERMAL_ZONE = '/sys/class/thermal/thermal_zone0/temp';

const CORE_LINE = /^\s*Core\s+\d+:\s*\+?(-?\d+(?:\.\d+)?)\s*°?C/;
const FALLBACK_LINES: ReadonlyArray<{ label: string; pattern: RegExp }> = [
  { label: 'Package', pattern: /^\s*Package id \d+:\s*\+?(-?\d+(?:\.\d+)?)\s*°?C/ },
  { label: 'Tctl', pattern: /^\s*Tctl:\s*\+?(-?\d+(?:\.\d+)?)\s*°?C/ },
  { label: 'Tdie', pattern: /^\s*Tdie:\s*\+?(-?\d+(?:\.\d+)?)\s*°?C/ },
  { label: 'CPU', pattern: /^\s*CPU:\s*\+?(-?\d+(?:\.\d+)?)\s*°?C/ },
];

export interface CpuTemperatureSamplerOptions {
  runCommand?: CommandRunner;
  timeoutMs?: number;
  thermalZonePath?: string;
}

/**
 * Extracts a CPU temperature from `sensors` text. Returns null when no known
 * label is present.
 */
export function parseSensorsOutput(output: string): CpuTemperatureSample | null {
  const lines = output.split('\n');

  const cores: number[] = [];
  for (const line of lines) {
    const match = line.match(CORE_LINE);
    if (match) {
      cores.push(parseFloat(match[1]));
    }
  }

  if (cores.length > 0) {
    const mean = cores.reduce((sum, value) => sum + value, 0) / cores.length;
    return { celsius: Math.round(mean * 10) / 10, source: `sensors:Core x${cores.length}` };
  }

  for (const { label, pattern } of FALLBACK_LINES) {
    for (const line of lines) {
      const match = line.match(pattern);
      if (match) {
        return { celsius: parseFloat(match[1]), source: `sensors:${label}` };
      }
    }
  }

  return null;
}

export class CpuTemperatureSampler extends BaseMetricSource<CpuTemperatureSample> {
  private readonly runCommand: CommandRunner;
  private readonly timeoutMs: number;
  private readonly thermalZonePath: string;

  constructor(options: CpuTemperatureSamplerOptions = {}) {
    super('cpu-temperature');
    this.runCommand = options.runCommand ?? execCommand;
    this.timeoutMs = options.timeoutMs ?? 2000;
    this.thermalZonePath = options.thermalZonePath ?? DEFAULT_THERMAL_ZONE;
  }

  protected async read(): Promise<CpuTemperatureSample> {
    const fromSensors = await this.readSensors();
    if (fromSensors) {
      return fromSensors;
    }
    return this.readThermalZone();
  }

  private async readSensors(): Promise<CpuTemperatureSample | null> {
    try {
      const result = await this.runCommand('sensors', [], { timeoutMs: this.timeoutMs });
      if (result.exitCode !== 0) {
        this.logger.debug('sensors exited with non-zero status', { exitCode: result.exitCode });
        return null;
      }
      return parseSensorsOutput(result.stdout);
    } catch (error) {
      if (error instanceof ToolMissingError) {
        return null;
      }
      throw error;
    }
  }

  /**
   * Kernel thermal zones report millidegrees Celsius
   */
  private readThermalZone(): CpuTemperatureSample {
    if (!existsSync(this.thermalZonePath)) {
      throw new SensorUnavailableError('cpu temperature', 'no sensors reading and no thermal zone');
    }

    const raw = readFileSync(this.thermalZonePath, 'utf8').trim();
    const milliC = parseInt(raw, 10);
    if (isNaN(milliC)) {
      throw new ParseError(this.thermalZonePath, `unexpected value "${raw}"`);
    }

    return { celsius: milliC / 1000, source: 'thermal_zone' };
  }
}
