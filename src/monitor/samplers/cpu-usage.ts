/**
 * CPU Usage Sampler
 *
 * Utilization is the busy share of aggregate CPU time between two reads.
 * The previous read is kept between ticks, so only the very first sample
 * waits for a short baseline window.
 */

import { cpus, type CpuInfo } from 'node:os';
import { BaseMetricSource } from './metric-source.js';
import { SensorUnavailableError } from '../errors.js';
import type { CpuUsageSample } from '../types/index.js';

interface CpuTimes {
  idle: number;
  total: number;
}

export interface CpuUsageSamplerOptions {
  readCpus?: () => CpuInfo[];
  /** Baseline window for the first sample in ms */
  baselineMs?: number;
  wait?: (ms: number) => Promise<void>;
}

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

export function sumCpuTimes(infos: readonly CpuInfo[]): CpuTimes {
  let idle = 0;
  let total = 0;

  for (const info of infos) {
    const { user, nice, sys, idle: idleTime, irq } = info.times;
    total += user + nice + sys + idleTime + irq;
    idle += idleTime;
  }

  return { idle, total };
}

export function utilizationBetween(previous: CpuTimes, current: CpuTimes): number {
  const totalDiff = current.total - previous.total;
  const idleDiff = current.idle - previous.idle;

  if (totalDiff <= 0) {
    return 0;
  }

  return Math.max(0, Math.min(100, ((totalDiff - idleDiff) / totalDiff) * 100));
}

export class CpuUsageSampler extends BaseMetricSource<CpuUsageSample> {
  private readonly readCpus: () => CpuInfo[];
  private readonly baselineMs: number;
  private readonly wait: (ms: number) => Promise<void>;
  private previous?: CpuTimes;

  constructor(options: CpuUsageSamplerOptions = {}) {
    super('cpu-usage');
    this.readCpus = options.readCpus ?? cpus;
    this.baselineMs = options.baselineMs ?? 100;
    this.wait = options.wait ?? sleep;
  }

  protected async read(): Promise<CpuUsageSample> {
    let infos = this.readCpus();
    if (infos.length === 0) {
      throw new SensorUnavailableError('cpu times', 'no CPUs reported by the OS');
    }

    if (!this.previous) {
      this.previous = sumCpuTimes(infos);
      await this.wait(this.baselineMs);
      infos = this.readCpus();
    }

    const current = sumCpuTimes(infos);
    const usage = utilizationBetween(this.previous, current);
    this.previous = current;

    const speed = infos[0]?.speed ?? 0;

    return {
      usage,
      coreCount: infos.length,
      frequencyMhz: speed > 0 ? speed : null,
    };
  }
}
