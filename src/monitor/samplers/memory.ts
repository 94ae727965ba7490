/**
 * Memory Sampler
 *
 * Reads /proc/meminfo so "used" excludes reclaimable cache (total minus
 * MemAvailable). Hosts without procfs fall back to the os module, which has
 * no swap figures.
 */

import { readFileSync, existsSync } from 'node:fs';
import { freemem, totalmem } from 'node:os';
import { BaseMetricSource } from './metric-source.js';
import { ParseError } from '../errors.js';
import type { MemorySample } from '../types/index.js';

export const MEMINFO_PATH = '/proc/meminfo';

function percentOf(part: number, whole: number): number {
  return whole > 0 ? (part / whole) * 100 : 0;
}

/**
 * Parses /proc/meminfo content into byte counts
 */
export function parseMeminfo(content: string): MemorySample {
  const lines = content.split('\n');

  const getMemValue = (key: string): number | null => {
    const line = lines.find(l => l.startsWith(key));
    if (!line) return null;
    const match = line.match(/(\d+)/);
    return match ? parseInt(match[1], 10) * 1024 : null; // kB to bytes
  };

  const total = getMemValue('MemTotal:');
  if (total === null) {
    throw new ParseError(MEMINFO_PATH, 'MemTotal missing');
  }

  // Kernels before 3.14 have no MemAvailable
  const available = getMemValue('MemAvailable:') ?? getMemValue('MemFree:') ?? 0;
  const swapTotal = getMemValue('SwapTotal:') ?? 0;
  const swapFree = getMemValue('SwapFree:') ?? 0;

  const used = total - available;
  const swapUsed = swapTotal - swapFree;

  return {
    total,
    used,
    available,
    percent: percentOf(used, total),
    swapTotal,
    swapUsed,
    swapPercent: percentOf(swapUsed, swapTotal),
  };
}

export class MemorySampler extends BaseMetricSource<MemorySample> {
  constructor(private readonly meminfoPath: string = MEMINFO_PATH) {
    super('memory');
  }

  protected async read(): Promise<MemorySample> {
    if (existsSync(this.meminfoPath)) {
      return parseMeminfo(readFileSync(this.meminfoPath, 'utf8'));
    }

    const total = totalmem();
    const available = freemem();
    const used = total - available;

    return {
      total,
      used,
      available,
      percent: percentOf(used, total),
      swapTotal: 0,
      swapUsed: 0,
      swapPercent: 0,
    };
  }
}
