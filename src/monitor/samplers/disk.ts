/**
 * Disk Sampler
 *
 * Uses POSIX `df` output with filesystem types and byte-sized blocks, then
 * applies the mount filter.
 */

import { BaseMetricSource } from './metric-source.js';
import { execCommand, type CommandRunner } from './command-runner.js';
import { filterMounts } from './mount-filter.js';
import { ParseError, ToolFailedError } from '../errors.js';
import type { DiskSample, MountFilterOptions } from '../types/index.js';

export const DF_ARGS: readonly string[] = ['-P', '-T', '-B1'];

// Filesystem Type 1-blocks Used Available Capacity Mounted-on (mount point may contain spaces)
const DF_ROW = /^(\S+)\s+(\S+)\s+(\d+)\s+(\d+)\s+(\d+)\s+\S+\s+(.+)$/;

/**
 * Parses `df -P -T -B1` output. Rows that do not fit the column layout are
 * skipped.
 */
export function parseDfOutput(output: string): DiskSample[] {
  const rows = output.split('\n').slice(1);
  const disks: DiskSample[] = [];

  for (const row of rows) {
    const match = row.trim().match(DF_ROW);
    if (!match) continue;

    const total = parseInt(match[3], 10);
    const used = parseInt(match[4], 10);
    const free = parseInt(match[5], 10);
    const usable = used + free;

    disks.push({
      device: match[1],
      fsType: match[2],
      mountPoint: match[6],
      total,
      used,
      free,
      percent: usable > 0 ? (used / usable) * 100 : 0,
    });
  }

  return disks;
}

export interface DiskSamplerOptions {
  filters: MountFilterOptions;
  runCommand?: CommandRunner;
  timeoutMs?: number;
}

export class DiskSampler extends BaseMetricSource<DiskSample[]> {
  private readonly filters: MountFilterOptions;
  private readonly runCommand: CommandRunner;
  private readonly timeoutMs: number;

  constructor(options: DiskSamplerOptions) {
    super('disk');
    this.filters = options.filters;
    this.runCommand = options.runCommand ?? execCommand;
    this.timeoutMs = options.timeoutMs ?? 2000;
  }

  protected async read(): Promise<DiskSample[]> {
    const result = await this.runCommand('df', DF_ARGS, { timeoutMs: this.timeoutMs });

    // df exits 1 when a single mount is unreadable but still prints the rest
    const disks = parseDfOutput(result.stdout);
    if (disks.length === 0) {
      if (result.exitCode !== 0) {
        throw new ToolFailedError('df', result.exitCode, result.stderr.trim());
      }
      throw new ParseError('df', 'no filesystem rows');
    }

    return filterMounts(disks, this.filters);
  }
}
