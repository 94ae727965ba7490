/**
 * GPU Sampler
 *
 * Queries nvidia-smi for name, temperature, utilization, VRAM and power.
 * Whether the tool exists is probed once: after a missing-tool result the
 * sampler answers `unavailable` without spawning anything, until the
 * optional reprobe interval has passed.
 */

import { BaseMetricSource } from './metric-source.js';
import { execCommand, type CommandResult, type CommandRunner } from './command-runner.js';
import { ParseError, ToolFailedError, ToolMissingError } from '../errors.js';
import type { GpuSample } from '../types/index.js';

export const GPU_TOOL = 'nvidia-smi';

export const GPU_QUERY_ARGS: readonly string[] = [
  '--query-gpu=name,temperature.gpu,utilization.gpu,memory.used,memory.total,power.draw',
  '--format=csv,noheader,nounits',
];

type ProbeState =
  | { status: 'unknown' }
  | { status: 'present' }
  | { status: 'missing'; checkedAt: number };

export interface GpuSamplerOptions {
  runCommand?: CommandRunner;
  timeoutMs?: number;
  /** 0 keeps a missing-tool result for the lifetime of the process */
  reprobeIntervalMs?: number;
  now?: () => number;
}

function parseNumericField(field: string | undefined): number | null {
  if (field === undefined) {
    return null;
  }
  const trimmed = field.trim();
  if (!/^-?\d+(\.\d+)?$/.test(trimmed)) {
    return null;
  }
  return Number(trimmed);
}

/**
 * Parses the first row of nvidia-smi CSV output. Columns that read `[N/A]`
 * or similar come back as null rather than failing the whole row.
 */
export function parseGpuCsv(output: string): GpuSample {
  const row = output.split('\n').map(line => line.trim()).find(line => line.length > 0);
  if (!row) {
    throw new ParseError(GPU_TOOL, 'empty output');
  }

  const fields = row.split(',').map(field => field.trim());
  if (fields.length < 6) {
    throw new ParseError(GPU_TOOL, `expected 6 columns, got ${fields.length}`);
  }

  return {
    name: fields[0] || 'Unknown',
    temperature: parseNumericField(fields[1]),
    utilization: parseNumericField(fields[2]),
    memoryUsed: parseNumericField(fields[3]),
    memoryTotal: parseNumericField(fields[4]),
    powerDraw: parseNumericField(fields[5]),
  };
}

export class GpuSampler extends BaseMetricSource<GpuSample> {
  private readonly runCommand: CommandRunner;
  private readonly timeoutMs: number;
  private readonly reprobeIntervalMs: number;
  private readonly now: () => number;
  private probe: ProbeState = { status: 'unknown' };

  constructor(options: GpuSamplerOptions = {}) {
    super('gpu');
    this.runCommand = options.runCommand ?? execCommand;
    this.timeoutMs = options.timeoutMs ?? 2000;
    this.reprobeIntervalMs = options.reprobeIntervalMs ?? 0;
    this.now = options.now ?? Date.now;
  }

  protected async read(): Promise<GpuSample> {
    if (this.probe.status === 'missing' && !this.reprobeDue(this.probe.checkedAt)) {
      throw new ToolMissingError(GPU_TOOL);
    }

    let result: CommandResult;
    try {
      result = await this.runCommand(GPU_TOOL, GPU_QUERY_ARGS, { timeoutMs: this.timeoutMs });
    } catch (error) {
      if (error instanceof ToolMissingError) {
        if (this.probe.status !== 'missing') {
          this.logger.info('GPU tool not found, GPU metrics disabled', {
            tool: GPU_TOOL,
            reprobeIntervalMs: this.reprobeIntervalMs,
          });
        }
        this.probe = { status: 'missing', checkedAt: this.now() };
      }
      throw error;
    }

    if (this.probe.status !== 'present') {
      this.logger.info('GPU tool detected', { tool: GPU_TOOL });
      this.probe = { status: 'present' };
    }

    if (result.exitCode !== 0) {
      throw new ToolFailedError(GPU_TOOL, result.exitCode, result.stderr.trim());
    }

    return parseGpuCsv(result.stdout);
  }

  private reprobeDue(checkedAt: number): boolean {
    return this.reprobeIntervalMs > 0 && this.now() - checkedAt >= this.reprobeIntervalMs;
  }
}
