/**
 * Dashboard Sources
 *
 * The set of metric sources sampled every tick, and the join that collects
 * one result from each.
 */

import {
  CpuTemperatureSampler,
  CpuUsageSampler,
  DiskSampler,
  GpuSampler,
  MemorySampler,
  NetworkSampler,
  execCommand,
  type CommandRunner,
  type MetricSource,
  type SampleResult,
} from './samplers/index.js';
import type {
  CpuTemperatureSample,
  CpuUsageSample,
  DashboardConfig,
  DiskSample,
  GpuSample,
  MemorySample,
  NetworkSample,
} from './types/index.js';

export interface DashboardSources {
  cpuUsage: MetricSource<CpuUsageSample>;
  cpuTemperature: MetricSource<CpuTemperatureSample>;
  memory: MetricSource<MemorySample>;
  disks: MetricSource<DiskSample[]>;
  /** Null when GPU display is turned off */
  gpu: MetricSource<GpuSample> | null;
  /** Null unless network display is turned on */
  network: MetricSource<NetworkSample> | null;
}

export interface TickSamples {
  cpuUsage: SampleResult<CpuUsageSample>;
  cpuTemperature: SampleResult<CpuTemperatureSample>;
  memory: SampleResult<MemorySample>;
  disks: SampleResult<DiskSample[]>;
  gpu: SampleResult<GpuSample> | null;
  network: SampleResult<NetworkSample> | null;
}

export function createDefaultSources(config: DashboardConfig, runCommand: CommandRunner = execCommand): DashboardSources {
  const timeoutMs = Math.round(config.samplerTimeout * 1000);

  return {
    cpuUsage: new CpuUsageSampler(),
    cpuTemperature: new CpuTemperatureSampler({ runCommand, timeoutMs }),
    memory: new MemorySampler(),
    disks: new DiskSampler({ filters: config.filters, runCommand, timeoutMs }),
    gpu: config.display.showGpu
      ? new GpuSampler({ runCommand, timeoutMs, reprobeIntervalMs: config.gpu.reprobeInterval * 1000 })
      : null,
    network: config.display.showNetwork ? new NetworkSampler() : null,
  };
}

/**
 * Samples every source concurrently and waits for all of them. Sources do
 * not reject, so one slow or failing metric only costs its own slot.
 */
export async function collectSamples(sources: DashboardSources): Promise<TickSamples> {
  const [cpuUsage, cpuTemperature, memory, disks, gpu, network] = await Promise.all([
    sources.cpuUsage.sample(),
    sources.cpuTemperature.sample(),
    sources.memory.sample(),
    sources.disks.sample(),
    sources.gpu ? sources.gpu.sample() : Promise.resolve(null),
    sources.network ? sources.network.sample() : Promise.resolve(null),
  ]);

  return { cpuUsage, cpuTemperature, memory, disks, gpu, network };
}
