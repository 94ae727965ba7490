/**
 * Dashboard Panels
 *
 * Each panel turns part of a snapshot into content lines; the renderer adds
 * the boxes.
 */

import { percentSeverity, type Severity } from '../thresholds/classifier.js';
import { renderTemperatureGraph } from './temperature-graph.js';
import { cell, keyValueRows, table, type Cell } from './layout.js';
import {
  formatBytes,
  formatBytesExact,
  formatBytesGb,
  formatPercent,
  formatTemperature,
  formatTimestamp,
  NOT_AVAILABLE,
} from './format.js';
import type { Palette } from './palette.js';
import type { DashboardConfig, DashboardSnapshot, DiskSample, Reading, TrackedQuantity } from '../types/index.js';

export const TITLE = 'SYSTEM DASHBOARD';
export const FOOTER = 'Press Ctrl+C to exit';

export function headerLines(snapshot: DashboardSnapshot, palette: Palette): string[] {
  return [`${palette.bold(TITLE)}  ${palette.dim(`|  ${formatTimestamp(snapshot.timestamp)}`)}`];
}

export function temperatureLines(
  snapshot: DashboardSnapshot,
  config: DashboardConfig,
  graphLength: number,
  palette: Palette,
): string[] {
  const { severities } = snapshot;
  const rows: Array<{ label: string; reading: Reading; severity: Severity; quantity: TrackedQuantity }> = [
    { label: 'CPU', reading: snapshot.cpuTemperature, severity: severities.cpuTemperature, quantity: 'cpu_temperature' },
  ];
  if (config.display.showGpu) {
    rows.push({
      label: 'GPU',
      reading: snapshot.gpuTemperature,
      severity: severities.gpuTemperature,
      quantity: 'gpu_temperature',
    });
  }

  const lines: string[] = [];
  rows.forEach(({ label, reading, severity, quantity }, index) => {
    if (index > 0) lines.push('');

    lines.push(`${palette.bold(`${label}:`.padEnd(6))}${palette.severity(severity, formatTemperature(reading.value))}`);

    const graph = renderTemperatureGraph(
      snapshot.history[quantity],
      {
        height: config.display.graphHeight,
        length: graphLength,
        thresholds: config.temperatureThresholds,
      },
      palette,
    );
    lines.push(...graph.map(line => `  ${line}`));
  });

  return lines;
}

export function systemLines(snapshot: DashboardSnapshot, config: DashboardConfig, palette: Palette): string[] {
  const { cpu, memory, network, severities } = snapshot;
  const rows: Array<[string, string]> = [];

  const cpuUsage = cpu?.usage ?? null;
  rows.push(['CPU Usage:', palette.severity(severities.cpuUsage, formatPercent(cpuUsage))]);
  rows.push(['CPU Cores:', cpu ? String(cpu.coreCount) : palette.dim(NOT_AVAILABLE)]);
  if (cpu?.frequencyMhz) {
    rows.push(['CPU Freq:', `${cpu.frequencyMhz} MHz`]);
  }

  if (memory) {
    rows.push(['Memory:', palette.severity(severities.memory, formatPercent(memory.percent))]);
    rows.push(['Used/Total:', `${formatBytes(memory.used)} / ${formatBytes(memory.total)}`]);
    if (memory.swapTotal > 0) {
      rows.push([
        'Swap:',
        `${formatBytes(memory.swapUsed)} / ${formatBytes(memory.swapTotal)} ` +
          palette.severity(percentSeverity(memory.swapPercent), `(${formatPercent(memory.swapPercent)})`),
      ]);
    }
  } else {
    rows.push(['Memory:', palette.dim(NOT_AVAILABLE)]);
  }

  if (config.display.showNetwork) {
    rows.push(['Net Sent:', network ? formatBytes(network.bytesSent) : palette.dim(NOT_AVAILABLE)]);
    rows.push(['Net Recv:', network ? formatBytes(network.bytesRecv) : palette.dim(NOT_AVAILABLE)]);
  }

  return keyValueRows(rows, palette);
}

export function gpuLines(snapshot: DashboardSnapshot, palette: Palette): string[] {
  const { gpu, severities } = snapshot;
  if (!gpu) {
    return keyValueRows([['GPU:', palette.dim('Not detected')]], palette);
  }

  const rows: Array<[string, string]> = [['GPU:', gpu.name]];

  rows.push(['Usage:', palette.severity(severities.gpuUsage, formatPercent(gpu.utilization, 0))]);

  if (gpu.memoryUsed !== null && gpu.memoryTotal !== null) {
    rows.push(['VRAM:', palette.severity(severities.gpuMemory, `${gpu.memoryUsed}MB / ${gpu.memoryTotal}MB`)]);
  } else {
    rows.push(['VRAM:', palette.dim(NOT_AVAILABLE)]);
  }

  rows.push(['Power:', gpu.powerDraw === null ? palette.dim(NOT_AVAILABLE) : `${gpu.powerDraw.toFixed(1)}W`]);

  return keyValueRows(rows, palette);
}

const DISK_HEADERS = ['Filesystem', 'Size', 'Used', 'Avail', 'Use%', 'Mounted on'] as const;
const DISK_ALIGNS = ['left', 'right', 'right', 'right', 'right', 'left'] as const;

function diskRows(disks: readonly DiskSample[], size: (bytes: number) => string, palette: Palette): Cell[][] {
  return disks.map(disk => [
    cell(disk.device),
    cell(size(disk.total)),
    cell(size(disk.used)),
    cell(size(disk.free)),
    cell(`${disk.percent.toFixed(0)}%`, text => palette.severity(percentSeverity(disk.percent), text)),
    cell(disk.mountPoint),
  ]);
}

export function diskLines(snapshot: DashboardSnapshot, palette: Palette): string[] {
  const { disks } = snapshot;
  if (!disks) {
    return [palette.dim(`Disk usage ${NOT_AVAILABLE}`)];
  }
  if (disks.length === 0) {
    return [palette.dim('No mounts to display')];
  }

  return [
    palette.bold('Mounted drives'),
    ...table(DISK_HEADERS, diskRows(disks, formatBytesGb, palette), DISK_ALIGNS, palette),
    '',
    palette.bold('Usage [bytes]'),
    ...table(DISK_HEADERS, diskRows(disks, formatBytesExact, palette), DISK_ALIGNS, palette),
  ];
}
