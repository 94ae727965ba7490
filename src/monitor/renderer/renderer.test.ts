/**
 * Panel and Frame Renderer Tests
 */

import { describe, it, expect } from 'vitest';
import { renderFrame, frameToText, graphLengthFor } from './renderer.js';
import { diskLines, gpuLines, systemLines, temperatureLines } from './panels.js';
import { createPalette } from './palette.js';
import { HistoryStore } from '../history/history-store.js';
import { buildSnapshot, recordTemperatures } from '../snapshot-builder.js';
import { CPU_TEMPERATURE, CPU_USAGE, MEMORY, ROOT_DISK, failed, ok, testConfig } from '../test-setup.js';
import type { TickSamples } from '../sources.js';
import type { DashboardConfig, DashboardSnapshot } from '../types/index.js';

const plain = createPalette(testConfig().colors, 0);

function healthySamples(overrides: Partial<TickSamples> = {}): TickSamples {
  return {
    cpuUsage: ok(CPU_USAGE),
    cpuTemperature: ok(CPU_TEMPERATURE),
    memory: ok(MEMORY),
    disks: ok([ROOT_DISK]),
    gpu: null,
    network: null,
    ...overrides,
  };
}

function snapshotOf(samples: TickSamples, config: DashboardConfig, history = new HistoryStore(100)): DashboardSnapshot {
  const timestamp = new Date(2024, 0, 5, 9, 3, 7);
  const temperatures = recordTemperatures(history, samples, timestamp);
  return buildSnapshot(1, timestamp, samples, temperatures, history, config);
}

describe('Panels', () => {
  describe('temperatureLines', () => {
    it('should print N/A and a placeholder for an unavailable sensor', () => {
      const config = testConfig({ display: { ...testConfig().display, showGpu: false } });
      const snapshot = snapshotOf(healthySamples({ cpuTemperature: failed('unavailable') }), config);

      expect(temperatureLines(snapshot, config, 50, plain)).toEqual(['CPU:  N/A', '  No data available']);
    });

    it('should add a GPU section when GPU display is on', () => {
      const config = testConfig();
      const snapshot = snapshotOf(healthySamples(), config);

      expect(temperatureLines(snapshot, config, 50, plain)).toEqual([
        'CPU:  55°C',
        '  Collecting data...',
        '',
        'GPU:  N/A',
        '  No data available',
      ]);
    });
  });

  describe('systemLines', () => {
    it('should list CPU and memory figures', () => {
      const config = testConfig();
      const snapshot = snapshotOf(healthySamples(), config);

      expect(systemLines(snapshot, config, plain)).toEqual([
        'CPU Usage:   25.0%',
        'CPU Cores:   4',
        'CPU Freq:    2400 MHz',
        'Memory:      25.0%',
        'Used/Total:  4.0 GB / 16.0 GB',
      ]);
    });

    it('should print N/A for unavailable CPU and memory', () => {
      const config = testConfig();
      const snapshot = snapshotOf(
        healthySamples({ cpuUsage: failed('unavailable'), memory: failed('parse_error') }),
        config,
      );

      expect(systemLines(snapshot, config, plain)).toEqual(['CPU Usage:  N/A', 'CPU Cores:  N/A', 'Memory:     N/A']);
    });
  });

  describe('gpuLines', () => {
    it('should say when no GPU was detected', () => {
      const config = testConfig();
      const snapshot = snapshotOf(healthySamples({ gpu: failed('unavailable') }), config);

      expect(gpuLines(snapshot, plain)).toEqual(['GPU:  Not detected']);
    });

    it('should list GPU figures and N/A for unsupported columns', () => {
      const config = testConfig();
      const snapshot = snapshotOf(
        healthySamples({
          gpu: ok({ name: 'GPU A', temperature: 50, utilization: 10, memoryUsed: 100, memoryTotal: 1000, powerDraw: null }),
        }),
        config,
      );

      expect(gpuLines(snapshot, plain)).toEqual(['GPU:    GPU A', 'Usage:  10%', 'VRAM:   100MB / 1000MB', 'Power:  N/A']);
    });
  });

  describe('diskLines', () => {
    it('should render both disk tables', () => {
      const config = testConfig();
      const snapshot = snapshotOf(healthySamples(), config);

      expect(diskLines(snapshot, plain)).toEqual([
        'Mounted drives',
        'Filesystem  Size  Used  Avail  Use%  Mounted on',
        '/dev/sda1   100G   40G    60G   40%  /',
        '',
        'Usage [bytes]',
        'Filesystem             Size            Used           Avail  Use%  Mounted on',
        '/dev/sda1   107,374,182,400  42,949,672,960  64,424,509,440   40%  /',
      ]);
    });

    it('should distinguish no mounts from unavailable disk usage', () => {
      const config = testConfig();

      expect(diskLines(snapshotOf(healthySamples({ disks: ok([]) }), config), plain)).toEqual(['No mounts to display']);
      expect(diskLines(snapshotOf(healthySamples({ disks: failed('tool_error') }), config), plain)).toEqual([
        'Disk usage N/A',
      ]);
    });
  });
});

describe('renderFrame', () => {
  it('should cap the graph length by the terminal width', () => {
    expect(graphLengthFor(100, 100)).toBe(76);
    expect(graphLengthFor(200, 100)).toBe(100);
    expect(graphLengthFor(20, 100)).toBe(10);
  });

  it('should keep every content line inside the panel borders', () => {
    const config = testConfig();
    const history = new HistoryStore(config.maxHistoryPoints);
    for (let i = 0; i < 80; i++) {
      recordTemperatures(
        history,
        healthySamples({ cpuTemperature: ok({ celsius: 50 + (i % 10), source: 'test' }) }),
        new Date(i * 1000),
      );
    }
    const snapshot = snapshotOf(healthySamples(), config, history);

    const lines = renderFrame(snapshot, config, { width: 100, palette: plain }).panels.flatMap(panel => panel.lines);

    expect(Math.max(...lines.map(line => line.length))).toBeLessThanOrEqual(98);
  });

  it('should include each panel in order', () => {
    const config = testConfig();
    const frame = renderFrame(snapshotOf(healthySamples(), config), config, { width: 100, palette: plain });

    expect(frame.panels.map(panel => [panel.id, panel.title])).toEqual([
      ['header', ''],
      ['temperatures', 'Temperatures & History'],
      ['system', 'System Info'],
      ['gpu', 'GPU Info'],
      ['disks', 'Disk Usage'],
      ['footer', ''],
    ]);
    expect(frame.panels[0].lines).toEqual(['SYSTEM DASHBOARD  |  2024-01-05 09:03:07']);
    expect(frame.panels[5].lines).toEqual(['Press Ctrl+C to exit']);
  });

  it('should leave out the GPU panel when GPU display is off', () => {
    const config = testConfig({ display: { ...testConfig().display, showGpu: false } });
    const frame = renderFrame(snapshotOf(healthySamples(), config), config, { width: 100, palette: plain });

    expect(frame.panels.map(panel => panel.id)).not.toContain('gpu');
  });

  it('should produce the same frame for the same snapshot', () => {
    const config = testConfig();
    const snapshot = snapshotOf(healthySamples(), config);

    expect(renderFrame(snapshot, config, { width: 90, palette: plain })).toEqual(
      renderFrame(snapshot, config, { width: 90, palette: plain }),
    );
  });
});

describe('frameToText', () => {
  it('should print titled panels with a heading and indented content', () => {
    const text = frameToText({
      panels: [
        { id: 'header', title: '', color: 'blue', lines: ['SYSTEM DASHBOARD'] },
        { id: 'system', title: 'System Info', color: 'green', lines: ['CPU Usage:  25.0%', 'CPU Cores:  4'] },
      ],
    });

    expect(text).toBe('SYSTEM DASHBOARD\n\nSystem Info\n  CPU Usage:  25.0%\n  CPU Cores:  4');
  });
});
