/**
 * Temperature Graph Tests
 *
 * Rendered with color level 0 unless a test checks coloring, so lines can
 * be compared as plain text.
 */

import { describe, it, expect } from 'vitest';
import { renderTemperatureGraph, COLLECTING, NO_DATA, type GraphOptions } from './temperature-graph.js';
import { createPalette } from './palette.js';
import { computeStats } from '../history/history-ring.js';
import { DEFAULT_CONFIG } from '../config/config-loader.js';
import { cpuReading } from '../test-setup.js';
import type { HistoryView } from '../types/index.js';

const plain = createPalette(DEFAULT_CONFIG.colors, 0);
const thresholds = { warning: 70, critical: 80 };

function view(values: Array<number | null>): HistoryView {
  const readings = values.map(value => cpuReading(value));
  return { readings, stats: computeStats(readings) };
}

function options(height: number, length = 100): GraphOptions {
  return { height, length, thresholds };
}

describe('renderTemperatureGraph', () => {
  it('should show a placeholder with no samples', () => {
    expect(renderTemperatureGraph(view([]), options(4), plain)).toEqual([NO_DATA]);
  });

  it('should show a placeholder when every sample is absent', () => {
    expect(renderTemperatureGraph(view([null, null, null]), options(4), plain)).toEqual([NO_DATA]);
  });

  it('should show a placeholder with a single sample', () => {
    expect(renderTemperatureGraph(view([null, 55]), options(4), plain)).toEqual([COLLECTING]);
  });

  it('should scale rows to the buffer range', () => {
    expect(renderTemperatureGraph(view([60, 65, 70]), options(2), plain)).toEqual([
      '65°  ██',
      '60° ███',
      'Current: 70°C | Min: 60°C | Max: 70°C',
    ]);
  });

  it('should leave an empty column for an absent sample', () => {
    expect(renderTemperatureGraph(view([60, null, 70]), options(1), plain)).toEqual([
      '60° █ █',
      'Current: 70°C | Min: 60°C | Max: 70°C',
    ]);
  });

  it('should report N/A as current when the latest sample is absent', () => {
    const lines = renderTemperatureGraph(view([60, 70, null]), options(1), plain);
    expect(lines[lines.length - 1]).toBe('Current: N/A | Min: 60°C | Max: 70°C');
  });

  it('should draw only the newest samples that fit', () => {
    expect(renderTemperatureGraph(view([90, 60, 61, 62]), options(1, 3), plain)[0]).toBe('60° ███');
  });

  it('should add a timeline every ten samples', () => {
    const lines = renderTemperatureGraph(view([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]), options(1), plain);

    expect(lines[1]).toBe('   │───────── 10 samples');
  });

  it('should color each bar by the severity of its sample', () => {
    const colored = createPalette(DEFAULT_CONFIG.colors, 1);
    const lines = renderTemperatureGraph(view([75, 85]), options(1), colored);

    expect(lines[0]).toBe('\u001b[2m75°\u001b[22m \u001b[33m█\u001b[39m\u001b[31m█\u001b[39m');
  });
});
