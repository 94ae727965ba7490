/**
 * Temperature Graph
 *
 * Column chart of one history buffer. The y-axis spans the buffer's own
 * min/max so small swings stay visible on any hardware; every filled cell is
 * colored by the severity of the sample it belongs to. Absent samples leave
 * an empty column.
 */

import { classify, type Thresholds } from '../thresholds/classifier.js';
import { formatTemperature } from './format.js';
import type { Palette } from './palette.js';
import type { HistoryView } from '../types/index.js';

export interface GraphOptions {
  height: number;
  /** Maximum number of samples drawn, newest kept */
  length: number;
  thresholds: Thresholds;
}

export const NO_DATA = 'No data available';
export const COLLECTING = 'Collecting data...';

const BAR = '█';
const TIMELINE_MARK_EVERY = 10;

export function renderTemperatureGraph(view: HistoryView, options: GraphOptions, palette: Palette): string[] {
  const { stats } = view;
  if (!stats) {
    return [palette.dim(NO_DATA)];
  }
  if (stats.count < 2) {
    return [palette.dim(COLLECTING)];
  }

  const window = view.readings.slice(-options.length);
  const range = stats.max === stats.min ? 1 : stats.max - stats.min;

  const levels: number[] = [];
  for (let row = 0; row < options.height; row++) {
    levels.push(stats.min + (range * (options.height - row - 1)) / options.height);
  }

  const labels = levels.map(level => `${level.toFixed(0)}°`);
  const labelWidth = Math.max(...labels.map(label => label.length)) + 1;

  const lines = levels.map((level, row) => {
    let line = palette.dim(labels[row].padStart(labelWidth - 1)) + ' ';
    for (const reading of window) {
      if (reading.value !== null && reading.value >= level) {
        line += palette.severity(classify(reading.value, options.thresholds), BAR);
      } else {
        line += ' ';
      }
    }
    return line;
  });

  if (window.length >= TIMELINE_MARK_EVERY) {
    let timeline = ' '.repeat(labelWidth);
    for (let i = 0; i < window.length; i++) {
      timeline += i % TIMELINE_MARK_EVERY === 0 ? '│' : '─';
    }
    lines.push(palette.dim(`${timeline} ${window.length} samples`));
  }

  const current = window[window.length - 1]?.value ?? null;
  lines.push(
    palette.dim('Current: ') +
      palette.severity(classify(current, options.thresholds), formatTemperature(current)) +
      palette.dim(` | Min: ${formatTemperature(stats.min)} | Max: ${formatTemperature(stats.max)}`),
  );

  return lines;
}
