/**
 * Frame Renderer
 *
 * Pure function of a snapshot and the config: the same inputs always give
 * the same frame. A frame is a list of titled panels; putting them on the
 * terminal is the TerminalWriter's job.
 */

import { createPalette, type Palette } from './palette.js';
import { diskLines, gpuLines, headerLines, systemLines, temperatureLines, FOOTER } from './panels.js';
import type { DashboardConfig, DashboardSnapshot } from '../types/index.js';

export interface RenderOptions {
  /** Terminal columns available for the frame */
  width: number;
  palette?: Palette;
}

export type PanelId = 'header' | 'temperatures' | 'system' | 'gpu' | 'disks' | 'footer';

export type PanelColor = 'blue' | 'cyan' | 'green' | 'magenta' | 'yellow' | 'gray';

export interface FramePanel {
  id: PanelId;
  /** Empty for untitled panels */
  title: string;
  color: PanelColor;
  lines: string[];
}

export interface Frame {
  panels: FramePanel[];
}

export const MIN_WIDTH = 40;

// Box borders, row indent, y-axis labels and the timeline's sample count
const GRAPH_CHROME = 24;

/**
 * Samples per graph row: the configured length, capped by what fits
 */
export function graphLengthFor(width: number, configured: number): number {
  return Math.max(10, Math.min(configured, width - GRAPH_CHROME));
}

export function renderFrame(snapshot: DashboardSnapshot, config: DashboardConfig, options: RenderOptions): Frame {
  const palette = options.palette ?? createPalette(config.colors);
  const width = Math.max(MIN_WIDTH, options.width);
  const graphLength = graphLengthFor(width, config.display.graphLength);

  const panels: FramePanel[] = [
    { id: 'header', title: '', color: 'blue', lines: headerLines(snapshot, palette) },
    {
      id: 'temperatures',
      title: 'Temperatures & History',
      color: 'cyan',
      lines: temperatureLines(snapshot, config, graphLength, palette),
    },
    { id: 'system', title: 'System Info', color: 'green', lines: systemLines(snapshot, config, palette) },
  ];

  if (config.display.showGpu) {
    panels.push({ id: 'gpu', title: 'GPU Info', color: 'magenta', lines: gpuLines(snapshot, palette) });
  }

  panels.push({ id: 'disks', title: 'Disk Usage', color: 'yellow', lines: diskLines(snapshot, palette) });
  panels.push({ id: 'footer', title: '', color: 'gray', lines: [palette.dim(FOOTER)] });

  return { panels };
}

/**
 * Frame as ordinary text: titled panels get a heading and indented content
 */
export function frameToText(frame: Frame): string {
  return frame.panels
    .map(panel => (panel.title ? [panel.title, ...panel.lines.map(line => `  ${line}`)] : panel.lines).join('\n'))
    .join('\n\n');
}
