/**
 * Terminal Writers
 *
 * The only place that touches the terminal. The blessed writer owns the
 * screen and keeps one bordered box per panel, updating box content in
 * place between ticks; the plain writer prints frames as ordinary output for
 * one-shot runs and pipes.
 */

import { TerminalRenderFailure, toErrorMessage } from '../errors.js';
import { createBlessedSurface } from './blessed-surface.js';
import { frameToText, type Frame, type PanelColor } from './renderer.js';

export interface TerminalStream {
  isTTY?: boolean;
  columns?: number;
  write(chunk: string): boolean;
}

export interface TerminalWriter {
  /** Prepare the terminal; throws TerminalRenderFailure when it cannot be used */
  enter(): void;
  draw(frame: Frame): void;
  leave(): void;
  columns(): number;
  /** Quit requests from the keyboard, for writers that read it */
  onQuit?(listener: () => void): void;
}

export interface PanelBoxOptions {
  top: number;
  height: number;
  label?: string;
  color: PanelColor;
  content: string;
}

export interface PanelBox {
  setContent(content: string): void;
  destroy(): void;
}

/**
 * What the blessed writer needs from a screen library
 */
export interface DashboardSurface {
  addPanel(options: PanelBoxOptions): PanelBox;
  onKeys(keys: string[], listener: () => void): void;
  render(): void;
  destroy(): void;
}

export type SurfaceFactory = () => DashboardSurface;

export const DEFAULT_COLUMNS = 100;

export const QUIT_KEYS = ['C-c', 'q', 'escape'];

function guarded<T>(action: string, run: () => T): T {
  try {
    return run();
  } catch (error) {
    if (error instanceof TerminalRenderFailure) {
      throw error;
    }
    throw new TerminalRenderFailure(`${action}: ${toErrorMessage(error)}`, error);
  }
}

/** Panel ids and heights; boxes are rebuilt only when this changes */
function layoutKey(frame: Frame): string {
  return frame.panels.map(panel => `${panel.id}:${panel.lines.length}`).join(',');
}

export class BlessedTerminalWriter implements TerminalWriter {
  private surface: DashboardSurface | null = null;
  private boxes: PanelBox[] = [];
  private layout = '';
  private readonly quitListeners: Array<() => void> = [];

  constructor(
    private readonly stream: TerminalStream = process.stdout,
    private readonly createSurface: SurfaceFactory = createBlessedSurface,
  ) {}

  onQuit(listener: () => void): void {
    this.quitListeners.push(listener);
  }

  enter(): void {
    if (!this.stream.isTTY) {
      throw new TerminalRenderFailure('output is not an interactive terminal');
    }
    const surface = guarded('screen could not be opened', () => this.createSurface());
    this.surface = surface;
    surface.onKeys(QUIT_KEYS, () => {
      for (const listener of this.quitListeners) {
        listener();
      }
    });
  }

  draw(frame: Frame): void {
    const surface = this.surface;
    if (!surface) {
      throw new TerminalRenderFailure('draw called before enter');
    }

    guarded('frame could not be drawn', () => {
      const layout = layoutKey(frame);
      if (layout === this.layout) {
        frame.panels.forEach((panel, index) => {
          this.boxes[index].setContent(panel.lines.join('\n'));
        });
      } else {
        this.rebuild(surface, frame);
        this.layout = layout;
      }
      surface.render();
    });
  }

  leave(): void {
    const surface = this.surface;
    if (!surface) {
      return;
    }
    this.surface = null;
    this.boxes = [];
    this.layout = '';
    guarded('screen could not be restored', () => surface.destroy());
  }

  columns(): number {
    return this.stream.columns ?? DEFAULT_COLUMNS;
  }

  private rebuild(surface: DashboardSurface, frame: Frame): void {
    for (const box of this.boxes) {
      box.destroy();
    }

    let top = 0;
    this.boxes = frame.panels.map(panel => {
      // Two rows of border around the content
      const height = panel.lines.length + 2;
      const box = surface.addPanel({
        top,
        height,
        label: panel.title || undefined,
        color: panel.color,
        content: panel.lines.join('\n'),
      });
      top += height;
      return box;
    });
  }
}

export class PlainTerminalWriter implements TerminalWriter {
  constructor(private readonly stream: TerminalStream = process.stdout) {}

  enter(): void {}

  draw(frame: Frame): void {
    guarded('frame could not be written', () => this.stream.write(`${frameToText(frame)}\n`));
  }

  leave(): void {}

  columns(): number {
    return this.stream.columns ?? DEFAULT_COLUMNS;
  }
}
