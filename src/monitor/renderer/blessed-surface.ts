/**
 * blessed screen behind the DashboardSurface interface. Panels are bordered
 * boxes stacked down the screen; chalk styling inside box content is passed
 * through by blessed.
 */

import blessed from 'blessed';
import type { DashboardSurface } from './terminal-writer.js';

export function createBlessedSurface(): DashboardSurface {
  const screen = blessed.screen({
    smartCSR: true,
    title: 'System Dashboard',
    fullUnicode: true,
  });

  return {
    addPanel({ top, height, label, color, content }) {
      return blessed.box({
        parent: screen,
        top,
        left: 0,
        width: '100%',
        height,
        label: label ? ` ${label} ` : undefined,
        content,
        border: { type: 'line' },
        style: {
          border: { fg: color },
          label: { fg: color, bold: true },
        },
      });
    },
    onKeys(keys, listener) {
      screen.key(keys, () => listener());
    },
    render() {
      screen.render();
    },
    destroy() {
      screen.destroy();
    },
  };
}
