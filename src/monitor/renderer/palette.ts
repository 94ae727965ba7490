/**
 * Palette
 *
 * Severity to color mapping through chalk. `unknown` is drawn dim so an
 * unavailable metric never looks healthy or alarming.
 */

import { Chalk, type ChalkInstance, type ColorSupportLevel } from 'chalk';
import type { ColorOptions } from '../types/index.js';
import type { Severity } from '../thresholds/classifier.js';

export interface Palette {
  severity(severity: Severity, text: string): string;
  dim(text: string): string;
  bold(text: string): string;
}

export function createPalette(colors: ColorOptions, level?: ColorSupportLevel): Palette {
  const ink: ChalkInstance = level === undefined ? new Chalk() : new Chalk({ level });

  return {
    severity(severity, text) {
      switch (severity) {
        case 'normal':
          return ink[colors.normal](text);
        case 'warning':
          return ink[colors.warning](text);
        case 'critical':
          return ink[colors.critical](text);
        case 'unknown':
          return ink.dim(text);
      }
    },
    dim: text => ink.dim(text),
    bold: text => ink.bold(text),
  };
}
