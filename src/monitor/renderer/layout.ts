/**
 * Row and table layout helpers for panel content.
 */

import type { Palette } from './palette.js';

export interface Cell {
  text: string;
  style?: (text: string) => string;
}

export type Align = 'left' | 'right';

export function cell(text: string, style?: (text: string) => string): Cell {
  return { text, style };
}

/**
 * Label/value rows with the labels padded to a common width
 */
export function keyValueRows(rows: ReadonlyArray<readonly [string, string]>, palette: Palette): string[] {
  const labelWidth = Math.max(0, ...rows.map(([label]) => label.length));
  return rows.map(([label, value]) => `${palette.bold(label.padEnd(labelWidth))}  ${value}`);
}

export function table(
  headers: readonly string[],
  rows: ReadonlyArray<readonly Cell[]>,
  aligns: readonly Align[],
  palette: Palette,
): string[] {
  const widths = headers.map((header, column) =>
    Math.max(header.length, ...rows.map(row => row[column]?.text.length ?? 0)),
  );

  const align = (text: string, column: number) =>
    aligns[column] === 'right' ? text.padStart(widths[column]) : text.padEnd(widths[column]);

  const headerLine = headers.map((header, column) => palette.bold(align(header, column))).join('  ');
  const body = rows.map(row =>
    row
      .map((entry, column) => {
        const padded = align(entry.text, column);
        return entry.style ? entry.style(padded) : padded;
      })
      .join('  ')
      .trimEnd(),
  );

  return [headerLine.trimEnd(), ...body];
}
