/**
 * Box-drawn tables for CLI listings (`crag courses`).
 */

import chalk from 'chalk';

export type Alignment = 'left' | 'right';

export interface Column<K extends string = string> {
  header: string;
  key: K;
  align?: Alignment;
  /** Cells longer than this are cut with an ellipsis */
  maxWidth?: number;
}

export type Row<K extends string = string> = Record<K, string | number | null | undefined>;

const ANSI_PATTERN = /\x1B\[[0-9;]*m/g;

function visibleLength(text: string): number {
  return text.replace(ANSI_PATTERN, '').length;
}

/**
 * Cut plain text to `width` characters, marking the cut with `…`.
 */
export function truncate(text: string, width: number): string {
  if (width < 1) return '';
  if (text.length <= width) return text;
  return text.slice(0, width - 1) + '…';
}

function cellText<K extends string>(column: Column<K>, row: Row<K>): string {
  const value = row[column.key];
  const text = value === null || value === undefined ? '' : String(value);
  return column.maxWidth !== undefined ? truncate(text, column.maxWidth) : text;
}

function pad(text: string, width: number, align: Alignment): string {
  const gap = width - visibleLength(text);
  if (gap <= 0) return text;
  return align === 'right' ? ' '.repeat(gap) + text : text + ' '.repeat(gap);
}

/**
 * Render rows as a table:
 *
 * ```
 * ┌──────────────┬─────────┐
 * │ Course       │ Lessons │
 * ├──────────────┼─────────┤
 * │ Intro to RAG │       4 │
 * └──────────────┴─────────┘
 * ```
 */
export function formatTable<K extends string>(columns: Column<K>[], rows: Row<K>[]): string {
  if (columns.length === 0) return '';

  const body = rows.map((row) => columns.map((column) => cellText(column, row)));
  const widths = columns.map((column, i) =>
    Math.max(column.header.length, ...body.map((cells) => visibleLength(cells[i] ?? '')))
  );

  const rule = (left: string, middle: string, right: string): string =>
    left + widths.map((w) => '─'.repeat(w + 2)).join(middle) + right;

  const line = (cells: string[], header = false): string =>
    '│' +
    cells
      .map((cell, i) => {
        const padded = pad(cell, widths[i] ?? 0, columns[i]?.align ?? 'left');
        return ` ${header ? chalk.bold(padded) : padded} `;
      })
      .join('│') +
    '│';

  return [
    rule('┌', '┬', '┐'),
    line(
      columns.map((c) => c.header),
      true
    ),
    rule('├', '┼', '┤'),
    ...body.map((cells) => line(cells)),
    rule('└', '┴', '┘'),
  ].join('\n');
}
