/**
 * Terminal width detection for responsive table rendering.
 *
 * Below 80 columns tables drop their borders and padding so rows fit in
 * narrow panes.
 */

import type { TableConstructorOptions } from 'cli-table3';

export const COMPACT_THRESHOLD = 80;

/**
 * Border characters for compact tables: everything blank, columns separated
 * by a single space.
 */
export const COMPACT_TABLE_CHARS = {
  top: '',
  'top-mid': '',
  'top-left': '',
  'top-right': '',
  bottom: '',
  'bottom-mid': '',
  'bottom-left': '',
  'bottom-right': '',
  left: '',
  'left-mid': '',
  mid: '',
  'mid-mid': '',
  right: '',
  'right-mid': '',
  middle: ' ',
};

/**
 * Current terminal width in columns. Non-TTY output (pipes, files) counts
 * as 120 columns so logs get full tables.
 */
export function getTerminalWidth(): number {
  return process.stdout.columns || 120;
}

export function shouldUseCompactMode(
  threshold: number = COMPACT_THRESHOLD
): boolean {
  return getTerminalWidth() < threshold;
}

/**
 * cli-table3 options for the current terminal width.
 *
 * @param head - Column headers
 * @param fullWidths - Column widths with borders
 * @param compactWidths - Column widths below the compact threshold
 */
export function responsiveTableOptions(
  head: string[],
  fullWidths: number[],
  compactWidths: number[]
): TableConstructorOptions {
  if (shouldUseCompactMode()) {
    return {
      head,
      colWidths: compactWidths,
      chars: COMPACT_TABLE_CHARS,
      style: { 'padding-left': 0, 'padding-right': 1, head: [] },
    };
  }
  return {
    head,
    colWidths: fullWidths,
    style: { head: [], border: ['grey'] },
  };
}
