/**
 * Column labels and column references
 */

import {
  cellText,
  columnIndexFromLetter,
  columnLetter,
  describeGrid,
  getCell,
} from '@tallycheck/core';
import type { Grid } from '@tallycheck/core';
import { ReconciliationError } from '../errors/index.js';

/** A column given as a 0-based index, a letter or a header label */
export type ColumnRef = string | number;

/**
 * One label per column. Without a header row the labels are the column
 * letters; with one, the header text, with `Column_<letter>` for blanks
 * and `_1`, `_2`... appended to repeats.
 */
export function buildColumnLabels(grid: Grid, headerRow: number | null): string[] {
  const { columnCount } = describeGrid(grid);

  if (headerRow === null) {
    return Array.from({ length: columnCount }, (_, i) => columnLetter(i));
  }

  const seen = new Map<string, number>();
  const labels: string[] = [];

  for (let column = 0; column < columnCount; column++) {
    const text =
      cellText(getCell(grid, headerRow, column)) || `Column_${columnLetter(column)}`;
    const repeats = seen.get(text);

    if (repeats === undefined) {
      seen.set(text, 0);
      labels.push(text);
    } else {
      seen.set(text, repeats + 1);
      labels.push(`${text}_${repeats + 1}`);
    }
  }

  return labels;
}

/**
 * Resolve a column reference to a 0-based index.
 *
 * Strings are tried in order as an exact label, a number, a
 * case-insensitive label and finally a column letter. The index is not checked against the grid
 * width here.
 */
export function resolveColumnRef(ref: ColumnRef, labels: readonly string[]): number {
  if (typeof ref === 'number') {
    if (Number.isInteger(ref) && ref >= 0) {
      return ref;
    }
    throw invalidColumn(String(ref), labels);
  }

  const text = ref.trim();

  const exact = labels.indexOf(text);
  if (exact !== -1) {
    return exact;
  }

  if (/^\d+$/.test(text)) {
    return Number.parseInt(text, 10);
  }

  const lower = text.toLowerCase();
  const folded = labels.findIndex((label) => label.toLowerCase() === lower);
  if (folded !== -1) {
    return folded;
  }

  const fromLetter = columnIndexFromLetter(text);
  if (fromLetter !== null) {
    return fromLetter;
  }

  throw invalidColumn(text, labels);
}

function invalidColumn(ref: string, labels: readonly string[]): ReconciliationError {
  return new ReconciliationError({
    code: 'INVALID_COLUMN',
    message: `Unknown column "${ref}"`,
    suggestion:
      'Use a 0-based column number, a column letter such as "B", or a header label.',
    context: { ref, labels: [...labels] },
  });
}
