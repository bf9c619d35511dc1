/**
 * Header Row Detection
 *
 * Decides whether row 0 is a header: a header row carries at most one
 * numeric cell while the rows below it are mostly numbers.
 */

import { describeGrid, getCell } from '@tallycheck/core';
import type { Grid } from '@tallycheck/core';
import { parseNumber } from './numeric-parser.js';

const DEFAULT_COLUMNS_TO_CHECK = 6;

/**
 * Index of the header row (always 0), or null when row 0 looks like data.
 */
export function detectHeaderRow(
  grid: Grid,
  columnsToCheck?: readonly number[],
  maxRowsToScan = 6
): number | null {
  if (grid.length < 2) {
    return null;
  }

  const rowsToScan = Math.min(maxRowsToScan, grid.length);
  if (rowsToScan < 2) {
    return null;
  }

  const columns = columnsToCheck
    ? [...new Set(columnsToCheck)]
    : defaultColumns(grid);

  const counts: number[] = [];
  for (let row = 0; row < rowsToScan; row++) {
    counts.push(
      columns.filter((column) => parseNumber(getCell(grid, row, column)) !== null)
        .length
    );
  }

  const [first = 0, ...rest] = counts;
  const average = rest.reduce((sum, count) => sum + count, 0) / rest.length;

  return first <= 1 && average >= 2 ? 0 : null;
}

function defaultColumns(grid: Grid): number[] {
  const width = Math.min(DEFAULT_COLUMNS_TO_CHECK, describeGrid(grid).columnCount);
  return Array.from({ length: width }, (_, i) => i);
}
