/**
 * Utility functions for working with raw cells and grids
 */

import type { CellValue, Grid, GridInfo } from '../types/index.js';

/**
 * Text content of a cell, trimmed. Empty cells yield ''.
 */
export function cellText(cell: CellValue): string {
  if (cell === null || cell === undefined) {
    return '';
  }

  if (cell instanceof Date) {
    return isNaN(cell.getTime()) ? '' : cell.toISOString();
  }

  if (typeof cell === 'number') {
    return Number.isNaN(cell) ? '' : String(cell);
  }

  return String(cell).trim();
}

/**
 * Row count and width of the widest row
 */
export function describeGrid(grid: Grid): GridInfo {
  let columnCount = 0;
  for (const row of grid) {
    if (row.length > columnCount) {
      columnCount = row.length;
    }
  }
  return { rowCount: grid.length, columnCount };
}

/**
 * Cell at (row, column), or undefined outside a ragged row
 */
export function getCell(grid: Grid, row: number, column: number): CellValue {
  return grid[row]?.[column];
}
