/**
 * Grid types for raw tabular data handed to the engine
 */

/** A raw cell as delivered by a tabular reader */
export type CellValue = string | number | boolean | Date | null | undefined;

/** One row of raw cells; rows may be ragged */
export type GridRow = readonly CellValue[];

/** Rows x columns of raw cells, read-only for the duration of a run */
export type Grid = readonly GridRow[];

/** Shape information about a loaded grid */
export interface GridInfo {
  /** Number of rows */
  rowCount: number;
  /** Width of the widest row */
  columnCount: number;
}
