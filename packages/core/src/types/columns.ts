/**
 * Column role assignments
 */

/** 0-based column indices for one side of the sheet */
export interface SideColumns {
  /** Column holding the line-item name */
  name: number;
  /** Column holding the budget figure */
  budget: number;
  /** Column holding the actual figure */
  actual: number;
}

/** Column roles for both sides */
export interface ColumnMapping {
  left: SideColumns;
  right: SideColumns;
}

/** Fixed-position layout: A,B,C on the left and E,F,G on the right */
export const DEFAULT_COLUMN_MAPPING: ColumnMapping = {
  left: { name: 0, budget: 1, actual: 2 },
  right: { name: 4, budget: 5, actual: 6 },
};
