export type { CellValue, GridRow, Grid, GridInfo } from './grid.js';
export type { SideColumns, ColumnMapping } from './columns.js';
export { DEFAULT_COLUMN_MAPPING } from './columns.js';
