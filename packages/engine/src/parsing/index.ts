export { parseNumber } from './numeric-parser.js';
export type { NumberParseOptions } from './numeric-parser.js';
export { detectHeaderRow } from './header-detector.js';
export { buildColumnLabels, resolveColumnRef } from './column-labels.js';
export type { ColumnRef } from './column-labels.js';
