export { cellText, describeGrid, getCell } from './cells.js';
export { columnLetter, columnIndexFromLetter } from './columns.js';
