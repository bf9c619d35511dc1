export { formatValidationReport, formatResult } from './report-formatter.js';
export type { ReportFormatOptions } from './report-formatter.js';
export { toExportRows, toExportRow, EXPORT_COLUMNS } from './export-formatter.js';
export type { ExportColumn, ExportRow } from './export-formatter.js';
export { formatAmount, formatFigure, formatScore } from './utils.js';
