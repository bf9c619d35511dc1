/**
 * @tallycheck/engine
 *
 * Budget/actual reconciliation for two-sided spreadsheets: numeric cell
 * parsing, header detection, record indexing and line-item matching.
 */

// Types
export * from './types/index.js';

// Interfaces
export * from './interfaces/index.js';

// Parsing
export {
  parseNumber,
  detectHeaderRow,
  buildColumnLabels,
  resolveColumnRef,
} from './parsing/index.js';
export type { NumberParseOptions, ColumnRef } from './parsing/index.js';

// Reconciliation
import { ReconciliationEngine as _ReconciliationEngine } from './reconciliation/index.js';
export {
  ReconciliationEngine,
  RecordIndex,
  NameMatcher,
  collectRecords,
  readRecord,
  normalizeKey,
  compareFigures,
  needsAttention,
  DEFAULT_TOLERANCE,
  DEFAULT_FUZZY_THRESHOLD,
  validationOptionsSchema,
  reconcileOptionsSchema,
  headerPolicySchema,
  resolveValidationOptions,
  resolveReconcileOptions,
} from './reconciliation/index.js';
export type {
  RecordReadOptions,
  NameMatcherOptions,
  FigureComparison,
} from './reconciliation/index.js';

// Formatters
export {
  formatValidationReport,
  formatResult,
  toExportRows,
  toExportRow,
  EXPORT_COLUMNS,
  formatAmount,
  formatFigure,
  formatScore,
} from './formatters/index.js';
export type { ReportFormatOptions, ExportColumn, ExportRow } from './formatters/index.js';

// Errors
export { ReconciliationError } from './errors/index.js';
export type {
  ReconciliationErrorCode,
  ReconciliationErrorDetails,
} from './errors/index.js';

/**
 * Factory function to create a ReconciliationEngine
 */
export function createReconciliationEngine(): _ReconciliationEngine {
  return new _ReconciliationEngine();
}
