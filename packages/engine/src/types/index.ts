/**
 * Type exports for the engine
 */

export type {
  ParsedNumber,
  EmptyCellPolicy,
  LedgerRecord,
} from './records.js';

export type {
  MatchKind,
  RecordMatch,
  Agreement,
  FigureField,
  ComparisonResult,
  HeaderPolicy,
  RowRange,
  ReconcileOptions,
  ValidationOptions,
  AttentionOptions,
} from './reconciliation.js';

export type {
  SourceInfo,
  ResolvedValidationOptions,
  ValidationSummary,
  ValidationReport,
} from './report.js';
