/**
 * Validation Report Types
 */

import type { ColumnMapping, GridInfo } from '@tallycheck/core';
import type { NameSimilarityAlgorithm } from '@tallycheck/similarity';
import type { EmptyCellPolicy } from './records.js';
import type { ComparisonResult, HeaderPolicy, RowRange } from './reconciliation.js';

/** Where the grid came from */
export interface SourceInfo {
  id: string;
  name: string;
  type: string;
}

/** Options after defaults have been applied */
export interface ResolvedValidationOptions {
  columns: ColumnMapping;
  tolerance: number;
  fuzzyThreshold: number;
  similarityAlgorithm: NameSimilarityAlgorithm;
  header: HeaderPolicy;
  rowRange?: RowRange;
  emptyCellPolicy: EmptyCellPolicy;
  flagIndeterminate: boolean;
}

/**
 * Summary statistics for a validation run
 */
export interface ValidationSummary {
  /** Left line items compared */
  checked: number;
  /** Results that need attention */
  needsAttention: number;
  exactMatches: number;
  fuzzyMatches: number;
  unmatched: number;
  budgetDisagreements: number;
  actualDisagreements: number;
  /** Figures on matched items that could not be compared */
  indeterminateFields: number;
  /** Distinct line items in the right index */
  rightRecordCount: number;
  /** Right rows overwritten by a later row with the same name */
  supersededRightRows: number;
}

/**
 * Complete validation report
 */
export interface ValidationReport {
  /** Unique report ID */
  id: string;
  /** Report generation timestamp */
  timestamp: Date;
  source: SourceInfo;
  /** Options the run used */
  options: ResolvedValidationOptions;
  /** Last excluded header row, or null when every row was data */
  headerRow: number | null;
  grid: GridInfo;
  summary: ValidationSummary;
  /** One result per left line item, in sheet order */
  results: ComparisonResult[];
  /** Processing time in milliseconds */
  processingTimeMs: number;
}
