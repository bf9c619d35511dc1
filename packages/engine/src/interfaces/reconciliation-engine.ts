/**
 * Reconciliation Engine Interface
 *
 * Interface for comparing the two line-item lists of a sheet.
 */

import type { Grid } from '@tallycheck/core';
import type { RecordIndex } from '../reconciliation/record-index.js';
import type {
  ComparisonResult,
  LedgerRecord,
  ReconcileOptions,
  SourceInfo,
  ValidationOptions,
  ValidationReport,
} from '../types/index.js';

/**
 * Reconciliation Engine Interface
 *
 * Matches every left line item to a right line item by name and checks
 * that their budget and actual figures agree.
 */
export interface IReconciliationEngine {
  /**
   * Compare prepared left records against a right index.
   *
   * @returns One result per left record, in input order
   */
  reconcile(
    leftRecords: readonly LedgerRecord[],
    rightIndex: RecordIndex,
    options: ReconcileOptions
  ): ComparisonResult[];

  /**
   * Validate a whole grid: resolve the header, read both sides,
   * reconcile and summarize.
   *
   * @param source - Where the grid came from, for the report
   */
  run(grid: Grid, options: ValidationOptions, source?: SourceInfo): ValidationReport;
}
