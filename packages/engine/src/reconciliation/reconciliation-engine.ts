/**
 * Reconciliation Engine
 *
 * Compares the left and right line-item lists of a budget/actual sheet.
 */

import { randomUUID } from 'crypto';
import { columnLetter, describeGrid } from '@tallycheck/core';
import type { ColumnMapping, Grid, GridInfo } from '@tallycheck/core';
import type { IReconciliationEngine } from '../interfaces/index.js';
import type {
  ComparisonResult,
  LedgerRecord,
  ReconcileOptions,
  ResolvedValidationOptions,
  SourceInfo,
  ValidationOptions,
  ValidationReport,
  ValidationSummary,
} from '../types/index.js';
import { ReconciliationError } from '../errors/index.js';
import { detectHeaderRow } from '../parsing/index.js';
import { formatScore } from '../formatters/utils.js';
import { collectRecords, RecordIndex } from './record-index.js';
import { NameMatcher } from './name-matcher.js';
import { compareFigures } from './figure-comparator.js';
import { needsAttention } from './attention.js';
import { resolveReconcileOptions, resolveValidationOptions } from './options.js';

const IN_MEMORY_SOURCE: SourceInfo = { id: 'grid', name: 'grid', type: 'memory' };

/**
 * Reconciliation Engine Implementation
 *
 * Holds no state between runs.
 */
export class ReconciliationEngine implements IReconciliationEngine {
  reconcile(
    leftRecords: readonly LedgerRecord[],
    rightIndex: RecordIndex,
    options: ReconcileOptions
  ): ComparisonResult[] {
    const { tolerance, fuzzyThreshold, similarityAlgorithm } =
      resolveReconcileOptions(options);
    const matcher = new NameMatcher({ fuzzyThreshold, algorithm: similarityAlgorithm });

    return leftRecords.map((left) =>
      this.compareRecord(left, rightIndex, matcher, tolerance)
    );
  }

  run(
    grid: Grid,
    options: ValidationOptions,
    source: SourceInfo = IN_MEMORY_SOURCE
  ): ValidationReport {
    const startTime = Date.now();

    const resolved = resolveValidationOptions(options);
    const gridInfo = describeGrid(grid);

    // Validate grid shape before any row is read
    this.validateColumns(resolved.columns, gridInfo);

    const headerRow = this.resolveHeaderRow(grid, resolved, gridInfo);

    const rightIndex = RecordIndex.build(grid, resolved.columns.right, {
      headerRow,
      emptyCellPolicy: resolved.emptyCellPolicy,
    });
    const leftRecords = collectRecords(grid, resolved.columns.left, {
      headerRow,
      rowRange: resolved.rowRange,
      emptyCellPolicy: resolved.emptyCellPolicy,
    });

    const results = this.reconcile(leftRecords, rightIndex, resolved);

    return {
      id: randomUUID(),
      timestamp: new Date(),
      source,
      options: resolved,
      headerRow,
      grid: gridInfo,
      summary: this.summarize(results, rightIndex, resolved.flagIndeterminate),
      results,
      processingTimeMs: Date.now() - startTime,
    };
  }

  private compareRecord(
    left: LedgerRecord,
    rightIndex: RecordIndex,
    matcher: NameMatcher,
    tolerance: number
  ): ComparisonResult {
    const match = matcher.match(left.normalizedKey, rightIndex);

    if (match.kind === 'none') {
      const unmatched: ComparisonResult = {
        left,
        match,
        budgetAgreement: 'indeterminate',
        actualAgreement: 'indeterminate',
        notes: Object.freeze(['No matching line item found on right side']),
      };
      return Object.freeze(unmatched);
    }

    const notes: string[] = [];
    if (match.kind === 'fuzzy') {
      notes.push(
        `Fuzzy match "${match.record.displayName}" (score ${formatScore(match.score)})`
      );
    }

    const budget = compareFigures('budget', left.budget, match.record.budget, tolerance);
    const actual = compareFigures('actual', left.actual, match.record.actual, tolerance);

    for (const comparison of [budget, actual]) {
      if (comparison.note) {
        notes.push(comparison.note);
      }
    }

    const result: ComparisonResult = {
      left,
      match,
      budgetAgreement: budget.agreement,
      actualAgreement: actual.agreement,
      notes: Object.freeze(notes),
    };
    return Object.freeze(result);
  }

  private validateColumns(columns: ColumnMapping, grid: GridInfo): void {
    for (const side of ['left', 'right'] as const) {
      for (const role of ['name', 'budget', 'actual'] as const) {
        const index = columns[side][role];
        if (index >= grid.columnCount) {
          throw new ReconciliationError({
            code: 'COLUMN_OUT_OF_RANGE',
            message:
              `Column ${columnLetter(index)} (${side} ${role}) is outside the sheet, ` +
              `which has ${grid.columnCount} column(s)`,
            suggestion: 'Map every role to a column that exists in the sheet.',
            context: { side, role, index, columnCount: grid.columnCount },
          });
        }
      }
    }
  }

  private resolveHeaderRow(
    grid: Grid,
    options: ResolvedValidationOptions,
    gridInfo: GridInfo
  ): number | null {
    const { header, columns } = options;

    switch (header.mode) {
      case 'none':
        return null;
      case 'auto':
        return detectHeaderRow(grid, [
          columns.left.name,
          columns.left.budget,
          columns.left.actual,
          columns.right.name,
          columns.right.budget,
          columns.right.actual,
        ]);
      case 'row':
        if (header.row >= gridInfo.rowCount) {
          throw new ReconciliationError({
            code: 'INVALID_OPTIONS',
            message: `Header row ${header.row} is outside the sheet, which has ${gridInfo.rowCount} row(s)`,
            suggestion: 'Pick a header row that exists, or use header mode "auto".',
            context: { row: header.row, rowCount: gridInfo.rowCount },
          });
        }
        return header.row;
    }
  }

  private summarize(
    results: readonly ComparisonResult[],
    rightIndex: RecordIndex,
    flagIndeterminate: boolean
  ): ValidationSummary {
    const summary: ValidationSummary = {
      checked: results.length,
      needsAttention: 0,
      exactMatches: 0,
      fuzzyMatches: 0,
      unmatched: 0,
      budgetDisagreements: 0,
      actualDisagreements: 0,
      indeterminateFields: 0,
      rightRecordCount: rightIndex.size,
      supersededRightRows: rightIndex.supersededCount,
    };

    for (const result of results) {
      if (needsAttention(result, { flagIndeterminate })) {
        summary.needsAttention++;
      }

      switch (result.match.kind) {
        case 'exact':
          summary.exactMatches++;
          break;
        case 'fuzzy':
          summary.fuzzyMatches++;
          break;
        case 'none':
          summary.unmatched++;
          continue;
      }

      if (result.budgetAgreement === 'disagree') summary.budgetDisagreements++;
      if (result.actualAgreement === 'disagree') summary.actualDisagreements++;
      if (result.budgetAgreement === 'indeterminate') summary.indeterminateFields++;
      if (result.actualAgreement === 'indeterminate') summary.indeterminateFields++;
    }

    return summary;
  }
}
