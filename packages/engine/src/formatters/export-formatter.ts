/**
 * Mismatch Export Rows
 *
 * Flattens attention-needing results into rows for a CSV export.
 */

import { needsAttention } from '../reconciliation/attention.js';
import type { AttentionOptions, ComparisonResult } from '../types/index.js';

export const EXPORT_COLUMNS = [
  'Left Row',
  'Left Name',
  'Left Budget',
  'Left Actual',
  'Right Row',
  'Right Name',
  'Right Budget',
  'Right Actual',
  'Notes',
] as const;

export type ExportColumn = (typeof EXPORT_COLUMNS)[number];

/** One export row; null cells are written empty */
export type ExportRow = { [K in ExportColumn]: string | number | null };

export function toExportRow(result: ComparisonResult): ExportRow {
  const { left, match } = result;
  const right = match.kind === 'none' ? null : match.record;

  return {
    'Left Row': left.sourceRowIndex,
    'Left Name': left.displayName,
    'Left Budget': left.budget,
    'Left Actual': left.actual,
    'Right Row': right?.sourceRowIndex ?? null,
    'Right Name': right?.displayName ?? null,
    'Right Budget': right?.budget ?? null,
    'Right Actual': right?.actual ?? null,
    Notes: result.notes.join(' | '),
  };
}

/**
 * Export rows for every result that needs attention, in result order
 */
export function toExportRows(
  results: readonly ComparisonResult[],
  options: AttentionOptions = {}
): ExportRow[] {
  return results
    .filter((result) => needsAttention(result, options))
    .map(toExportRow);
}
