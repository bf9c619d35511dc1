/**
 * Validation Report Formatter
 *
 * Formats validation reports as plain text for the terminal.
 */

import { needsAttention } from '../reconciliation/attention.js';
import type {
  AttentionOptions,
  ComparisonResult,
  ValidationReport,
} from '../types/index.js';
import { formatFigure, formatScore } from './utils.js';

export interface ReportFormatOptions {
  /** List every result, not only those needing attention */
  showAll?: boolean;
}

/**
 * Format one comparison result as a block of lines
 */
export function formatResult(
  result: ComparisonResult,
  options: AttentionOptions = {}
): string[] {
  const { left, match } = result;
  const flag = needsAttention(result, options) ? ' [needs attention]' : '';
  const lines: string[] = [];

  if (match.kind === 'none') {
    lines.push(`**${left.displayName}** (row ${left.sourceRowIndex}) ↔ no match${flag}`);
    lines.push(`- Budget: ${formatFigure(left.budget)}`);
    lines.push(`- Actual: ${formatFigure(left.actual)}`);
  } else {
    const right = match.record;
    const how = match.kind === 'fuzzy' ? `fuzzy ${formatScore(match.score)}` : 'exact';
    lines.push(
      `**${left.displayName}** (row ${left.sourceRowIndex}) ↔ ` +
        `${right.displayName} (row ${right.sourceRowIndex}, ${how})${flag}`
    );
    lines.push(`- Budget: ${formatFigure(left.budget)} | ${formatFigure(right.budget)}`);
    lines.push(`- Actual: ${formatFigure(left.actual)} | ${formatFigure(right.actual)}`);
  }

  for (const note of result.notes) {
    lines.push(`- ${note}`);
  }

  return lines;
}

/**
 * Format a validation report as plain text
 */
export function formatValidationReport(
  report: ValidationReport,
  options: ReportFormatOptions = {}
): string {
  const lines: string[] = [];
  const { summary } = report;
  const attention: AttentionOptions = {
    flagIndeterminate: report.options.flagIndeterminate,
  };

  // Header
  lines.push(`## Budget/Actual Validation`);
  lines.push(`Source: ${report.source.name} (${report.source.type})`);
  lines.push(`Generated: ${report.timestamp.toISOString()}`);
  lines.push(
    `Header row: ${report.headerRow === null ? 'none' : report.headerRow}`
  );
  lines.push('');

  // Summary
  lines.push(`### Summary`);
  lines.push(`- Total line items checked: ${summary.checked}`);
  lines.push(`- Needing attention: ${summary.needsAttention}`);
  lines.push(`- Exact matches: ${summary.exactMatches}`);
  lines.push(`- Fuzzy matches: ${summary.fuzzyMatches}`);
  lines.push(`- Unmatched: ${summary.unmatched}`);
  lines.push(`- Budget mismatches: ${summary.budgetDisagreements}`);
  lines.push(`- Actual mismatches: ${summary.actualDisagreements}`);
  lines.push(`- Unparseable figures: ${summary.indeterminateFields}`);
  lines.push(`- Right-side line items: ${summary.rightRecordCount}`);
  lines.push('');

  const shown = options.showAll
    ? report.results
    : report.results.filter((result) => needsAttention(result, attention));

  if (shown.length > 0) {
    lines.push(
      options.showAll
        ? `### Line Items (${shown.length})`
        : `### Needing Attention (${shown.length})`
    );
    for (const result of shown) {
      lines.push('');
      lines.push(...formatResult(result, attention));
    }
    lines.push('');
  } else if (!options.showAll) {
    lines.push('All line items agree.');
    lines.push('');
  }

  // Processing time
  lines.push(`---`);
  lines.push(`Processing time: ${report.processingTimeMs}ms`);

  return lines.join('\n');
}
