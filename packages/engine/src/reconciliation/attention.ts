import type { AttentionOptions, ComparisonResult } from '../types/index.js';

/**
 * True when a result should be reviewed: unmatched, or any figure
 * disagrees. Indeterminate figures count only with flagIndeterminate.
 */
export function needsAttention(
  result: ComparisonResult,
  options: AttentionOptions = {}
): boolean {
  if (result.match.kind === 'none') {
    return true;
  }

  if (result.budgetAgreement === 'disagree' || result.actualAgreement === 'disagree') {
    return true;
  }

  return (
    options.flagIndeterminate === true &&
    (result.budgetAgreement === 'indeterminate' ||
      result.actualAgreement === 'indeterminate')
  );
}
