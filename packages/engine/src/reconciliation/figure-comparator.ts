/**
 * Figure Comparator
 *
 * Compares one figure of a matched pair within an absolute tolerance.
 */

import { formatAmount } from '../formatters/utils.js';
import type { Agreement, FigureField, ParsedNumber } from '../types/index.js';

export interface FigureComparison {
  field: FigureField;
  agreement: Agreement;
  /** Present unless the figures agree */
  note?: string;
}

const FIELD_LABELS: Record<FigureField, string> = {
  budget: 'Budget',
  actual: 'Actual',
};

export function compareFigures(
  field: FigureField,
  left: ParsedNumber,
  right: ParsedNumber,
  tolerance: number
): FigureComparison {
  const label = FIELD_LABELS[field];

  if (left === null && right === null) {
    return { field, agreement: 'indeterminate', note: `${label} unparseable on both sides` };
  }
  if (left === null) {
    return { field, agreement: 'indeterminate', note: `${label} unparseable on left side` };
  }
  if (right === null) {
    return { field, agreement: 'indeterminate', note: `${label} unparseable on right side` };
  }

  const difference = Math.abs(left - right);
  if (difference <= tolerance) {
    return { field, agreement: 'agree' };
  }

  return {
    field,
    agreement: 'disagree',
    note:
      `${label} mismatch: left ${formatAmount(left)}, right ${formatAmount(right)} ` +
      `(difference ${formatAmount(difference)})`,
  };
}
