/**
 * Numeric Cell Parser
 *
 * Reads budget and actual figures out of spreadsheet cells. Text cells may
 * carry currency symbols, thousands separators and accounting-style
 * parentheses for negatives.
 */

import type { CellValue } from '@tallycheck/core';
import type { EmptyCellPolicy, ParsedNumber } from '../types/index.js';

export interface NumberParseOptions {
  /** Default: "unparseable" */
  emptyCellPolicy?: EmptyCellPolicy;
}

// Anything but digits, sign, decimal point, comma and parentheses
const DISALLOWED_CHARS = /[^\d+\-.,()]/g;
const NUMBER_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)$/;
const PARENTHESIZED = /^\((.*)\)$/;

function convert(text: string): ParsedNumber {
  if (!NUMBER_PATTERN.test(text)) {
    return null;
  }
  const value = Number(text);
  return Number.isFinite(value) ? value : null;
}

/**
 * Parse a cell as a number.
 *
 * @example
 * parseNumber('(1,234.50)') // -1234.5
 * parseNumber('$ 1,000')    // 1000
 * parseNumber('n/a')        // null
 */
export function parseNumber(
  cell: CellValue,
  options: NumberParseOptions = {}
): ParsedNumber {
  const emptyValue = options.emptyCellPolicy === 'zero' ? 0 : null;

  if (cell === null || cell === undefined) {
    return emptyValue;
  }

  if (typeof cell === 'number') {
    return Number.isFinite(cell) ? cell : null;
  }

  if (typeof cell === 'boolean' || cell instanceof Date) {
    return null;
  }

  const trimmed = cell.trim();
  if (trimmed === '') {
    return emptyValue;
  }

  const stripped = trimmed.replace(DISALLOWED_CHARS, '');
  const wrapped = PARENTHESIZED.exec(stripped);

  if (wrapped) {
    const magnitude = convert((wrapped[1] ?? '').replace(/,/g, ''));
    return magnitude === null ? null : -magnitude;
  }

  return convert(stripped.replace(/,/g, ''));
}
