/**
 * Formatter Utilities
 *
 * Shared utility functions for report formatting.
 */

import type { ParsedNumber } from '../types/index.js';

const AMOUNT_DECIMALS = 10;

/**
 * Format an amount for display, dropping binary floating-point noise
 * (0.1 + 0.2 prints as 0.3) while keeping every integer digit
 */
export function formatAmount(value: number): string {
  return String(Number(value.toFixed(AMOUNT_DECIMALS)));
}

/**
 * Format a parsed figure, or "unparseable"
 */
export function formatFigure(value: ParsedNumber): string {
  return value === null ? 'unparseable' : formatAmount(value);
}

/**
 * Format a similarity score with two decimals
 */
export function formatScore(score: number): string {
  return score.toFixed(2);
}
