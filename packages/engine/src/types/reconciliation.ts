/**
 * Reconciliation Types
 *
 * Types for matching left line items to right line items and comparing
 * their figures.
 */

import type { ColumnMapping } from '@tallycheck/core';
import type { NameSimilarityAlgorithm } from '@tallycheck/similarity';
import type { EmptyCellPolicy, LedgerRecord } from './records.js';

/** How a left item found its right counterpart */
export type MatchKind = 'exact' | 'fuzzy' | 'none';

/** Outcome of looking up a left item in the right index */
export type RecordMatch =
  | { readonly kind: 'exact'; readonly record: LedgerRecord }
  | { readonly kind: 'fuzzy'; readonly record: LedgerRecord; readonly score: number }
  | { readonly kind: 'none' };

/** Whether one figure agrees across both sides */
export type Agreement =
  | 'agree'          // |left - right| <= tolerance
  | 'disagree'       // |left - right| > tolerance
  | 'indeterminate'; // unmatched, or a side is unparseable

/** Figure columns compared between the sides */
export type FigureField = 'budget' | 'actual';

/**
 * Comparison of one left line item against its match
 */
export interface ComparisonResult {
  /** The left line item */
  readonly left: LedgerRecord;
  /** The matched right line item, if any */
  readonly match: RecordMatch;
  readonly budgetAgreement: Agreement;
  readonly actualAgreement: Agreement;
  /** Human-readable notes for every condition short of agreement */
  readonly notes: readonly string[];
}

/**
 * Header handling:
 * - none: every row is data
 * - auto: exclude row 0 when it looks like a header
 * - row: exclude every row up to and including `row`
 */
export type HeaderPolicy =
  | { mode: 'none' }
  | { mode: 'auto' }
  | { mode: 'row'; row: number };

/** Inclusive range of grid rows, applied to the left side only */
export interface RowRange {
  start?: number;
  end?: number;
}

/**
 * Options for matching a prepared set of left items against a right index
 */
export interface ReconcileOptions {
  /** Largest absolute difference still counted as agreement (>= 0) */
  tolerance: number;
  /** Lowest similarity accepted as a fuzzy match (0-1, inclusive) */
  fuzzyThreshold: number;
  /** Similarity algorithm (default: "sequence_ratio") */
  similarityAlgorithm?: NameSimilarityAlgorithm;
}

/**
 * Options for a full validation run over a grid
 */
export interface ValidationOptions {
  /** Column roles for both sides */
  columns: ColumnMapping;
  /** Default: 0.01 */
  tolerance?: number;
  /** Default: 0.6 */
  fuzzyThreshold?: number;
  /** Default: "sequence_ratio" */
  similarityAlgorithm?: NameSimilarityAlgorithm;
  /** Default: { mode: 'none' } */
  header?: HeaderPolicy;
  rowRange?: RowRange;
  /** Default: "unparseable" */
  emptyCellPolicy?: EmptyCellPolicy;
  /** Count indeterminate figures as needing attention (default: false) */
  flagIndeterminate?: boolean;
}

/** Controls the "needs attention" classification */
export interface AttentionOptions {
  flagIndeterminate?: boolean;
}
