/**
 * String Similarity Types
 */

/** Result of a similarity comparison */
export interface SimilarityResult {
  /** Similarity score between 0 (no match) and 1 (exact match) */
  score: number;

  /** Which algorithm produced this result */
  algorithm: SimilarityAlgorithm;

  /** Optional details about the comparison */
  details?: string;
}

/** Available similarity algorithms */
export type SimilarityAlgorithm =
  | 'sequence_ratio'
  | 'levenshtein'
  | 'jaro'
  | 'jaro_winkler'
  | 'dice_sorensen';

/** Algorithms offered for name matching */
export const NAME_SIMILARITY_ALGORITHMS = [
  'sequence_ratio',
  'levenshtein',
  'jaro_winkler',
  'dice_sorensen',
] as const;

export type NameSimilarityAlgorithm = (typeof NAME_SIMILARITY_ALGORITHMS)[number];

/** Tuning knobs for the n-gram and prefix based algorithms */
export interface SimilarityOptions {
  /** For dice_sorensen: size of n-grams (default: 2) */
  ngramSize?: number;

  /** For jaro_winkler: common prefix scale (default: 0.1, max: 0.25) */
  prefixScale?: number;
}
