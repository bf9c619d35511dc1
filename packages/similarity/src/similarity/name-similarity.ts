/**
 * Name similarity for line-item matching
 */

import type {
  NameSimilarityAlgorithm,
  SimilarityOptions,
} from '../types/similarity.js';
import { calculateSimilarity } from './string-similarity.js';

/**
 * Case-insensitive similarity of two names in [0, 1].
 *
 * Arguments are lowercased and put in code-unit order before scoring, so
 * the result is symmetric for every algorithm. Callers trim beforehand.
 */
export function nameSimilarity(
  a: string,
  b: string,
  algorithm: NameSimilarityAlgorithm = 'sequence_ratio',
  options?: SimilarityOptions
): number {
  const left = a.toLowerCase();
  const right = b.toLowerCase();
  const [first, second] = left <= right ? [left, right] : [right, left];

  return calculateSimilarity(first, second, algorithm, options).score;
}
