/**
 * Name Matcher
 *
 * Finds the right line item for a left name: exact key first, then the
 * most similar name at or above the fuzzy threshold.
 */

import { nameSimilarity } from '@tallycheck/similarity';
import type { NameSimilarityAlgorithm } from '@tallycheck/similarity';
import type { LedgerRecord, RecordMatch } from '../types/index.js';
import type { RecordIndex } from './record-index.js';

export interface NameMatcherOptions {
  fuzzyThreshold: number;
  algorithm: NameSimilarityAlgorithm;
}

export class NameMatcher {
  constructor(private readonly options: NameMatcherOptions) {}

  match(key: string, index: RecordIndex): RecordMatch {
    const exact = index.get(key);
    if (exact) {
      return { kind: 'exact', record: exact };
    }

    // Strict > keeps the first candidate on ties
    let best: { record: LedgerRecord; score: number } | null = null;
    for (const [candidateKey, record] of index) {
      const score = nameSimilarity(key, candidateKey, this.options.algorithm);
      if (best === null || score > best.score) {
        best = { record, score };
      }
    }

    if (best && this.meetsThreshold(best.score)) {
      return { kind: 'fuzzy', record: best.record, score: best.score };
    }

    return { kind: 'none' };
  }

  meetsThreshold(score: number): boolean {
    return score >= this.options.fuzzyThreshold;
  }
}
