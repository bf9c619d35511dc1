/**
 * String Similarity Functions
 *
 * Core algorithms for measuring how close two line-item names are.
 * Uses fastest-levenshtein for edit distance.
 */

import { distance as levenshteinDistance } from 'fastest-levenshtein';
import type {
  SimilarityResult,
  SimilarityAlgorithm,
  SimilarityOptions,
} from '../types/similarity.js';

interface CommonBlock {
  aStart: number;
  bStart: number;
  size: number;
}

/**
 * Longest common substring of a[aLo, aHi) and b[bLo, bHi).
 * Ties go to the block that ends first in `a`, then first in `b`.
 */
function longestCommonBlock(
  a: string,
  aLo: number,
  aHi: number,
  b: string,
  bLo: number,
  bHi: number
): CommonBlock {
  let best: CommonBlock = { aStart: aLo, bStart: bLo, size: 0 };
  let previous = new Array<number>(bHi - bLo + 1).fill(0);

  for (let i = aLo; i < aHi; i++) {
    const current = new Array<number>(bHi - bLo + 1).fill(0);
    for (let j = bLo; j < bHi; j++) {
      if (a[i] !== b[j]) continue;
      const size = (previous[j - bLo] ?? 0) + 1;
      current[j - bLo + 1] = size;
      if (size > best.size) {
        best = { aStart: i - size + 1, bStart: j - size + 1, size };
      }
    }
    previous = current;
  }

  return best;
}

/**
 * Characters covered by the recursive longest-common-block decomposition
 */
function countMatchingCharacters(a: string, b: string): number {
  let matched = 0;
  const pending: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];

  let range = pending.pop();
  while (range) {
    const [aLo, aHi, bLo, bHi] = range;
    const block = longestCommonBlock(a, aLo, aHi, b, bLo, bHi);

    if (block.size > 0) {
      matched += block.size;

      if (aLo < block.aStart && bLo < block.bStart) {
        pending.push([aLo, block.aStart, bLo, block.bStart]);
      }

      const aEnd = block.aStart + block.size;
      const bEnd = block.bStart + block.size;
      if (aEnd < aHi && bEnd < bHi) {
        pending.push([aEnd, aHi, bEnd, bHi]);
      }
    }

    range = pending.pop();
  }

  return matched;
}

/**
 * Calculate the Ratcliff/Obershelp sequence ratio
 *
 * 2 * M / T, where M counts characters in matching blocks and T is the
 * combined length. Tracks how much of both names survives as common runs.
 */
export function sequenceRatio(a: string, b: string): SimilarityResult {
  const total = a.length + b.length;

  if (a === b) {
    return { score: 1, algorithm: 'sequence_ratio' };
  }

  const matched = countMatchingCharacters(a, b);
  const score = (2 * matched) / total;

  return {
    score,
    algorithm: 'sequence_ratio',
    details: `Matched: ${matched}, Total length: ${total}`,
  };
}

/**
 * Calculate normalized Levenshtein similarity
 *
 * @returns Similarity score 0-1 (1 = identical)
 */
export function levenshtein(a: string, b: string): SimilarityResult {
  if (a === b) {
    return { score: 1, algorithm: 'levenshtein' };
  }

  if (a.length === 0 || b.length === 0) {
    return { score: 0, algorithm: 'levenshtein' };
  }

  const dist = levenshteinDistance(a, b);
  const maxLen = Math.max(a.length, b.length);
  const score = 1 - dist / maxLen;

  return {
    score,
    algorithm: 'levenshtein',
    details: `Distance: ${dist}, Max length: ${maxLen}`,
  };
}

/**
 * Calculate Jaro similarity
 *
 * Based on: number of matching characters and transpositions.
 */
export function jaro(a: string, b: string): SimilarityResult {
  if (a === b) {
    return { score: 1, algorithm: 'jaro' };
  }

  if (a.length === 0 || b.length === 0) {
    return { score: 0, algorithm: 'jaro' };
  }

  const matchWindow = Math.max(0, Math.floor(Math.max(a.length, b.length) / 2) - 1);
  const aMatches = new Array<boolean>(a.length).fill(false);
  const bMatches = new Array<boolean>(b.length).fill(false);

  let matches = 0;
  let transpositions = 0;

  // Find matches
  for (let i = 0; i < a.length; i++) {
    const start = Math.max(0, i - matchWindow);
    const end = Math.min(i + matchWindow + 1, b.length);

    for (let j = start; j < end; j++) {
      if (bMatches[j] || a[i] !== b[j]) continue;
      aMatches[i] = true;
      bMatches[j] = true;
      matches++;
      break;
    }
  }

  if (matches === 0) {
    return { score: 0, algorithm: 'jaro' };
  }

  // Count transpositions
  let k = 0;
  for (let i = 0; i < a.length; i++) {
    if (!aMatches[i]) continue;
    while (!bMatches[k]) k++;
    if (a[i] !== b[k]) transpositions++;
    k++;
  }

  const score =
    (matches / a.length +
      matches / b.length +
      (matches - transpositions / 2) / matches) /
    3;

  return {
    score,
    algorithm: 'jaro',
    details: `Matches: ${matches}, Transpositions: ${transpositions / 2}`,
  };
}

/**
 * Calculate Jaro-Winkler similarity
 *
 * Extension of Jaro that gives more weight to common prefixes.
 *
 * @param prefixScale Scaling factor for common prefix (default: 0.1, capped at 0.25)
 */
export function jaroWinkler(
  a: string,
  b: string,
  prefixScale = 0.1
): SimilarityResult {
  const jaroResult = jaro(a, b);

  if (jaroResult.score === 1) {
    return { score: 1, algorithm: 'jaro_winkler' };
  }

  // Common prefix length (max 4 characters)
  let prefixLength = 0;
  const maxPrefix = Math.min(4, Math.min(a.length, b.length));

  for (let i = 0; i < maxPrefix; i++) {
    if (a[i] === b[i]) {
      prefixLength++;
    } else {
      break;
    }
  }

  const scale = Math.min(Math.max(prefixScale, 0), 0.25);
  const score = jaroResult.score + prefixLength * scale * (1 - jaroResult.score);

  return {
    score,
    algorithm: 'jaro_winkler',
    details: `Jaro: ${jaroResult.score.toFixed(3)}, Common prefix: ${prefixLength}`,
  };
}

/**
 * Calculate Dice-Sørensen coefficient using bigrams
 *
 * Good for multi-word names where words are reordered.
 */
export function diceSorensen(a: string, b: string, ngramSize = 2): SimilarityResult {
  if (a === b) {
    return { score: 1, algorithm: 'dice_sorensen' };
  }

  const aNgrams = getNgrams(a, ngramSize);
  const bNgrams = getNgrams(b, ngramSize);

  if (aNgrams.size === 0 || bNgrams.size === 0) {
    return { score: 0, algorithm: 'dice_sorensen' };
  }

  let intersection = 0;
  for (const ngram of aNgrams) {
    if (bNgrams.has(ngram)) {
      intersection++;
    }
  }

  const score = (2 * intersection) / (aNgrams.size + bNgrams.size);

  return {
    score,
    algorithm: 'dice_sorensen',
    details: `Intersection: ${intersection}, A ngrams: ${aNgrams.size}, B ngrams: ${bNgrams.size}`,
  };
}

/**
 * Extract n-grams from a string
 */
function getNgrams(str: string, n: number): Set<string> {
  const ngrams = new Set<string>();

  if (str.length === 0) {
    return ngrams;
  }

  if (str.length < n) {
    ngrams.add(str);
    return ngrams;
  }

  for (let i = 0; i <= str.length - n; i++) {
    ngrams.add(str.substring(i, i + n));
  }

  return ngrams;
}

/**
 * Calculate similarity using specified algorithm
 */
export function calculateSimilarity(
  a: string,
  b: string,
  algorithm: SimilarityAlgorithm,
  options?: SimilarityOptions
): SimilarityResult {
  switch (algorithm) {
    case 'sequence_ratio':
      return sequenceRatio(a, b);
    case 'levenshtein':
      return levenshtein(a, b);
    case 'jaro':
      return jaro(a, b);
    case 'jaro_winkler':
      return jaroWinkler(a, b, options?.prefixScale);
    case 'dice_sorensen':
      return diceSorensen(a, b, options?.ngramSize);
    default: {
      const unknown: never = algorithm;
      throw new Error(`Unknown algorithm: ${String(unknown)}`);
    }
  }
}
