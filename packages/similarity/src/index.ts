/**
 * @tallycheck/similarity
 *
 * Similarity scoring for line-item names.
 */

export * from './similarity/index.js';
export * from './types/index.js';
