export {
  sequenceRatio,
  levenshtein,
  jaro,
  jaroWinkler,
  diceSorensen,
  calculateSimilarity,
} from './string-similarity.js';
export { nameSimilarity } from './name-similarity.js';
