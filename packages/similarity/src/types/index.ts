export type {
  SimilarityResult,
  SimilarityAlgorithm,
  NameSimilarityAlgorithm,
  SimilarityOptions,
} from './similarity.js';
export { NAME_SIMILARITY_ALGORITHMS } from './similarity.js';
