export { ReconciliationEngine } from './reconciliation-engine.js';
export {
  RecordIndex,
  collectRecords,
  readRecord,
  normalizeKey,
} from './record-index.js';
export type { RecordReadOptions } from './record-index.js';
export { NameMatcher } from './name-matcher.js';
export type { NameMatcherOptions } from './name-matcher.js';
export { compareFigures } from './figure-comparator.js';
export type { FigureComparison } from './figure-comparator.js';
export { needsAttention } from './attention.js';
export {
  DEFAULT_TOLERANCE,
  DEFAULT_FUZZY_THRESHOLD,
  headerPolicySchema,
  reconcileOptionsSchema,
  validationOptionsSchema,
  resolveValidationOptions,
  resolveReconcileOptions,
} from './options.js';
