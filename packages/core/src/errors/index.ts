export { SourceError } from './source-error.js';
export type { SourceErrorCode, SourceErrorDetails } from './source-error.js';
