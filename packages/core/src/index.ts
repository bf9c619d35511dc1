/**
 * @tallycheck/core
 *
 * Shared grid, column and error types for the tallycheck packages
 */

// Types
export * from './types/index.js';

// Interfaces
export * from './interfaces/index.js';

// Errors
export * from './errors/index.js';

// Validation schemas
export * from './validation/index.js';

// Utilities
export * from './utils/index.js';
