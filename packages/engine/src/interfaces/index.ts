/**
 * Interface exports for the engine
 */

export type { IReconciliationEngine } from './reconciliation-engine.js';
