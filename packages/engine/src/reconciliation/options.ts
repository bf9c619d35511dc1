/**
 * Option schemas and defaults for validation runs
 */

import { z } from 'zod';
import { columnMappingSchema, formatIssues, rowRangeSchema } from '@tallycheck/core';
import { NAME_SIMILARITY_ALGORITHMS } from '@tallycheck/similarity';
import { ReconciliationError } from '../errors/index.js';
import type {
  ReconcileOptions,
  ResolvedValidationOptions,
  ValidationOptions,
} from '../types/index.js';

export const DEFAULT_TOLERANCE = 0.01;
export const DEFAULT_FUZZY_THRESHOLD = 0.6;

const toleranceSchema = z.number().finite().min(0, 'tolerance cannot be negative');
const thresholdSchema = z
  .number()
  .min(0, 'fuzzyThreshold must be between 0 and 1')
  .max(1, 'fuzzyThreshold must be between 0 and 1');
const algorithmSchema = z.enum(NAME_SIMILARITY_ALGORITHMS);

export const headerPolicySchema = z.discriminatedUnion('mode', [
  z.object({ mode: z.literal('none') }),
  z.object({ mode: z.literal('auto') }),
  z.object({ mode: z.literal('row'), row: z.number().int().min(0) }),
]);

export const reconcileOptionsSchema = z.object({
  tolerance: toleranceSchema,
  fuzzyThreshold: thresholdSchema,
  similarityAlgorithm: algorithmSchema.default('sequence_ratio'),
});

export const validationOptionsSchema = z.object({
  columns: columnMappingSchema,
  tolerance: toleranceSchema.default(DEFAULT_TOLERANCE),
  fuzzyThreshold: thresholdSchema.default(DEFAULT_FUZZY_THRESHOLD),
  similarityAlgorithm: algorithmSchema.default('sequence_ratio'),
  header: headerPolicySchema.default({ mode: 'none' }),
  rowRange: rowRangeSchema.optional(),
  emptyCellPolicy: z.enum(['unparseable', 'zero']).default('unparseable'),
  flagIndeterminate: z.boolean().default(false),
});

function invalidOptions(label: string, err: z.ZodError): ReconciliationError {
  return new ReconciliationError({
    code: 'INVALID_OPTIONS',
    message: formatIssues(label, err),
    suggestion: 'Check the column indices, tolerance and threshold values.',
    context: { issues: err.issues },
  });
}

/**
 * Validate validation options and fill in defaults
 */
export function resolveValidationOptions(
  options: ValidationOptions
): ResolvedValidationOptions {
  const parsed = validationOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw invalidOptions('Invalid validation options', parsed.error);
  }
  return parsed.data;
}

export function resolveReconcileOptions(
  options: ReconcileOptions
): Required<ReconcileOptions> {
  const parsed = reconcileOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw invalidOptions('Invalid reconcile options', parsed.error);
  }
  return parsed.data;
}
