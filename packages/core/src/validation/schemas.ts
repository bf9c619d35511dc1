/**
 * Zod schemas for validating column mappings and row ranges
 */

import { z } from 'zod';

/** 0-based column index */
export const columnIndexSchema = z.number().int().min(0);

/** Column roles for one side */
export const sideColumnsSchema = z.object({
  name: columnIndexSchema,
  budget: columnIndexSchema,
  actual: columnIndexSchema,
});

/** Column roles for both sides */
export const columnMappingSchema = z.object({
  left: sideColumnsSchema,
  right: sideColumnsSchema,
});

/** Inclusive row range, in grid row indices */
export const rowRangeSchema = z
  .object({
    start: z.number().int().min(0).optional(),
    end: z.number().int().min(0).optional(),
  })
  .refine(
    (range) =>
      range.start === undefined ||
      range.end === undefined ||
      range.start <= range.end,
    { message: 'start row cannot be greater than end row', path: ['start'] }
  );

/**
 * Render zod issues as one "- path: message" line each
 */
export function formatIssues(label: string, err: z.ZodError): string {
  const issues = err.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      return `- ${path}: ${issue.message}`;
    })
    .join('\n');
  return `${label}:\n${issues}`;
}
