/**
 * Zod validation schemas for CLI inputs
 *
 * Commander hands every option over as a string; these schemas coerce and
 * range-check them before a command runs.
 */

import { z } from 'zod';
import { ValidationError } from '../errors/index.js';

// ============================================================================
// ASK COMMAND SCHEMA
// ============================================================================

export const QuestionSchema = z
  .string()
  .trim()
  .min(1, 'Question cannot be empty')
  .max(2000, 'Question too long (max 2000 chars)');

// ============================================================================
// SEARCH COMMAND SCHEMA
// ============================================================================

const integerString = (label: string, min: number, max: number) =>
  z
    .string()
    .regex(/^\d+$/, `${label} must be a whole number`)
    .transform((val) => parseInt(val, 10))
    .refine((val) => val >= min && val <= max, { message: `${label} must be between ${min} and ${max}` });

export const SearchOptionsSchema = z.object({
  course: z.string().trim().min(1, 'Course name cannot be empty').optional(),
  lesson: integerString('lesson', 0, 10000).optional(),
  limit: integerString('limit', 1, 50).optional(),
});

export type SearchOptions = z.output<typeof SearchOptionsSchema>;

export const SearchArgsSchema = z.object({
  query: z
    .string()
    .trim()
    .min(1, 'Search query cannot be empty')
    .max(500, 'Search query too long (max 500 chars)'),
});

// ============================================================================
// VALIDATION HELPER
// ============================================================================

/**
 * Parse CLI input with a zod schema.
 *
 * @throws {ValidationError} listing every issue
 */
export function parseInput<T extends z.ZodTypeAny>(schema: T, input: unknown, what: string): z.output<T> {
  const result = schema.safeParse(input);
  if (result.success) {
    return result.data;
  }

  const issues = result.error.issues.map((issue) => {
    const path = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    return `${path}${issue.message}`;
  });
  throw new ValidationError(`Invalid ${what}`, issues);
}
