/**
 * Database Row Validation
 *
 * Zod schemas checked on every read, so a database written by a different
 * version of the code fails loudly instead of leaking malformed rows.
 *
 * ```ts
 * const row = db.prepare('SELECT * FROM courses WHERE title = ?').get(title);
 * return row ? validateRow(CourseRowSchema, row, `courses.title=${title}`) : undefined;
 * ```
 */

import { z, type ZodIssue } from 'zod';
import { CLIError } from '../errors/types.js';

export const CourseRowSchema = z.object({
  id: z.number().int(),
  title: z.string(),
  link: z.string().nullable(),
  instructor: z.string().nullable(),
});

export const LessonRowSchema = z.object({
  course_id: z.number().int(),
  lesson_number: z.number().int(),
  title: z.string(),
  link: z.string().nullable(),
});

/**
 * A row of the full-text search query (chunk joined with its course).
 */
export const ChunkMatchRowSchema = z.object({
  content: z.string(),
  course_title: z.string(),
  lesson_number: z.number().int().nullable(),
  chunk_index: z.number().int(),
  bm25_rank: z.number(),
});

export type CourseRow = z.infer<typeof CourseRowSchema>;
export type LessonRow = z.infer<typeof LessonRowSchema>;
export type ChunkMatchRow = z.infer<typeof ChunkMatchRowSchema>;

/**
 * Thrown when a database row does not match its schema (exit code 5).
 */
export class SchemaValidationError extends CLIError {
  public readonly issues: Array<{ path: string; message: string }>;

  constructor(message: string, zodIssues: ZodIssue[]) {
    const issues = zodIssues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));

    const summary = issues
      .slice(0, 3)
      .map((i) => `  - ${i.path}: ${i.message}`)
      .join('\n');

    const hint =
      `Schema validation failed:\n${summary}` +
      (issues.length > 3 ? `\n  ... and ${issues.length - 3} more` : '') +
      `\n\nRebuild the index with: crag index --clear`;

    super(message, hint, 5);
    this.name = 'SchemaValidationError';
    this.issues = issues;
  }
}

/**
 * @throws {SchemaValidationError}
 */
export function validateRow<T extends z.ZodTypeAny>(schema: T, row: unknown, context: string): z.output<T> {
  const result = schema.safeParse(row);
  if (result.success) {
    return result.data;
  }
  throw new SchemaValidationError(`Database schema mismatch in ${context}`, result.error.issues);
}

/**
 * Validate every row, failing on the first bad one.
 *
 * @throws {SchemaValidationError} naming the index of the offending row
 */
export function validateRows<T extends z.ZodTypeAny>(schema: T, rows: unknown[], context: string): z.output<T>[] {
  return rows.map((row, i) => {
    const result = schema.safeParse(row);
    if (!result.success) {
      throw new SchemaValidationError(`Database schema mismatch in ${context}[${i}]`, result.error.issues);
    }
    return result.data;
  });
}
