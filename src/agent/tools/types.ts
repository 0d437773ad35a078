/**
 * Tool Types
 *
 * The closed capability every course tool implements, and the value a tool
 * execution returns: text for the model plus optional citation records for
 * whoever displays the answer.
 */

import type { z } from 'zod';
import type { ToolDefinition } from '../../providers/types.js';
import type { CourseStore } from '../../search/course-store.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Where a search match came from, shown beside the answer.
 */
export interface Source {
  /** "<course title> - Lesson <n>", or just the course title */
  text: string;
  link: string | null;
}

export interface ToolOutput {
  /** Text handed back to the model as the tool result */
  content: string;
  /** Present only on tools that cite; an empty array is a search with no matches */
  sources?: Source[];
}

export interface CourseTool {
  readonly definition: ToolDefinition;
  execute(input: Readonly<Record<string, unknown>>): Promise<ToolOutput>;
}

/** The store calls the search tool needs */
export type SearchBackend = Pick<CourseStore, 'search' | 'getLessonLink'>;

/** The store call the outline tool needs */
export type OutlineBackend = Pick<CourseStore, 'getCourseOutline'>;

// ============================================================================
// Input validation
// ============================================================================

/**
 * Model-supplied input that fails the tool's schema is reported back to the
 * model as text so it can retry with corrected arguments.
 */
export function invalidInput(toolName: string, error: z.ZodError): ToolOutput {
  const issues = error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
  return { content: `Invalid input for ${toolName}: ${issues.join('; ')}` };
}
