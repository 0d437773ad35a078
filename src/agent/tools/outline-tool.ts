/**
 * Outline Tool
 *
 * `get_course_outline`: title, link, instructor and lesson list of one
 * course. An unknown course is reported as text, never thrown.
 */

import { z } from 'zod';

import type { Course } from '../../indexer/types.js';
import type { ToolDefinition } from '../../providers/types.js';
import { invalidInput, type CourseTool, type OutlineBackend, type ToolOutput } from './types.js';

export const OUTLINE_TOOL_NAME = 'get_course_outline';

export const OutlineInputSchema = z.object({
  course_name: z.string().min(1, 'course_name cannot be empty'),
});

const OUTLINE_TOOL_DEFINITION: ToolDefinition = {
  name: OUTLINE_TOOL_NAME,
  description:
    'Get the outline of a course: its title, link, instructor and the numbered list of lessons. ' +
    'Use for questions about what a course covers or how it is structured.',
  input_schema: {
    type: 'object',
    properties: {
      course_name: {
        type: 'string',
        description: 'Course title or part of it',
      },
    },
    required: ['course_name'],
  },
};

export function formatOutline(course: Course): string {
  const lines = [
    `Course Title: ${course.title}`,
    `Course Link: ${course.link ?? 'N/A'}`,
    `Instructor: ${course.instructor ?? 'N/A'}`,
    '',
  ];

  if (course.lessons.length === 0) {
    lines.push('No lessons available');
  } else {
    lines.push(`Lessons (${course.lessons.length} total):`);
    for (const lesson of course.lessons) {
      lines.push(`  Lesson ${lesson.lessonNumber}: ${lesson.title}`);
    }
  }

  return lines.join('\n');
}

export class OutlineTool implements CourseTool {
  readonly definition = OUTLINE_TOOL_DEFINITION;

  constructor(private readonly store: OutlineBackend) {}

  async execute(input: Readonly<Record<string, unknown>>): Promise<ToolOutput> {
    const parsed = OutlineInputSchema.safeParse(input);
    if (!parsed.success) {
      return invalidInput(OUTLINE_TOOL_NAME, parsed.error);
    }

    const course = this.store.getCourseOutline(parsed.data.course_name);
    if (course === undefined) {
      return { content: `No course found matching '${parsed.data.course_name}'` };
    }
    return { content: formatOutline(course) };
  }
}
