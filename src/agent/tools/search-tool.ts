/**
 * Search Tool
 *
 * `search_course_content`: full-text search over course chunks with optional
 * course and lesson filters. Store errors and empty results come back as
 * text the model can reason about; only exceptions thrown by the store
 * itself escape.
 */

import { z } from 'zod';

import type { ToolDefinition } from '../../providers/types.js';
import { isEmptyResults, type SearchResults } from '../../search/types.js';
import { invalidInput, type CourseTool, type SearchBackend, type Source, type ToolOutput } from './types.js';

export const SEARCH_TOOL_NAME = 'search_course_content';

// Models sometimes send null for an omitted optional argument
export const SearchInputSchema = z.object({
  query: z.string().min(1, 'query cannot be empty'),
  course_name: z.string().nullish(),
  lesson_number: z.number().int().nullish(),
});

const SEARCH_TOOL_DEFINITION: ToolDefinition = {
  name: SEARCH_TOOL_NAME,
  description: 'Search course materials with smart course name matching and lesson filtering',
  input_schema: {
    type: 'object',
    properties: {
      query: {
        type: 'string',
        description: 'What to search for in the course content',
      },
      course_name: {
        type: 'string',
        description: "Course title (partial matches work, e.g. 'MCP', 'Introduction')",
      },
      lesson_number: {
        type: 'integer',
        description: 'Specific lesson number to search within (e.g. 1, 2, 3)',
      },
    },
    required: ['query'],
  },
};

/**
 * Message for a search that ran but matched nothing, naming the active filters.
 */
export function noResultsMessage(courseName?: string, lessonNumber?: number): string {
  let message = 'No relevant content found';
  if (courseName !== undefined) {
    message += ` in course '${courseName}'`;
  }
  if (lessonNumber !== undefined) {
    message += ` in lesson ${lessonNumber}`;
  }
  return `${message}.`;
}

export class SearchTool implements CourseTool {
  readonly definition = SEARCH_TOOL_DEFINITION;

  constructor(private readonly store: SearchBackend) {}

  async execute(input: Readonly<Record<string, unknown>>): Promise<ToolOutput> {
    const parsed = SearchInputSchema.safeParse(input);
    if (!parsed.success) {
      return invalidInput(SEARCH_TOOL_NAME, parsed.error);
    }

    const query = parsed.data.query;
    const courseName = parsed.data.course_name ?? undefined;
    const lessonNumber = parsed.data.lesson_number ?? undefined;

    const results = this.store.search({ query, courseName, lessonNumber });

    if (results.error !== null) {
      return { content: results.error, sources: [] };
    }
    if (isEmptyResults(results)) {
      return { content: noResultsMessage(courseName, lessonNumber), sources: [] };
    }

    return this.formatResults(results);
  }

  /**
   * One `[<course> - Lesson <n>]` block per match, and one source per match.
   */
  private formatResults(results: SearchResults): ToolOutput {
    const blocks: string[] = [];
    const sources: Source[] = [];

    results.documents.forEach((document, i) => {
      const meta = results.metadata[i];
      if (meta === undefined) return;

      const header =
        meta.lessonNumber !== null ? `${meta.courseTitle} - Lesson ${meta.lessonNumber}` : meta.courseTitle;
      blocks.push(`[${header}]\n${document}`);
      sources.push({
        text: header,
        link: meta.lessonNumber !== null ? this.store.getLessonLink(meta.courseTitle, meta.lessonNumber) : null,
      });
    });

    return { content: blocks.join('\n\n'), sources };
  }
}
