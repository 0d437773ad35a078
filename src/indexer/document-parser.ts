/**
 * Course document parser
 *
 * Expected layout:
 *
 * ```
 * Course Title: Building Retrieval Systems
 * Course Link: https://example.com/retrieval
 * Course Instructor: Ada Park
 *
 * Lesson 0: Introduction
 * Lesson Link: https://example.com/retrieval/0
 * Lesson text...
 *
 * Lesson 1: Chunking
 * ...
 * ```
 *
 * The "Course Title:" label is optional on the first line. Documents with no
 * lesson markers are indexed as lesson-less chunks. A lesson number that
 * appears twice keeps its first title and the first link given for it; the
 * later text is appended to that lesson.
 */

import { chunkText } from './chunker.js';
import type { ChunkingOptions, Course, CourseChunk, Lesson, ParsedCourseDocument } from './types.js';
import { ValidationError } from '../errors/index.js';

const COURSE_TITLE = /^Course Title:\s*(.+)$/i;
const COURSE_LINK = /^Course Link:\s*(.+)$/i;
const COURSE_INSTRUCTOR = /^Course Instructor:\s*(.+)$/i;
const LESSON_MARKER = /^Lesson\s+(\d+):\s*(.+)$/i;
const LESSON_LINK = /^Lesson Link:\s*(.+)$/i;

/** Metadata may appear on lines 2-4 */
const METADATA_LINES = 3;

export interface ParseOptions extends ChunkingOptions {
  /** Used when the first line is blank, usually the file name */
  fallbackTitle?: string;
}

interface LessonSection {
  lesson: Lesson;
  body: string[];
}

export function lessonChunkPrefix(courseTitle: string, lessonNumber: number): string {
  return `Course ${courseTitle} Lesson ${lessonNumber} content: `;
}

function parseHeader(lines: string[], fallbackTitle: string | undefined): { course: Course; bodyStart: number } {
  const first = (lines[0] ?? '').trim();
  const title = COURSE_TITLE.exec(first)?.[1]?.trim() ?? (first || fallbackTitle);
  if (!title) {
    throw new ValidationError('Course document has no title', ['the first line must name the course']);
  }

  const course: Course = { title, link: null, instructor: null, lessons: [] };

  let bodyStart = 1;
  for (let i = 1; i <= METADATA_LINES && i < lines.length; i++) {
    const line = (lines[i] ?? '').trim();
    const link = COURSE_LINK.exec(line);
    const instructor = COURSE_INSTRUCTOR.exec(line);

    if (link?.[1]) {
      course.link = link[1].trim();
    } else if (instructor?.[1]) {
      course.instructor = instructor[1].trim();
    } else if (line !== '') {
      break;
    }
    bodyStart = i + 1;
  }

  return { course, bodyStart };
}

function splitLessons(lines: string[]): { preamble: string[]; sections: LessonSection[] } {
  const preamble: string[] = [];
  const sections: LessonSection[] = [];
  let current: LessonSection | undefined;

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i] ?? '';
    const marker = LESSON_MARKER.exec(line.trim());

    if (marker?.[1] && marker[2]) {
      const lessonNumber = Number(marker[1]);
      const repeated = sections.find((section) => section.lesson.lessonNumber === lessonNumber);
      current = repeated ?? { lesson: { lessonNumber, title: marker[2].trim(), link: null }, body: [] };
      if (!repeated) {
        sections.push(current);
      }

      const link = LESSON_LINK.exec((lines[i + 1] ?? '').trim());
      if (link?.[1]) {
        if (current.lesson.link === null) {
          current.lesson.link = link[1].trim();
        }
        i++;
      }
      continue;
    }

    (current ? current.body : preamble).push(line);
  }

  return { preamble, sections };
}

/**
 * Parse a course document into catalog metadata and indexable chunks.
 *
 * @throws {ValidationError} when neither the first line nor `fallbackTitle` gives a title
 */
export function parseCourseDocument(text: string, options: ParseOptions): ParsedCourseDocument {
  const lines = text.trim().split(/\r?\n/);
  const { course, bodyStart } = parseHeader(lines, options.fallbackTitle);
  const { preamble, sections } = splitLessons(lines.slice(bodyStart));

  const chunks: CourseChunk[] = [];
  const push = (content: string, lessonNumber: number | null): void => {
    chunks.push({ content, courseTitle: course.title, lessonNumber, chunkIndex: chunks.length });
  };

  if (sections.length === 0) {
    for (const piece of chunkText(preamble.join('\n'), options)) {
      push(piece, null);
    }
    return { course, chunks };
  }

  for (const { lesson, body } of sections) {
    course.lessons.push(lesson);

    chunkText(body.join('\n'), options).forEach((piece, i) => {
      push(i === 0 ? lessonChunkPrefix(course.title, lesson.lessonNumber) + piece : piece, lesson.lessonNumber);
    });
  }

  return { course, chunks };
}
