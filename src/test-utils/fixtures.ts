/**
 * Shared course fixtures and an in-memory course store.
 */

import { openDatabase } from '../database/index.js';
import type { Course, CourseChunk } from '../indexer/types.js';
import { CourseStore } from '../search/course-store.js';
import { silentLogger } from '../utils/logger.js';

export const SAMPLE_COURSE: Course = {
  title: 'Introduction to Retrieval',
  link: 'https://example.com/retrieval',
  instructor: 'Ada Park',
  lessons: [
    { lessonNumber: 1, title: 'What is Retrieval?', link: 'https://example.com/retrieval/1' },
    { lessonNumber: 2, title: 'Chunking Documents', link: 'https://example.com/retrieval/2' },
    { lessonNumber: 3, title: 'Ranking Results', link: null },
  ],
};

export const SAMPLE_CHUNKS: CourseChunk[] = [
  {
    content: 'Retrieval finds passages of text that answer a question.',
    courseTitle: SAMPLE_COURSE.title,
    lessonNumber: 1,
    chunkIndex: 0,
  },
  {
    content: 'Chunking splits long documents into overlapping passages.',
    courseTitle: SAMPLE_COURSE.title,
    lessonNumber: 2,
    chunkIndex: 1,
  },
  {
    content: 'Ranking orders candidate passages by relevance to the question.',
    courseTitle: SAMPLE_COURSE.title,
    lessonNumber: 3,
    chunkIndex: 2,
  },
];

export const SECOND_COURSE: Course = {
  title: 'Prompt Design Fundamentals',
  link: null,
  instructor: null,
  lessons: [],
};

export const SECOND_CHUNKS: CourseChunk[] = [
  {
    content: 'A system prompt sets the tone and rules for every answer.',
    courseTitle: SECOND_COURSE.title,
    lessonNumber: null,
    chunkIndex: 0,
  },
];

/**
 * Store backed by a fresh in-memory database, optionally pre-filled with
 * the two sample courses.
 */
export function createTestStore(options: { seed?: boolean; maxResults?: number } = {}): CourseStore {
  const store = new CourseStore(openDatabase(':memory:'), {
    maxResults: options.maxResults ?? 5,
    logger: silentLogger,
  });

  if (options.seed ?? true) {
    store.addCourse(SAMPLE_COURSE);
    store.addChunks(SAMPLE_CHUNKS);
    store.addCourse(SECOND_COURSE);
    store.addChunks(SECOND_CHUNKS);
  }

  return store;
}

export const SAMPLE_DOCUMENT = `Course Title: Retrieval Basics
Course Link: https://example.com/basics
Course Instructor: Ada Park

Lesson 0: Introduction
Lesson Link: https://example.com/basics/0
Retrieval finds relevant text. It feeds the model.

Lesson 1: Chunking
Chunks should be small.
`;
