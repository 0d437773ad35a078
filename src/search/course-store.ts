/**
 * Course Store
 *
 * SQLite-backed course catalog plus an FTS5 index over course chunks.
 * Chunks are ranked with bm25(); lower bm25 is better, so scores are negated
 * to keep "higher is better" for callers.
 *
 * @example
 * ```typescript
 * const store = new CourseStore(getDb(), { maxResults: 5 });
 * store.addCourse(course);
 * store.addChunks(chunks);
 * const results = store.search({ query: 'vector databases', courseName: 'RAG' });
 * ```
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';

import { runMigrations } from '../database/migrate.js';
import {
  ChunkMatchRowSchema,
  CourseRowSchema,
  LessonRowSchema,
  validateRow,
  validateRows,
} from '../database/validation.js';
import { DatabaseError } from '../errors/index.js';
import type { Course, CourseChunk } from '../indexer/types.js';
import { consoleLogger, type Logger } from '../utils/logger.js';
import { buildFtsQuery, resolveCourseTitle } from './query.js';
import {
  emptySearchResults,
  type CourseSearchOptions,
  type CourseSummary,
  type SearchResults,
} from './types.js';

export interface CourseStoreOptions {
  /** Chunks returned per search when the caller gives no limit (default 5) */
  maxResults?: number;
  logger?: Logger;
}

const TitleRowSchema = z.object({ title: z.string() });
const CountRowSchema = z.object({ count: z.number().int() });
const IdRowSchema = z.object({ id: z.number().int() });
const LinkRowSchema = z.object({ link: z.string().nullable() });
const SummaryRowSchema = z.object({
  title: z.string(),
  instructor: z.string().nullable(),
  link: z.string().nullable(),
  lesson_count: z.number().int(),
  chunk_count: z.number().int(),
});

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class CourseStore {
  private readonly maxResults: number;
  private readonly logger: Logger;

  constructor(
    private readonly db: Database.Database,
    options: CourseStoreOptions = {}
  ) {
    this.maxResults = options.maxResults ?? 5;
    this.logger = options.logger ?? consoleLogger;

    const migrations = runMigrations(db);
    if (migrations.failed.length > 0) {
      const names = migrations.failed.map((f) => `${f.name}: ${f.error}`).join('; ');
      throw new DatabaseError(`Failed to prepare the course store (${names})`);
    }
  }

  /**
   * Insert a course and its lessons.
   *
   * @throws {DatabaseError} when the title already exists or the write fails
   */
  addCourse(course: Course): void {
    const insertCourse = this.db.prepare(
      'INSERT INTO courses (title, link, instructor) VALUES (@title, @link, @instructor)'
    );
    const insertLesson = this.db.prepare(
      'INSERT INTO lessons (course_id, lesson_number, title, link) VALUES (@courseId, @lessonNumber, @title, @link)'
    );

    try {
      this.db.transaction(() => {
        const { lastInsertRowid } = insertCourse.run({
          title: course.title,
          link: course.link,
          instructor: course.instructor,
        });
        for (const lesson of course.lessons) {
          insertLesson.run({
            courseId: lastInsertRowid,
            lessonNumber: lesson.lessonNumber,
            title: lesson.title,
            link: lesson.link,
          });
        }
      })();
    } catch (error) {
      throw new DatabaseError(
        `Failed to add course '${course.title}': ${errorMessage(error)}`,
        error instanceof Error ? error : undefined
      );
    }

    this.logger.debug?.(`Added course '${course.title}' with ${course.lessons.length} lessons`);
  }

  /**
   * Insert chunks of courses already in the catalog.
   *
   * @returns number of chunks written
   * @throws {DatabaseError} when a chunk names an unknown course
   */
  addChunks(chunks: readonly CourseChunk[]): number {
    if (chunks.length === 0) return 0;

    const insert = this.db.prepare(
      'INSERT INTO chunks (course_id, lesson_number, chunk_index, content) VALUES (@courseId, @lessonNumber, @chunkIndex, @content)'
    );
    const courseIds = new Map<string, number>();

    try {
      this.db.transaction(() => {
        for (const chunk of chunks) {
          let courseId = courseIds.get(chunk.courseTitle);
          if (courseId === undefined) {
            courseId = this.getCourseId(chunk.courseTitle);
            courseIds.set(chunk.courseTitle, courseId);
          }
          insert.run({
            courseId,
            lessonNumber: chunk.lessonNumber,
            chunkIndex: chunk.chunkIndex,
            content: chunk.content,
          });
        }
      })();
    } catch (error) {
      if (error instanceof DatabaseError) throw error;
      throw new DatabaseError(`Failed to add chunks: ${errorMessage(error)}`, error instanceof Error ? error : undefined);
    }

    return chunks.length;
  }

  private getCourseId(title: string): number {
    const row = this.db.prepare('SELECT id FROM courses WHERE title = ?').get(title);
    if (row === undefined) {
      throw new DatabaseError(`Cannot add chunks for unknown course '${title}'`);
    }
    return validateRow(IdRowSchema, row, `courses.title=${title}`).id;
  }

  /**
   * Full-text search over chunks, optionally filtered by course and lesson.
   * Never throws: an unresolvable course name or a failing query comes back
   * as `error` on empty results.
   */
  search(options: CourseSearchOptions): SearchResults {
    let courseTitle: string | undefined;
    if (options.courseName !== undefined) {
      courseTitle = this.resolveCourseName(options.courseName);
      if (courseTitle === undefined) {
        return emptySearchResults(`No course found matching '${options.courseName}'`);
      }
    }

    const match = buildFtsQuery(options.query);
    if (match === undefined) {
      return emptySearchResults();
    }

    const conditions = ['chunks_fts MATCH @match'];
    const params: Record<string, string | number> = {
      match,
      limit: options.limit ?? this.maxResults,
    };
    if (courseTitle !== undefined) {
      conditions.push('co.title = @courseTitle');
      params.courseTitle = courseTitle;
    }
    if (options.lessonNumber !== undefined) {
      conditions.push('c.lesson_number = @lessonNumber');
      params.lessonNumber = options.lessonNumber;
    }

    try {
      const rows = this.db
        .prepare(
          `SELECT c.content AS content, co.title AS course_title, c.lesson_number AS lesson_number,
                  c.chunk_index AS chunk_index, bm25(chunks_fts) AS bm25_rank
             FROM chunks_fts
             JOIN chunks c ON c.id = chunks_fts.rowid
             JOIN courses co ON co.id = c.course_id
            WHERE ${conditions.join(' AND ')}
            ORDER BY bm25_rank, c.id
            LIMIT @limit`
        )
        .all(params);

      const matches = validateRows(ChunkMatchRowSchema, rows, 'chunks_fts');
      return {
        documents: matches.map((m) => m.content),
        metadata: matches.map((m) => ({
          courseTitle: m.course_title,
          lessonNumber: m.lesson_number,
          chunkIndex: m.chunk_index,
        })),
        scores: matches.map((m) => -m.bm25_rank),
        error: null,
      };
    } catch (error) {
      this.logger.warn(`Search failed: ${errorMessage(error)}`);
      return emptySearchResults(`Search error: ${errorMessage(error)}`);
    }
  }

  /**
   * Map a user-supplied course name to a catalog title.
   */
  resolveCourseName(name: string): string | undefined {
    return resolveCourseTitle(name, this.getCourseTitles());
  }

  /**
   * Course metadata and lessons (in lesson order) for a possibly partial name.
   */
  getCourseOutline(name: string): Course | undefined {
    const title = this.resolveCourseName(name);
    if (title === undefined) return undefined;

    const row = this.db.prepare('SELECT id, title, link, instructor FROM courses WHERE title = ?').get(title);
    if (row === undefined) return undefined;
    const course = validateRow(CourseRowSchema, row, `courses.title=${title}`);

    const lessons = validateRows(
      LessonRowSchema,
      this.db
        .prepare('SELECT course_id, lesson_number, title, link FROM lessons WHERE course_id = ? ORDER BY lesson_number')
        .all(course.id),
      `lessons.course_id=${course.id}`
    );

    return {
      title: course.title,
      link: course.link,
      instructor: course.instructor,
      lessons: lessons.map((l) => ({ lessonNumber: l.lesson_number, title: l.title, link: l.link })),
    };
  }

  /**
   * Link of one lesson, null when the lesson or its link is unknown.
   */
  getLessonLink(courseTitle: string, lessonNumber: number): string | null {
    const row = this.db
      .prepare(
        `SELECT l.link AS link FROM lessons l JOIN courses co ON co.id = l.course_id
          WHERE co.title = ? AND l.lesson_number = ?`
      )
      .get(courseTitle, lessonNumber);
    return row === undefined ? null : validateRow(LinkRowSchema, row, 'lessons.link').link;
  }

  /** Titles in the order the courses were added */
  getCourseTitles(): string[] {
    return validateRows(TitleRowSchema, this.db.prepare('SELECT title FROM courses ORDER BY id').all(), 'courses').map(
      (row) => row.title
    );
  }

  getCourseCount(): number {
    return validateRow(CountRowSchema, this.db.prepare('SELECT COUNT(*) AS count FROM courses').get(), 'courses').count;
  }

  listCourses(): CourseSummary[] {
    const rows = this.db
      .prepare(
        `SELECT co.title AS title, co.instructor AS instructor, co.link AS link,
                (SELECT COUNT(*) FROM lessons l WHERE l.course_id = co.id) AS lesson_count,
                (SELECT COUNT(*) FROM chunks c WHERE c.course_id = co.id) AS chunk_count
           FROM courses co
          ORDER BY co.id`
      )
      .all();

    return validateRows(SummaryRowSchema, rows, 'courses').map((row) => ({
      title: row.title,
      instructor: row.instructor,
      link: row.link,
      lessonCount: row.lesson_count,
      chunkCount: row.chunk_count,
    }));
  }

  /**
   * Remove every course, lesson and chunk.
   */
  clearAll(): void {
    this.db.transaction(() => {
      // Fires chunks_ad, which removes each row from chunks_fts
      this.db.exec('DELETE FROM chunks');
      this.db.exec('DELETE FROM lessons');
      this.db.exec('DELETE FROM courses');
    })();
    this.logger.debug?.('Cleared course store');
  }
}
