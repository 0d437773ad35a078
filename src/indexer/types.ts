/**
 * Course Document Types
 *
 * The parsed form of a course document: catalog metadata (course and
 * lessons) and the text chunks that get indexed for search.
 */

export interface Lesson {
  lessonNumber: number;
  title: string;
  link: string | null;
}

export interface Course {
  /** Unique title, used as the course's identifier everywhere */
  title: string;
  link: string | null;
  instructor: string | null;
  lessons: Lesson[];
}

export interface CourseChunk {
  content: string;
  courseTitle: string;
  /** null for documents without lesson markers */
  lessonNumber: number | null;
  /** Position of the chunk within its course, starting at 0 */
  chunkIndex: number;
}

export interface ParsedCourseDocument {
  course: Course;
  chunks: CourseChunk[];
}

export interface ChunkingOptions {
  /** Target chunk length in characters */
  chunkSize: number;
  /** Characters of trailing sentences repeated at the start of the next chunk */
  chunkOverlap: number;
}

/**
 * Outcome of ingesting one folder
 */
export interface IngestResult {
  coursesAdded: number;
  chunksAdded: number;
  /** Titles skipped because they were already indexed */
  skipped: string[];
  /** Files that could not be read or parsed */
  errors: Array<{ path: string; message: string }>;
}
