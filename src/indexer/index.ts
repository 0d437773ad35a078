/**
 * Indexer Module
 *
 * Turns course documents into catalog entries and searchable chunks.
 */

export { chunkText, splitSentences, normalizeWhitespace } from './chunker.js';
export { parseCourseDocument, lessonChunkPrefix, type ParseOptions } from './document-parser.js';
export { scanCourseFiles, DEFAULT_COURSE_EXTENSIONS, type ScanOptions } from './scanner.js';
export {
  readCourseDocument,
  ingestCourseDocument,
  ingestCourseFolder,
  type IngestOptions,
  type IngestFolderOptions,
} from './pipeline.js';
export type {
  Course,
  Lesson,
  CourseChunk,
  ParsedCourseDocument,
  ChunkingOptions,
  IngestResult,
} from './types.js';
