/**
 * Ingestion Pipeline
 *
 * Read → Parse → Chunk → Store. Folder ingestion keeps going past a bad
 * file: failures are collected in the result and logged as warnings.
 */

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { basename, extname } from 'node:path';

import { FileNotFoundError } from '../errors/index.js';
import type { CourseStore } from '../search/course-store.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { parseCourseDocument } from './document-parser.js';
import { scanCourseFiles } from './scanner.js';
import type { ChunkingOptions, IngestResult, ParsedCourseDocument } from './types.js';

export interface IngestOptions {
  chunking: ChunkingOptions;
  logger?: Logger;
}

export interface IngestFolderOptions extends IngestOptions {
  /** Wipe the store before ingesting */
  clearExisting?: boolean;
  /** Extensions to pick up (default: txt) */
  extensions?: string[];
  /** Called before each file is processed */
  onFile?: (path: string, index: number, total: number) => void;
}

/**
 * Parse a course file without storing it.
 */
export async function readCourseDocument(path: string, chunking: ChunkingOptions): Promise<ParsedCourseDocument> {
  if (!existsSync(path)) {
    throw new FileNotFoundError(path);
  }
  const text = await readFile(path, 'utf-8');
  return parseCourseDocument(text, { ...chunking, fallbackTitle: basename(path, extname(path)) });
}

/**
 * Parse one course file and add it to the store.
 *
 * @throws {FileNotFoundError} when the file is missing
 * @throws {DatabaseError} when the course title is already indexed
 */
export async function ingestCourseDocument(
  store: CourseStore,
  path: string,
  options: IngestOptions
): Promise<ParsedCourseDocument> {
  const parsed = await readCourseDocument(path, options.chunking);
  store.addCourse(parsed.course);
  store.addChunks(parsed.chunks);
  (options.logger ?? silentLogger).debug?.(
    `Indexed '${parsed.course.title}' (${parsed.chunks.length} chunks) from ${path}`
  );
  return parsed;
}

/**
 * Add every course document under `folder`, skipping titles already in the store.
 *
 * @throws {FileNotFoundError} when the folder is missing
 */
export async function ingestCourseFolder(
  store: CourseStore,
  folder: string,
  options: IngestFolderOptions
): Promise<IngestResult> {
  const logger = options.logger ?? silentLogger;

  if (!existsSync(folder)) {
    throw new FileNotFoundError(folder);
  }

  if (options.clearExisting) {
    store.clearAll();
  }

  const result: IngestResult = { coursesAdded: 0, chunksAdded: 0, skipped: [], errors: [] };
  const known = new Set(store.getCourseTitles());
  const files = await scanCourseFiles(folder, { extensions: options.extensions });

  for (const [index, path] of files.entries()) {
    options.onFile?.(path, index, files.length);

    try {
      const { course, chunks } = await readCourseDocument(path, options.chunking);

      if (known.has(course.title)) {
        result.skipped.push(course.title);
        logger.debug?.(`Course already indexed: ${course.title}`);
        continue;
      }

      store.addCourse(course);
      result.chunksAdded += store.addChunks(chunks);
      result.coursesAdded++;
      known.add(course.title);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      result.errors.push({ path, message });
      logger.warn(`Skipping ${path}: ${message}`);
    }
  }

  return result;
}
