/**
 * Course file discovery with fast-glob
 */

import { resolve } from 'node:path';
import fg from 'fast-glob';

export const DEFAULT_COURSE_EXTENSIONS = ['txt'];

export interface ScanOptions {
  /** File extensions without the dot (default: txt) */
  extensions?: string[];
}

function buildPattern(extensions: string[]): string {
  return extensions.length === 1 ? `**/*.${extensions[0]}` : `**/*.{${extensions.join(',')}}`;
}

/**
 * List course documents under `rootPath`, sorted so ingestion order is stable.
 */
export async function scanCourseFiles(rootPath: string, options: ScanOptions = {}): Promise<string[]> {
  const extensions = options.extensions ?? DEFAULT_COURSE_EXTENSIONS;
  if (extensions.length === 0) {
    return [];
  }

  const entries = await fg(buildPattern(extensions), {
    cwd: resolve(rootPath),
    absolute: true,
    onlyFiles: true,
    dot: false,
    caseSensitiveMatch: false,
    suppressErrors: true,
  });

  return entries.sort();
}
