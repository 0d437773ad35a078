/**
 * Search Module Types
 */

export interface ChunkMetadata {
  courseTitle: string;
  lessonNumber: number | null;
  chunkIndex: number;
}

/**
 * Parallel arrays of matching chunks, best match first. `error` is set
 * instead of throwing when the search could not run (unknown course filter,
 * store failure); resolution misses are data, not exceptions.
 */
export interface SearchResults {
  documents: string[];
  metadata: ChunkMetadata[];
  /** Higher is better */
  scores: number[];
  error: string | null;
}

export interface CourseSearchOptions {
  query: string;
  /** Course title or a fragment of one; resolved before filtering */
  courseName?: string;
  lessonNumber?: number;
  /** Overrides the store's maxResults */
  limit?: number;
}

/**
 * One row of `crag courses`
 */
export interface CourseSummary {
  title: string;
  instructor: string | null;
  link: string | null;
  lessonCount: number;
  chunkCount: number;
}

export function emptySearchResults(error: string | null = null): SearchResults {
  return { documents: [], metadata: [], scores: [], error };
}

export function isEmptyResults(results: SearchResults): boolean {
  return results.documents.length === 0;
}
