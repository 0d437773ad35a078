/**
 * Search Module
 *
 * Course catalog and full-text chunk search backed by SQLite FTS5.
 */

export { CourseStore, type CourseStoreOptions } from './course-store.js';

export { buildFtsQuery, resolveCourseTitle, tokenize } from './query.js';

export {
  emptySearchResults,
  isEmptyResults,
  type SearchResults,
  type ChunkMetadata,
  type CourseSearchOptions,
  type CourseSummary,
} from './types.js';
