/**
 * Database Module
 *
 * SQLite storage for the course catalog and its searchable chunks.
 *
 * ```ts
 * import { getDb, runMigrations } from './database/index.js';
 *
 * runMigrations();
 * const store = new CourseStore(getDb());
 * ```
 */

export { getDb, closeDb, openDatabase } from './connection.js';

export { runMigrations, getMigrationCount, type MigrationResult } from './migrate.js';

export {
  CourseRowSchema,
  LessonRowSchema,
  ChunkMatchRowSchema,
  type CourseRow,
  type LessonRow,
  type ChunkMatchRow,
  SchemaValidationError,
  validateRow,
  validateRows,
} from './validation.js';
