/**
 * Library Entry Point
 *
 * The CLI (`crag`) covers everyday use:
 * ```bash
 * crag index ./docs                         # Index course scripts
 * crag ask "What does lesson 2 cover?"      # One question
 * crag chat                                 # Multi-turn session
 * ```
 *
 * The same pieces are available for embedding the assistant elsewhere.
 *
 * @example
 * ```typescript
 * import {
 *   AnthropicGenerationClient,
 *   CourseAssistant,
 *   CourseStore,
 *   ingestCourseFolder,
 *   openDatabase,
 * } from 'course-rag';
 *
 * const store = new CourseStore(openDatabase('./courses.db'));
 * await ingestCourseFolder(store, './docs', { chunking: { chunkSize: 800, chunkOverlap: 100 } });
 *
 * const assistant = new CourseAssistant({ store, client: new AnthropicGenerationClient() });
 * const { answer, sources } = await assistant.query('Who teaches the retrieval course?');
 * ```
 *
 * @packageDocumentation
 */

export * from './agent/index.js';
export * from './search/index.js';
export * from './indexer/index.js';
export * from './providers/index.js';
export * from './errors/index.js';
export * from './utils/index.js';

export {
  ConfigSchema,
  DEFAULT_CONFIG,
  loadConfig,
  getConfigValue,
  setConfigValue,
  getCragDir,
  getDbPath,
  getConfigPath,
  hasApiKey,
  type Config,
  type PartialConfig,
} from './config/index.js';

export { getDb, closeDb, openDatabase, runMigrations, type MigrationResult } from './database/index.js';

export type { GlobalOptions, CommandContext } from './cli/types.js';
