/**
 * Test Utilities Module
 *
 * ```typescript
 * import { createTestStore, scriptedClient, resetAll } from '../test-utils/index.js';
 *
 * afterEach(() => resetAll());
 * ```
 */

export { resetAll } from './reset.js';
export {
  SAMPLE_COURSE,
  SAMPLE_CHUNKS,
  SECOND_COURSE,
  SECOND_CHUNKS,
  SAMPLE_DOCUMENT,
  createTestStore,
} from './fixtures.js';
export { scriptedClient, textResponse, toolUseResponse } from './generation.js';
export { createMockContext, type MockContext } from './cli.js';
