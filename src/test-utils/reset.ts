/**
 * Test Utilities - Unified Reset
 *
 * Closes the shared database connection and forgets the cached environment,
 * so each test file starts from a clean process state.
 */

import { closeDb } from '../database/index.js';
import { _clearEnvCache } from '../config/env.js';

export function resetAll(): void {
  closeDb();
  _clearEnvCache();
}
