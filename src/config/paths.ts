/**
 * Centralized Path Definitions
 *
 * ~/.crag/            (or $CRAG_HOME)
 * ├── courses.db      SQLite course store
 * └── config.toml     user configuration
 *
 * Resolved on every call so CRAG_HOME can change between tests.
 */

import { join, resolve } from 'node:path';
import { homedir } from 'node:os';
import { getEnv } from './env.js';

export const DB_FILENAME = 'courses.db';
export const CONFIG_FILENAME = 'config.toml';

export function getCragDir(): string {
  const override = getEnv('CRAG_HOME');
  return override ? resolve(override) : join(homedir(), '.crag');
}

export function getDbPath(): string {
  return join(getCragDir(), DB_FILENAME);
}

export function getConfigPath(): string {
  return join(getCragDir(), CONFIG_FILENAME);
}
