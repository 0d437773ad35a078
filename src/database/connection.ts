/**
 * Database Connection Module
 *
 * A process-wide better-sqlite3 connection to ~/.crag/courses.db, plus
 * `openDatabase` for callers (tests, alternative stores) that want their own.
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { getDbPath } from '../config/paths.js';

let db: Database.Database | null = null;

/**
 * Open a connection with the pragmas every course store expects.
 * Pass ':memory:' for a throwaway database.
 */
export function openDatabase(path: string): Database.Database {
  if (path !== ':memory:') {
    mkdirSync(dirname(path), { recursive: true });
  }

  const connection = new Database(path);
  // OFF by default in SQLite
  connection.pragma('foreign_keys = ON');
  if (path !== ':memory:') {
    connection.pragma('journal_mode = WAL');
  }
  return connection;
}

/**
 * Get the shared connection, opening it on first use.
 */
export function getDb(): Database.Database {
  if (db) {
    return db;
  }

  db = openDatabase(getDbPath());
  process.on('exit', () => closeDb());
  return db;
}

/**
 * Close the shared connection. Safe to call repeatedly.
 */
export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
  }
}
