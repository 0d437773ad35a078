/**
 * Database Migration Runner
 *
 * Applies the embedded SQL migrations in order and records each one in
 * `_migrations`. Running twice is a no-op.
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';
import { getDb } from './connection.js';
import { validateRows } from './validation.js';

export interface MigrationResult {
  applied: string[];
  failed: Array<{ name: string; error: string }>;
}

interface Migration {
  name: string;
  sql: string;
}

const MIGRATIONS: Migration[] = [
  {
    name: '001-course-catalog.sql',
    sql: `
CREATE TABLE IF NOT EXISTS courses (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  title TEXT UNIQUE NOT NULL,
  link TEXT,
  instructor TEXT,
  created_at TEXT NOT NULL DEFAULT (datetime('now'))
);

CREATE TABLE IF NOT EXISTS lessons (
  course_id INTEGER NOT NULL,
  lesson_number INTEGER NOT NULL,
  title TEXT NOT NULL,
  link TEXT,
  PRIMARY KEY (course_id, lesson_number),
  FOREIGN KEY (course_id) REFERENCES courses(id) ON DELETE CASCADE
);
    `.trim(),
  },
  {
    name: '002-course-chunks.sql',
    sql: `
CREATE TABLE IF NOT EXISTS chunks (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  course_id INTEGER NOT NULL,
  lesson_number INTEGER,
  chunk_index INTEGER NOT NULL,
  content TEXT NOT NULL,
  FOREIGN KEY (course_id) REFERENCES courses(id) ON DELETE CASCADE
);

CREATE INDEX IF NOT EXISTS idx_chunks_course ON chunks(course_id, lesson_number);

-- External-content FTS index over chunks.content, kept in sync by triggers
CREATE VIRTUAL TABLE IF NOT EXISTS chunks_fts USING fts5(
  content,
  content='chunks',
  content_rowid='id',
  tokenize='unicode61'
);

CREATE TRIGGER IF NOT EXISTS chunks_ai AFTER INSERT ON chunks BEGIN
  INSERT INTO chunks_fts(rowid, content) VALUES (new.id, new.content);
END;

CREATE TRIGGER IF NOT EXISTS chunks_ad AFTER DELETE ON chunks BEGIN
  INSERT INTO chunks_fts(chunks_fts, rowid, content) VALUES ('delete', old.id, old.content);
END;
    `.trim(),
  },
];

const MigrationRowSchema = z.object({ name: z.string() });

/** Connections already migrated in this process */
const migrated = new WeakSet<Database.Database>();

/**
 * Run all pending migrations against `db` (the shared connection by default).
 *
 * Each migration runs in its own transaction. A failed migration is reported
 * in the result and the remaining ones are still attempted.
 */
export function runMigrations(db: Database.Database = getDb()): MigrationResult {
  if (migrated.has(db)) {
    return { applied: [], failed: [] };
  }

  const applied: string[] = [];
  const failed: Array<{ name: string; error: string }> = [];

  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT UNIQUE NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);

  const done = new Set(
    validateRows(MigrationRowSchema, db.prepare('SELECT name FROM _migrations').all(), '_migrations').map(
      (row) => row.name
    )
  );

  for (const migration of MIGRATIONS) {
    if (done.has(migration.name)) continue;

    try {
      db.transaction(() => {
        db.exec(migration.sql);
        db.prepare('INSERT INTO _migrations (name) VALUES (?)').run(migration.name);
      })();
      applied.push(migration.name);
    } catch (error) {
      failed.push({
        name: migration.name,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  // Retry on the next call if anything failed
  if (failed.length === 0) {
    migrated.add(db);
  }

  return { applied, failed };
}

export function getMigrationCount(): number {
  return MIGRATIONS.length;
}
