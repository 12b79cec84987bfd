// packages/core/src/memory/database.ts

import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import { DatabaseError, errorMessage } from '../utils/errors.js';

const SCHEMA_VERSION = '1';

const MIGRATIONS = [
  // Indexing jobs
  `CREATE TABLE IF NOT EXISTS index_jobs (
    id             TEXT PRIMARY KEY,
    type           TEXT NOT NULL,
    status         TEXT NOT NULL DEFAULT 'running',
    params_json    TEXT NOT NULL,
    owner_id       TEXT,
    progress_json  TEXT,
    error_text     TEXT,
    started_at     INTEGER NOT NULL,
    completed_at   INTEGER,
    updated_at     INTEGER NOT NULL
  )`,
  'CREATE INDEX IF NOT EXISTS idx_index_jobs_status ON index_jobs(status)',
  'CREATE INDEX IF NOT EXISTS idx_index_jobs_owner ON index_jobs(owner_id)',
  'CREATE INDEX IF NOT EXISTS idx_index_jobs_started ON index_jobs(started_at DESC)',

  // Schema metadata
  `CREATE TABLE IF NOT EXISTS schema_meta (
    key   TEXT PRIMARY KEY,
    value TEXT NOT NULL
  )`,
];

/**
 * Open a SQLite database and run migrations.
 * Pass ':memory:' for in-memory databases (testing).
 */
export function openDatabase(dbPath: string): Database.Database {
  try {
    if (dbPath !== ':memory:') {
      mkdirSync(dirname(dbPath), { recursive: true });
    }
    const db = new Database(dbPath);
    configurePragmas(db);
    runMigrations(db);
    return db;
  } catch (err) {
    throw new DatabaseError(`Failed to open database at "${dbPath}": ${errorMessage(err)}`, 'open');
  }
}

function configurePragmas(db: Database.Database): void {
  db.pragma('journal_mode = WAL');
  db.pragma('busy_timeout = 5000');
}

/**
 * Run all schema migrations. Idempotent (uses IF NOT EXISTS).
 */
export function runMigrations(db: Database.Database): void {
  db.transaction(() => {
    for (const sql of MIGRATIONS) {
      db.exec(sql);
    }
    db.prepare("INSERT OR REPLACE INTO schema_meta(key, value) VALUES ('version', ?)").run(
      SCHEMA_VERSION,
    );
    db.prepare(
      "INSERT OR IGNORE INTO schema_meta(key, value) VALUES ('created_at', datetime('now'))",
    ).run();
  })();
}

/** Get the current schema version. */
export function getSchemaVersion(db: Database.Database): string | null {
  const row = db.prepare("SELECT value FROM schema_meta WHERE key = 'version'").get() as
    | { value: string }
    | undefined;
  return row?.value ?? null;
}
