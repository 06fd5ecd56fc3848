// packages/core/src/memory/database.ts

import Database from 'better-sqlite3';
import { DatabaseError } from '../utils/errors.js';

const SCHEMA_VERSION = '1';

const MIGRATIONS = [
  // Build jobs
  `CREATE TABLE IF NOT EXISTS jobs (
    id            TEXT PRIMARY KEY,
    repo_path     TEXT NOT NULL,
    output_path   TEXT NOT NULL,
    mode          TEXT NOT NULL CHECK(mode IN ('full','incremental')),
    status        TEXT NOT NULL DEFAULT 'pending',
    state         TEXT NOT NULL DEFAULT 'pending',
    error_text    TEXT,
    summary_json  TEXT,
    created_at    INTEGER NOT NULL,
    started_at    INTEGER,
    finished_at   INTEGER,
    updated_at    INTEGER NOT NULL
  )`,
  'CREATE INDEX IF NOT EXISTS idx_jobs_status ON jobs(status, created_at)',

  // Job logs (append-only log per job)
  `CREATE TABLE IF NOT EXISTS job_logs (
    id           INTEGER PRIMARY KEY AUTOINCREMENT,
    job_id       TEXT NOT NULL REFERENCES jobs(id) ON DELETE CASCADE,
    seq          INTEGER NOT NULL,
    level        TEXT NOT NULL DEFAULT 'info',
    message      TEXT NOT NULL,
    created_at   INTEGER NOT NULL
  )`,
  'CREATE INDEX IF NOT EXISTS idx_job_logs_job_seq ON job_logs(job_id, seq)',

  // File fingerprint index (replaced wholesale after each merge)
  `CREATE TABLE IF NOT EXISTS fingerprints (
    path         TEXT PRIMARY KEY,
    fingerprint  TEXT NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS fingerprint_meta (
    id           INTEGER PRIMARY KEY CHECK(id = 1),
    generation   INTEGER NOT NULL,
    updated_at   INTEGER NOT NULL
  )`,

  // Schema meta
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
  let db: Database.Database | undefined;
  try {
    db = new Database(dbPath);
    configurePragmas(db);
    runMigrations(db);
    return db;
  } catch (err) {
    db?.close();
    throw new DatabaseError(
      `Failed to open database at "${dbPath}": ${err instanceof Error ? err.message : String(err)}`,
      'open',
    );
  }
}

function configurePragmas(db: Database.Database): void {
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
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
  const row = db
    .prepare<[], { value: string }>("SELECT value FROM schema_meta WHERE key = 'version'")
    .get();
  return row?.value ?? null;
}
