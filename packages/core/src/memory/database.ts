// packages/core/src/memory/database.ts

import Database from 'better-sqlite3';
import { DatabaseError } from '../utils/errors.js';

const SCHEMA_VERSION = '1';

const MIGRATIONS = [
  `CREATE TABLE IF NOT EXISTS workflow_runs (
    id              TEXT PRIMARY KEY,
    workflow_name   TEXT NOT NULL,
    status          TEXT NOT NULL DEFAULT 'running' CHECK(status IN ('running','completed','failed')),
    inputs          TEXT NOT NULL,
    config_snapshot TEXT NOT NULL,
    final_state     TEXT,
    error           TEXT,
    metrics         TEXT,
    deploy_blocked  INTEGER NOT NULL DEFAULT 0,
    started_at      TEXT NOT NULL,
    completed_at    TEXT
  )`,
  'CREATE INDEX IF NOT EXISTS idx_runs_workflow ON workflow_runs(workflow_name)',
  'CREATE INDEX IF NOT EXISTS idx_runs_status ON workflow_runs(status)',
  'CREATE INDEX IF NOT EXISTS idx_runs_started ON workflow_runs(started_at DESC)',

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
    const db = new Database(dbPath);
    db.pragma('journal_mode = WAL');
    db.pragma('busy_timeout = 5000');
    runMigrations(db);
    return db;
  } catch (err) {
    throw new DatabaseError(
      `Failed to open database at "${dbPath}": ${err instanceof Error ? err.message : String(err)}`,
      'open',
    );
  }
}

/** Idempotent: every statement uses IF NOT EXISTS. */
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

export function getSchemaVersion(db: Database.Database): string | null {
  const row = db.prepare("SELECT value FROM schema_meta WHERE key = 'version'").get() as
    | { value: string }
    | undefined;
  return row?.value ?? null;
}
