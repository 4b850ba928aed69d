import { describe, expect, it } from 'vitest';
import { getSchemaVersion, openDatabase, runMigrations } from '../../../src/memory/database.js';

describe('openDatabase', () => {
  it('creates the run table in a :memory: database', () => {
    const db = openDatabase(':memory:');
    const tables = db
      .prepare("SELECT name FROM sqlite_master WHERE type='table' ORDER BY name")
      .all() as { name: string }[];

    expect(tables.map((t) => t.name)).toEqual(['schema_meta', 'workflow_runs']);
    db.close();
  });

  it('creates lookup indexes', () => {
    const db = openDatabase(':memory:');
    const indexes = db
      .prepare("SELECT name FROM sqlite_master WHERE type='index' AND name LIKE 'idx_%' ORDER BY name")
      .all() as { name: string }[];

    expect(indexes.map((i) => i.name)).toEqual(['idx_runs_started', 'idx_runs_status', 'idx_runs_workflow']);
    db.close();
  });

  it('sets schema version', () => {
    const db = openDatabase(':memory:');
    expect(getSchemaVersion(db)).toBe('1');
    db.close();
  });

  it('is idempotent (can run migrations twice)', () => {
    const db = openDatabase(':memory:');
    runMigrations(db);
    expect(getSchemaVersion(db)).toBe('1');
    db.close();
  });

  it('rejects unknown run statuses', () => {
    const db = openDatabase(':memory:');
    const insert = () =>
      db
        .prepare(
          `INSERT INTO workflow_runs (id, workflow_name, status, inputs, config_snapshot, started_at)
           VALUES ('r1', 'wf', 'paused', '{}', '{}', '2026-01-01T00:00:00.000Z')`,
        )
        .run();
    expect(insert).toThrow(/CHECK constraint failed/);
    db.close();
  });

  it('wraps open failures in a DatabaseError', () => {
    expect(() => openDatabase('/nonexistent-dir/cogflow/runs.db')).toThrow(
      /^Failed to open database at "\/nonexistent-dir\/cogflow\/runs\.db"/,
    );
  });
});
