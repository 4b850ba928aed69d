// packages/core/src/memory/run-store.ts — RunRepository implementations

import type Database from 'better-sqlite3';
import type { NewRun, RunRepository, StoredRun } from '../types/collaborators.js';
import type { RunOutcome, RunStatus } from '../types/run.js';
import { generateRunId } from '../utils/id.js';

export interface RunListFilter {
  status?: RunStatus;
  workflowName?: string;
  limit?: number;
}

export class SqliteRunRepository implements RunRepository {
  constructor(private db: Database.Database) {}

  create(run: NewRun): string {
    const id = generateRunId();
    this.db
      .prepare(
        `INSERT INTO workflow_runs (id, workflow_name, status, inputs, config_snapshot, started_at)
       VALUES (?, ?, 'running', ?, ?, ?)`,
      )
      .run(id, run.workflowName, JSON.stringify(run.inputs), JSON.stringify(run.config), run.startedAt);
    return id;
  }

  update(id: string, outcome: RunOutcome): void {
    this.db
      .prepare(
        `UPDATE workflow_runs
       SET status = ?, final_state = ?, error = ?, metrics = ?, deploy_blocked = ?, completed_at = ?
       WHERE id = ?`,
      )
      .run(
        outcome.status,
        JSON.stringify(outcome.state),
        outcome.error ? JSON.stringify(outcome.error) : null,
        JSON.stringify(outcome.metrics),
        outcome.deployBlocked ? 1 : 0,
        new Date().toISOString(),
        id,
      );
  }

  get(id: string): StoredRun | null {
    const row = this.db.prepare('SELECT * FROM workflow_runs WHERE id = ?').get(id) as
      | Record<string, unknown>
      | undefined;
    return row ? this.rowToRun(row) : null;
  }

  list(filter?: RunListFilter): StoredRun[] {
    let sql = 'SELECT * FROM workflow_runs WHERE 1=1';
    const params: unknown[] = [];

    if (filter?.status) {
      sql += ' AND status = ?';
      params.push(filter.status);
    }
    if (filter?.workflowName) {
      sql += ' AND workflow_name = ?';
      params.push(filter.workflowName);
    }
    sql += ' ORDER BY started_at DESC, rowid DESC';
    if (filter?.limit) {
      sql += ' LIMIT ?';
      params.push(filter.limit);
    }

    const rows = this.db.prepare(sql).all(...params) as Record<string, unknown>[];
    return rows.map((r) => this.rowToRun(r));
  }

  private rowToRun(row: Record<string, unknown>): StoredRun {
    return {
      id: row.id as string,
      workflowName: row.workflow_name as string,
      status: row.status as RunStatus,
      inputs: JSON.parse(row.inputs as string) as Record<string, unknown>,
      configSnapshot: row.config_snapshot as string,
      finalState: row.final_state
        ? (JSON.parse(row.final_state as string) as Record<string, unknown>)
        : null,
      error: row.error ? (JSON.parse(row.error as string) as StoredRun['error']) : null,
      metrics: row.metrics ? (JSON.parse(row.metrics as string) as StoredRun['metrics']) : null,
      deployBlocked: row.deploy_blocked === 1,
      startedAt: row.started_at as string,
      completedAt: (row.completed_at as string) ?? null,
    };
  }
}

/** Keeps runs in process memory; for embedding and tests. */
export class InMemoryRunRepository implements RunRepository {
  private readonly runs = new Map<string, StoredRun>();

  create(run: NewRun): string {
    const id = generateRunId();
    this.runs.set(id, {
      id,
      workflowName: run.workflowName,
      status: 'running',
      inputs: structuredClone(run.inputs),
      configSnapshot: JSON.stringify(run.config),
      finalState: null,
      error: null,
      metrics: null,
      deployBlocked: false,
      startedAt: run.startedAt,
      completedAt: null,
    });
    return id;
  }

  update(id: string, outcome: RunOutcome): void {
    const run = this.runs.get(id);
    if (!run) return;
    this.runs.set(id, {
      ...run,
      status: outcome.status,
      finalState: { ...outcome.state },
      error: outcome.error ?? null,
      metrics: outcome.metrics,
      deployBlocked: outcome.deployBlocked,
      completedAt: new Date().toISOString(),
    });
  }

  get(id: string): StoredRun | null {
    return this.runs.get(id) ?? null;
  }

  list(filter?: RunListFilter): StoredRun[] {
    const matching = [...this.runs.values()]
      .filter((r) => !filter?.status || r.status === filter.status)
      .filter((r) => !filter?.workflowName || r.workflowName === filter.workflowName)
      .reverse();
    return filter?.limit ? matching.slice(0, filter.limit) : matching;
  }
}
