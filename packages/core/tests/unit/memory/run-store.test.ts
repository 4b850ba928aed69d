import type Database from 'better-sqlite3';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { openDatabase } from '../../../src/memory/database.js';
import { InMemoryRunRepository, SqliteRunRepository } from '../../../src/memory/run-store.js';
import type { NewRun } from '../../../src/types/collaborators.js';
import type { RunOutcome } from '../../../src/types/run.js';
import { emptyNodeMetrics } from '../../../src/engine/run-metrics.js';
import { draftWorkflow, parseConfig } from '../../helpers/workflows.js';

function newRun(workflowName = 'draft-flow', startedAt = '2026-03-01T10:00:00.000Z'): NewRun {
  return { workflowName, inputs: { topic: 'tides' }, config: parseConfig(draftWorkflow()), startedAt };
}

function outcome(runId: string, overrides: Partial<RunOutcome> = {}): RunOutcome {
  return {
    runId,
    workflowName: 'draft-flow',
    status: 'completed',
    phase: 'completed',
    state: { topic: 'tides', output: 'An essay' },
    metrics: {
      durationMs: 42,
      inputTokens: 10,
      outputTokens: 5,
      totalTokens: 15,
      costUsd: 0.001,
      llmCalls: 1,
      toolCalls: 0,
      nodeCount: 1,
      nodes: [{ nodeId: 'draft', status: 'completed', metrics: emptyNodeMetrics(42) }],
      loopIterations: {},
      loopCapsHit: [],
    },
    nodeErrors: [],
    gateResults: [],
    deployBlocked: false,
    ...overrides,
  };
}

describe('SqliteRunRepository', () => {
  let db: Database.Database;
  let repo: SqliteRunRepository;

  beforeEach(() => {
    db = openDatabase(':memory:');
    repo = new SqliteRunRepository(db);
  });

  afterEach(() => {
    db.close();
  });

  it('creates a running record with a run_ id', () => {
    const id = repo.create(newRun());
    expect(id).toMatch(/^run_/);

    const run = repo.get(id);
    expect(run).toMatchObject({
      id,
      workflowName: 'draft-flow',
      status: 'running',
      inputs: { topic: 'tides' },
      finalState: null,
      error: null,
      metrics: null,
      deployBlocked: false,
      startedAt: '2026-03-01T10:00:00.000Z',
      completedAt: null,
    });
  });

  it('stores the validated config as a snapshot', () => {
    const id = repo.create(newRun());
    const snapshot: unknown = JSON.parse(repo.get(id)?.configSnapshot ?? 'null');
    expect(snapshot).toMatchObject({ flow: { name: 'draft-flow' }, schema_version: '1.0' });
  });

  it('records the outcome on update', () => {
    const id = repo.create(newRun());
    repo.update(
      id,
      outcome(id, {
        status: 'failed',
        error: { type: 'TimeoutError', message: 'too slow', details: { timeoutMs: 5 } },
        deployBlocked: true,
      }),
    );

    const run = repo.get(id);
    expect(run?.status).toBe('failed');
    expect(run?.finalState).toEqual({ topic: 'tides', output: 'An essay' });
    expect(run?.error).toEqual({ type: 'TimeoutError', message: 'too slow', details: { timeoutMs: 5 } });
    expect(run?.metrics?.durationMs).toBe(42);
    expect(run?.deployBlocked).toBe(true);
    expect(run?.completedAt).not.toBeNull();
  });

  it('returns null for unknown ids', () => {
    expect(repo.get('run_missing')).toBeNull();
  });

  it('lists newest first with filters', () => {
    const a = repo.create(newRun('alpha', '2026-03-01T10:00:00.000Z'));
    const b = repo.create(newRun('beta', '2026-03-02T10:00:00.000Z'));
    const c = repo.create(newRun('alpha', '2026-03-03T10:00:00.000Z'));
    repo.update(a, outcome(a));

    expect(repo.list().map((r) => r.id)).toEqual([c, b, a]);
    expect(repo.list({ workflowName: 'alpha' }).map((r) => r.id)).toEqual([c, a]);
    expect(repo.list({ status: 'completed' }).map((r) => r.id)).toEqual([a]);
    expect(repo.list({ limit: 2 }).map((r) => r.id)).toEqual([c, b]);
  });
});

describe('InMemoryRunRepository', () => {
  it('round-trips a run through create and update', () => {
    const repo = new InMemoryRunRepository();
    const id = repo.create(newRun());
    expect(repo.get(id)?.status).toBe('running');

    repo.update(id, outcome(id));
    expect(repo.get(id)).toMatchObject({ status: 'completed', finalState: { output: 'An essay' }, error: null });
  });

  it('copies inputs so later caller mutations do not leak in', () => {
    const repo = new InMemoryRunRepository();
    const run = newRun();
    const id = repo.create(run);
    run.inputs.topic = 'changed';
    expect(repo.get(id)?.inputs).toEqual({ topic: 'tides' });
  });

  it('ignores updates for unknown ids', () => {
    const repo = new InMemoryRunRepository();
    repo.update('run_missing', outcome('run_missing'));
    expect(repo.list()).toEqual([]);
  });

  it('lists newest first with filters', () => {
    const repo = new InMemoryRunRepository();
    const a = repo.create(newRun('alpha'));
    const b = repo.create(newRun('beta'));
    repo.update(b, outcome(b, { status: 'failed' }));

    expect(repo.list().map((r) => r.id)).toEqual([b, a]);
    expect(repo.list({ status: 'failed' }).map((r) => r.id)).toEqual([b]);
    expect(repo.list({ workflowName: 'alpha', limit: 1 }).map((r) => r.id)).toEqual([a]);
  });
});
