// packages/core/src/types/collaborators.ts — Interfaces the orchestrator calls out to

import type { ToolExecutionError } from '../utils/errors.js';
import type { WorkflowConfig } from './config.js';
import type { ToolSpec } from './llm.js';
import type { NodeMetrics, RunOutcome, RunStatus } from './run.js';

export interface NewRun {
  workflowName: string;
  inputs: Record<string, unknown>;
  config: WorkflowConfig;
  startedAt: string;
}

export interface StoredRun {
  id: string;
  workflowName: string;
  status: RunStatus;
  inputs: Record<string, unknown>;
  configSnapshot: string;
  finalState: Record<string, unknown> | null;
  error: RunOutcome['error'] | null;
  metrics: RunOutcome['metrics'] | null;
  deployBlocked: boolean;
  startedAt: string;
  completedAt: string | null;
}

/** Run history store. Every call is best-effort from the engine's point of view. */
export interface RunRepository {
  create(run: NewRun): string | Promise<string>;
  update(id: string, outcome: RunOutcome): void | Promise<void>;
}

export interface ObservabilityTracker {
  recordNodeStart(runId: string, nodeId: string): void | Promise<void>;
  recordNodeEnd(runId: string, nodeId: string, metrics: NodeMetrics): void | Promise<void>;
  recordRunEnd(runId: string, outcome: RunOutcome): void | Promise<void>;
}

export type ToolOutcome = { ok: true; output: unknown } | { ok: false; error: ToolExecutionError };

export interface ToolInvoker {
  has(name: string): boolean;
  spec(name: string): ToolSpec | undefined;
  invoke(name: string, args: Record<string, unknown>, signal?: AbortSignal): Promise<ToolOutcome>;
}
