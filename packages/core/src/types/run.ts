// packages/core/src/types/run.ts

import type { StateDelta, StateSnapshot } from '../state/state-record.js';

export interface NodeMetrics {
  durationMs: number;
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
  costUsd: number;
  llmCalls: number;
  toolCalls: number;
  /** Structured-output correction attempts beyond the first. */
  retries: number;
}

export interface NodeResult {
  nodeId: string;
  /** Restricted to the node's declared outputs. */
  delta: StateDelta;
  metrics: NodeMetrics;
}

export interface RunError {
  /** Error category, e.g. `OutputValidationError` or `TimeoutError`. */
  type: string;
  message: string;
  nodeId?: string;
  details?: Record<string, unknown>;
}

export type RunStatus = 'running' | 'completed' | 'failed';

export type RunPhase =
  | 'loaded'
  | 'validated'
  | 'state-initialized'
  | 'running'
  | 'completed'
  | 'failed';

export interface NodeRunRecord {
  nodeId: string;
  status: 'completed' | 'failed';
  metrics: NodeMetrics;
}

export interface RunMetrics {
  durationMs: number;
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
  costUsd: number;
  llmCalls: number;
  toolCalls: number;
  /** Node executions, loop re-entries included. */
  nodeCount: number;
  nodes: NodeRunRecord[];
  /** Iterations run per loop node. */
  loopIterations: Record<string, number>;
  /** Loop nodes that exited because they hit max_iterations. */
  loopCapsHit: string[];
}

export interface GateResult {
  metric: string;
  value: number | null;
  max?: number;
  min?: number;
  passed: boolean;
  message: string;
}

export interface RunOutcome {
  runId: string;
  workflowName: string;
  status: 'completed' | 'failed';
  /** Last lifecycle phase reached before the outcome was produced. */
  phase: RunPhase;
  /** Terminal state, or the partial state at the point of failure. */
  state: StateSnapshot;
  metrics: RunMetrics;
  error?: RunError;
  /** Failures of nodes marked `break_on_error: false`. */
  nodeErrors: RunError[];
  gateResults: GateResult[];
  deployBlocked: boolean;
}
