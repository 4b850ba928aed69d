// packages/core/src/types/events.ts

/**
 * Engine events, emitted by the orchestrator and rendered by the CLI.
 * Type names are dot-separated.
 */

import type { GateResult, NodeMetrics, RunError } from './run.js';

// -- Run lifecycle --
export interface RunStartedEvent {
  type: 'run.started';
  runId: string;
  workflow: string;
  timestamp: string;
}

export interface RunCompletedEvent {
  type: 'run.completed';
  runId: string;
  durationMs: number;
  costUsd: number;
  totalTokens: number;
  deployBlocked: boolean;
  timestamp: string;
}

export interface RunFailedEvent {
  type: 'run.failed';
  runId: string;
  error: RunError;
  timestamp: string;
}

// -- Nodes --
export interface NodeStartedEvent {
  type: 'node.started';
  runId: string;
  nodeId: string;
  model: string;
  timestamp: string;
}

export interface NodeCompletedEvent {
  type: 'node.completed';
  runId: string;
  nodeId: string;
  /** State fields the node wrote. */
  fields: string[];
  metrics: NodeMetrics;
  timestamp: string;
}

export interface NodeFailedEvent {
  type: 'node.failed';
  runId: string;
  nodeId: string;
  error: RunError;
  /** False when `break_on_error: false` lets the run continue. */
  fatal: boolean;
  timestamp: string;
}

// -- Control flow --
export interface LoopIterationEvent {
  type: 'loop.iteration';
  runId: string;
  nodeId: string;
  iteration: number;
  maxIterations: number;
  conditionMet: boolean;
  /** Where control goes next. */
  next: string;
  timestamp: string;
}

export interface ForkStartedEvent {
  type: 'fork.started';
  runId: string;
  from: string;
  branches: string[];
  join: string;
  timestamp: string;
}

export interface ForkJoinedEvent {
  type: 'fork.joined';
  runId: string;
  from: string;
  join: string;
  /** Scalar fields written by more than one branch. */
  conflicts: string[];
  timestamp: string;
}

export interface GateEvaluatedEvent {
  type: 'gate.evaluated';
  runId: string;
  result: GateResult;
  timestamp: string;
}

export type EngineEvent =
  | RunStartedEvent
  | RunCompletedEvent
  | RunFailedEvent
  | NodeStartedEvent
  | NodeCompletedEvent
  | NodeFailedEvent
  | LoopIterationEvent
  | ForkStartedEvent
  | ForkJoinedEvent
  | GateEvaluatedEvent;

export type EngineEventType = EngineEvent['type'];
