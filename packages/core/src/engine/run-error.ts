// packages/core/src/engine/run-error.ts

import type { RunError } from '../types/run.js';
import {
  ConfigValidationError,
  ControlFlowError,
  NodeExecutionError,
  OutputValidationError,
  QualityGateError,
  StateError,
  TemplateError,
  ToolExecutionError,
  WorkflowTimeoutError,
} from '../utils/errors.js';

/** Structured form of any error that ends a run or a node. */
export function toRunError(err: unknown): RunError {
  if (err instanceof NodeExecutionError) {
    return { ...toRunError(err.cause), nodeId: err.nodeId };
  }
  if (!(err instanceof Error)) {
    return { type: 'Error', message: String(err) };
  }

  const base: RunError = { type: err.name, message: err.message };
  if (err instanceof ConfigValidationError) return { ...base, details: { issues: err.issues } };
  if (err instanceof StateError) return { ...base, details: { field: err.field } };
  if (err instanceof TemplateError) return { ...base, details: { field: err.field, suggestion: err.suggestion } };
  if (err instanceof ToolExecutionError) return { ...base, details: { toolName: err.toolName } };
  if (err instanceof OutputValidationError) {
    return { ...base, nodeId: err.nodeId, details: { attempts: err.attempts, issues: err.issues } };
  }
  if (err instanceof WorkflowTimeoutError) return { ...base, details: { timeoutMs: err.timeoutMs } };
  if (err instanceof QualityGateError) return { ...base, details: { failedGates: err.failedGates } };
  if (err instanceof ControlFlowError && err.nodeId) return { ...base, nodeId: err.nodeId };
  return base;
}
