// packages/core/src/utils/index.ts -- barrel re-export

export { generateRunId, generateId } from './id.js';
export {
  ConfigValidationError,
  StateError,
  TemplateError,
  ToolExecutionError,
  OutputValidationError,
  ControlFlowError,
  WorkflowTimeoutError,
  NodeExecutionError,
  ExpressionError,
  QualityGateError,
  ModelError,
  DatabaseError,
} from './errors.js';
export type { ValidationIssue } from './errors.js';
export { withRetry } from './retry.js';
export type { RetryOptions } from './retry.js';
export { createLogger, resolveLogLevel, isLogLevel, silentLogger } from './logger.js';
export type { Logger, LogLevel } from './logger.js';
export { sleep } from './sleep.js';
export * from './constants.js';
