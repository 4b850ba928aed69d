// @cogflow/core - Declarative LLM workflow engine

export const VERSION = '0.1.0';

// Type definitions
export type {
  // Config
  WorkflowConfig,
  StateFieldConfig,
  NodeConfig,
  EdgeConfig,
  RouteConfig,
  LoopConfig,
  ToolRefConfig,
  OutputSchemaConfig,
  LlmDefaultsConfig,
  LlmOverrideConfig,
  LlmProvider,
  ExecutionConfig,
  GatesConfig,
  GateConfig,
  GateAction,
  // LLM
  ChatRole,
  ChatMessage,
  ToolCall,
  JsonSchema,
  ToolSpec,
  LlmSettings,
  LlmUsage,
  ToolCallingResponse,
  StructuredResponse,
  LlmCallOptions,
  LlmClient,
  // Plan
  NodeToolBinding,
  NodeDescriptor,
  CompiledRoute,
  LinearEdge,
  ConditionalEdge,
  LoopEdge,
  ForkEdge,
  EdgeDescriptor,
  ExecutionPlan,
  // Runs
  NodeMetrics,
  NodeResult,
  RunError,
  RunStatus,
  RunPhase,
  NodeRunRecord,
  RunMetrics,
  GateResult,
  RunOutcome,
  // Collaborators
  NewRun,
  StoredRun,
  RunRepository,
  ObservabilityTracker,
  ToolOutcome,
  ToolInvoker,
  // Events
  RunStartedEvent,
  RunCompletedEvent,
  RunFailedEvent,
  NodeStartedEvent,
  NodeCompletedEvent,
  NodeFailedEvent,
  LoopIterationEvent,
  ForkStartedEvent,
  ForkJoinedEvent,
  GateEvaluatedEvent,
  EngineEvent,
  EngineEventType,
} from './types/index.js';

// Utilities
export {
  generateRunId,
  generateId,
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
  withRetry,
  createLogger,
  resolveLogLevel,
  isLogLevel,
  silentLogger,
  sleep,
} from './utils/index.js';
export type { ValidationIssue, RetryOptions, Logger, LogLevel } from './utils/index.js';
export {
  START,
  END,
  DEFAULT_TIMEOUT_SEC,
  MAX_TIMEOUT_SEC,
  DEFAULT_MAX_RETRIES,
  DEFAULT_MAX_TOOL_ITERATIONS,
  DEFAULT_MODEL_TIMEOUT_SEC,
  LOOP_COUNTER_PREFIX,
  SCHEMA_VERSION,
} from './utils/constants.js';

// Configuration
export {
  workflowConfigSchema,
  validateStructure,
  validateWorkflow,
  collectIssues,
  loadWorkflow,
  readWorkflowFile,
  parseWorkflowDocument,
  suggestName,
} from './config/index.js';
export type { WorkflowConfigInput, ValidateOptions, ToolLookup } from './config/index.js';

// State
export { buildStateRecord, StateRecordType } from './state/state-record.js';
export type { StateFieldSpec, StateSnapshot, StateDelta } from './state/state-record.js';
export type { StateValue } from './state/values.js';
export { renderValue } from './state/values.js';
export {
  parseFieldType,
  formatFieldType,
  coerceFieldValue,
  isTypeCompatible,
} from './state/field-types.js';
export type { FieldType, MergePolicy, PrimitiveTypeName } from './state/field-types.js';

// Output schemas, templates, expressions
export { buildOutputSchema, describeOutputFields } from './schema/index.js';
export type { OutputSchema, OutputFieldSpec, OutputValidation } from './schema/index.js';
export { resolveTemplate, resolveInputs, findPlaceholders } from './template/index.js';
export type { Placeholder, ResolvedInputs } from './template/index.js';
export { parseExpression, evaluateCondition, referencedFields } from './expressions/index.js';
export type { Expression } from './expressions/index.js';

// Engine
export {
  EventBus,
  LoopController,
  Orchestrator,
  NodeExecutor,
  compileWorkflow,
  describePlan,
  selectRoute,
  evaluateGates,
  toRunError,
  CancellationToken,
  CancellationError,
} from './engine/index.js';
export type {
  OrchestratorOptions,
  RunOptions,
  LoopDecision,
  PlanDescription,
  EdgeDescription,
  GateEvaluation,
} from './engine/index.js';

// Models
export { CommandLlmClient, calculateCost, getModelPricing } from './models/index.js';
export type { CommandLlmClientOptions, ModelPricing } from './models/index.js';

// Tools
export { ToolRegistry } from './tools/registry.js';
export type { ToolDefinition } from './tools/registry.js';

// Observability
export { NoopTracker, LoggingTracker } from './observability/trackers.js';

// Memory / Database
export { openDatabase, runMigrations, getSchemaVersion, SqliteRunRepository, InMemoryRunRepository } from './memory/index.js';
export type { RunListFilter } from './memory/index.js';
