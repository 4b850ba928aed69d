// packages/core/src/types/index.ts -- barrel re-export

export type {
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
  WorkflowConfig,
} from './config.js';

export type {
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
} from './llm.js';

export type {
  NodeToolBinding,
  NodeDescriptor,
  CompiledRoute,
  LinearEdge,
  ConditionalEdge,
  LoopEdge,
  ForkEdge,
  EdgeDescriptor,
  ExecutionPlan,
} from './plan.js';

export type {
  NodeMetrics,
  NodeResult,
  RunError,
  RunStatus,
  RunPhase,
  NodeRunRecord,
  RunMetrics,
  GateResult,
  RunOutcome,
} from './run.js';

export type {
  NewRun,
  StoredRun,
  RunRepository,
  ObservabilityTracker,
  ToolOutcome,
  ToolInvoker,
} from './collaborators.js';

export type {
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
} from './events.js';
