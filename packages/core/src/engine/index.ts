// packages/core/src/engine -- Graph compilation and execution

export { EventBus } from './event-bus.js';
export { LoopController } from './loop-controller.js';
export type { LoopDecision } from './loop-controller.js';
export { Orchestrator } from './orchestrator.js';
export type { OrchestratorOptions, RunOptions } from './orchestrator.js';
export { NodeExecutor, buildCorrectionPrompt } from './node-executor.js';
export type { NodeExecutorOptions, ExecuteContext } from './node-executor.js';
export { compileWorkflow, describePlan, mergeLlmSettings } from './graph-compiler.js';
export type { PlanDescription, EdgeDescription } from './graph-compiler.js';
export { selectRoute } from './router.js';
export { evaluateGates, readMetric } from './gates.js';
export type { GateDecision, GateEvaluation } from './gates.js';
export { RunMetricsCollector, emptyNodeMetrics } from './run-metrics.js';
export { toRunError } from './run-error.js';
export { CancellationToken, CancellationError } from './cancellation.js';
