// packages/core/src/types/config.ts

import type { WorkflowConfig } from '../config/schema.js';

export type { WorkflowConfig, WorkflowConfigInput } from '../config/schema.js';

export type StateFieldConfig = WorkflowConfig['state']['fields'][number];
export type NodeConfig = WorkflowConfig['nodes'][number];
export type EdgeConfig = WorkflowConfig['edges'][number];
export type RouteConfig = NonNullable<EdgeConfig['routes']>[number];
export type LoopConfig = NonNullable<EdgeConfig['loop']>;
export type ToolRefConfig = NodeConfig['tools'][number];
export type OutputSchemaConfig = NonNullable<NodeConfig['output_schema']>;
export type LlmDefaultsConfig = WorkflowConfig['config']['llm'];
export type LlmOverrideConfig = NonNullable<NodeConfig['llm']>;
export type LlmProvider = LlmDefaultsConfig['provider'];
export type ExecutionConfig = WorkflowConfig['config']['execution'];
export type GatesConfig = NonNullable<WorkflowConfig['config']['gates']>;
export type GateConfig = GatesConfig['gates'][number];
export type GateAction = GatesConfig['on_fail'];
