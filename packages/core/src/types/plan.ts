// packages/core/src/types/plan.ts

import type { Expression } from '../expressions/ast.js';
import type { OutputSchema } from '../schema/output-schema.js';
import type { StateRecordType } from '../state/state-record.js';
import type { GatesConfig } from './config.js';
import type { LlmSettings } from './llm.js';

export interface NodeToolBinding {
  name: string;
  /** `continue` feeds the failure back to the model; `fail` aborts the node. */
  onError: 'continue' | 'fail';
}

/** Everything the executor needs to run one node. Immutable once compiled. */
export interface NodeDescriptor {
  readonly id: string;
  readonly description?: string;
  readonly prompt: string;
  /** Input name to template; resolved against state before the prompt. */
  readonly inputs: Readonly<Record<string, string>>;
  readonly outputs: readonly string[];
  readonly outputSchema: OutputSchema;
  readonly tools: readonly NodeToolBinding[];
  readonly llm: LlmSettings;
  readonly breakOnError: boolean;
  readonly maxRetries: number;
  readonly maxToolIterations: number;
}

export interface CompiledRoute {
  /** Condition text as declared. */
  readonly condition: string;
  /** Null for the `default` route. */
  readonly expression: Expression | null;
  readonly to: string;
}

export interface LinearEdge {
  readonly kind: 'linear';
  readonly from: string;
  readonly to: string;
}

export interface ConditionalEdge {
  readonly kind: 'conditional';
  readonly from: string;
  /** Routes in declaration order, default included. */
  readonly routes: readonly CompiledRoute[];
  readonly defaultTo: string;
}

export interface LoopEdge {
  readonly kind: 'loop';
  readonly from: string;
  /** Node re-entered while the loop continues. */
  readonly body: string;
  readonly maxIterations: number;
  readonly conditionField: string;
  readonly exitTo: string;
  /** Name of the hidden iteration counter. */
  readonly counter: string;
}

export interface ForkEdge {
  readonly kind: 'fork';
  readonly from: string;
  readonly branches: readonly string[];
  readonly join: string;
}

export type EdgeDescriptor = LinearEdge | ConditionalEdge | LoopEdge | ForkEdge;

export interface ExecutionPlan {
  readonly workflowName: string;
  readonly version?: string;
  readonly stateType: StateRecordType;
  readonly nodes: ReadonlyMap<string, NodeDescriptor>;
  /** Keyed by source node, START included. */
  readonly edges: ReadonlyMap<string, EdgeDescriptor>;
  readonly timeoutMs: number;
  readonly gates?: GatesConfig;
}
