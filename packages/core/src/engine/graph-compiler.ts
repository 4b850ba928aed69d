// packages/core/src/engine/graph-compiler.ts — Validated config → executable plan

import { type Adjacency, buildAdjacency, collectEdges, findJoinNode, isDefaultRoute } from '../config/graph.js';
import { parseExpression } from '../expressions/parser.js';
import { buildOutputSchema } from '../schema/output-schema.js';
import { type StateRecordType, buildStateRecord } from '../state/state-record.js';
import type { EdgeConfig, LlmDefaultsConfig, LlmOverrideConfig, WorkflowConfig } from '../types/config.js';
import type { LlmSettings } from '../types/llm.js';
import type { CompiledRoute, EdgeDescriptor, ExecutionPlan, NodeDescriptor } from '../types/plan.js';
import { LOOP_COUNTER_PREFIX } from '../utils/constants.js';
import { ControlFlowError } from '../utils/errors.js';

/** Node override wins field by field over the global defaults. */
export function mergeLlmSettings(defaults: LlmDefaultsConfig, override?: LlmOverrideConfig): LlmSettings {
  return {
    provider: override?.provider ?? defaults.provider,
    model: override?.model ?? defaults.model,
    temperature: override?.temperature ?? defaults.temperature,
    maxTokens: override?.max_tokens ?? defaults.max_tokens,
    apiBase: override?.api_base ?? defaults.api_base,
  };
}

function compileEdge(edge: EdgeConfig, adjacency: Adjacency): EdgeDescriptor {
  if (edge.to !== undefined) {
    if (Array.isArray(edge.to)) {
      return {
        kind: 'fork',
        from: edge.from,
        branches: [...edge.to],
        join: findJoinNode(adjacency, edge.to),
      };
    }
    return { kind: 'linear', from: edge.from, to: edge.to };
  }

  if (edge.routes) {
    const routes: CompiledRoute[] = edge.routes.map((route) => ({
      condition: route.condition.logic,
      expression: isDefaultRoute(route) ? null : parseExpression(route.condition.logic),
      to: route.to,
    }));
    const fallback = routes.find((r) => r.expression === null);
    if (!fallback) {
      throw new ControlFlowError(`Conditional edge from "${edge.from}" has no default route`, edge.from);
    }
    return { kind: 'conditional', from: edge.from, routes, defaultTo: fallback.to };
  }

  if (edge.loop) {
    return {
      kind: 'loop',
      from: edge.from,
      body: edge.from,
      maxIterations: edge.loop.max_iterations,
      conditionField: edge.loop.condition_field,
      exitTo: edge.loop.exit_to,
      counter: `${LOOP_COUNTER_PREFIX}${edge.from}`,
    };
  }

  throw new ControlFlowError(`Edge from "${edge.from}" declares no target`, edge.from);
}

/**
 * Build the execution plan for a validated workflow. Pure: no I/O and no
 * model calls.
 */
export function compileWorkflow(
  config: WorkflowConfig,
  stateType: StateRecordType = buildStateRecord(config.state.fields),
): ExecutionPlan {
  const { execution, llm } = config.config;

  const nodes = new Map<string, NodeDescriptor>();
  for (const node of config.nodes) {
    nodes.set(node.id, {
      id: node.id,
      description: node.description,
      prompt: node.prompt,
      inputs: { ...node.inputs },
      outputs: [...node.outputs],
      outputSchema: buildOutputSchema(node, stateType),
      tools: node.tools.map((t) => ({ name: t.name, onError: t.on_error })),
      llm: mergeLlmSettings(llm, node.llm),
      breakOnError: node.break_on_error,
      maxRetries: execution.max_retries,
      maxToolIterations: execution.max_tool_iterations,
    });
  }

  const entries = collectEdges(config);
  const adjacency = buildAdjacency(entries);
  const edges = new Map<string, EdgeDescriptor>();
  for (const { edge } of entries) {
    if (edges.has(edge.from)) {
      throw new ControlFlowError(`Node "${edge.from}" has more than one outgoing edge`, edge.from);
    }
    edges.set(edge.from, compileEdge(edge, adjacency));
  }

  return {
    workflowName: config.flow.name,
    version: config.flow.version,
    stateType,
    nodes,
    edges,
    timeoutMs: execution.timeout * 1000,
    gates: config.config.gates,
  };
}

export type EdgeDescription =
  | { kind: 'linear'; from: string; to: string }
  | { kind: 'conditional'; from: string; routes: { condition: string; to: string }[]; default: string }
  | { kind: 'loop'; from: string; body: string; maxIterations: number; conditionField: string; exitTo: string }
  | { kind: 'fork'; from: string; branches: string[]; join: string };

export interface PlanDescription {
  workflow: string;
  version?: string;
  nodes: { id: string; outputs: string[]; tools: string[]; model: string }[];
  edges: EdgeDescription[];
}

function describeEdge(edge: EdgeDescriptor): EdgeDescription {
  switch (edge.kind) {
    case 'linear':
      return { kind: 'linear', from: edge.from, to: edge.to };
    case 'conditional':
      return {
        kind: 'conditional',
        from: edge.from,
        routes: edge.routes.map((r) => ({ condition: r.condition, to: r.to })),
        default: edge.defaultTo,
      };
    case 'loop':
      return {
        kind: 'loop',
        from: edge.from,
        body: edge.body,
        maxIterations: edge.maxIterations,
        conditionField: edge.conditionField,
        exitTo: edge.exitTo,
      };
    case 'fork':
      return { kind: 'fork', from: edge.from, branches: [...edge.branches], join: edge.join };
  }
}

/** Plain-JSON view of a plan. */
export function describePlan(plan: ExecutionPlan): PlanDescription {
  return {
    workflow: plan.workflowName,
    ...(plan.version !== undefined ? { version: plan.version } : {}),
    nodes: [...plan.nodes.values()].map((n) => ({
      id: n.id,
      outputs: [...n.outputs],
      tools: n.tools.map((t) => t.name),
      model: n.llm.model,
    })),
    edges: [...plan.edges.values()].map(describeEdge),
  };
}
