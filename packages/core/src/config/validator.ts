// packages/core/src/config/validator.ts — Cross-reference and graph checks

import { parseExpression, referencedFields } from '../expressions/index.js';
import { formatFieldType, isTypeCompatible, parseFieldType } from '../state/field-types.js';
import { findPlaceholders } from '../template/resolver.js';
import type { WorkflowConfig } from '../types/config.js';
import { END, START } from '../utils/constants.js';
import { ConfigValidationError, ExpressionError, type ValidationIssue } from '../utils/errors.js';
import {
  type Adjacency,
  type EdgeEntry,
  buildAdjacency,
  collectEdges,
  edgeTargets,
  isDefaultRoute,
  reachableFrom,
  reverseAdjacency,
} from './graph.js';
import { validateStructure } from './schema.js';
import { suggestName } from './suggest.js';

/** Anything that can answer whether a tool name is registered. */
export interface ToolLookup {
  has(name: string): boolean;
}

export interface ValidateOptions {
  /** Registered tools; node tool names must appear here. Defaults to none. */
  tools?: ToolLookup;
}

const NO_TOOLS: ToolLookup = { has: () => false };

interface CheckContext {
  config: WorkflowConfig;
  entries: EdgeEntry[];
  adjacency: Adjacency;
  nodeIds: string[];
  fieldNames: string[];
  options: ValidateOptions;
}

type Check = (ctx: CheckContext) => ValidationIssue[];

function checkEdgeReferences({ entries, nodeIds }: CheckContext): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const sources = [START, ...nodeIds];
  const targets = [...nodeIds, END];

  for (const { edge, path } of entries) {
    if (edge.from === END) {
      issues.push({ code: 'invalid-source', path: `${path}.from`, message: `Edges cannot start at ${END}` });
    } else if (!sources.includes(edge.from)) {
      issues.push({
        code: 'unknown-node',
        path: `${path}.from`,
        message: `Edge from "${edge.from}" starts at an unknown node`,
        suggestion: suggestName(edge.from, sources),
      });
    }

    if (edge.loop && edge.from === START) {
      issues.push({ code: 'invalid-loop', path, message: `A loop cannot start at ${START}` });
    }

    for (const target of edgeTargets(edge)) {
      if (target === START) {
        issues.push({
          code: 'invalid-target',
          path,
          message: `Edge from "${edge.from}" cannot transfer control to ${START}`,
        });
      } else if (!targets.includes(target) && !(edge.loop && target === edge.from)) {
        issues.push({
          code: 'unknown-node',
          path,
          message: `Edge from "${edge.from}" references unknown node "${target}"`,
          suggestion: suggestName(target, targets),
        });
      }
    }
  }
  return issues;
}

function checkStartEdge({ entries }: CheckContext): ValidationIssue[] {
  const starts = entries.filter((e) => e.edge.from === START);
  if (starts.length === 1) return [];
  return [
    {
      code: starts.length === 0 ? 'missing-start' : 'multiple-start',
      path: 'edges',
      message:
        starts.length === 0
          ? `No edge starts at ${START}`
          : `${START} must have exactly one edge, found ${starts.length} (${starts.map((s) => s.path).join(', ')})`,
    },
  ];
}

function checkOutgoingEdges({ entries }: CheckContext): ValidationIssue[] {
  const owners = new Map<string, string[]>();
  for (const { edge, path } of entries) {
    if (edge.from === START) continue;
    owners.set(edge.from, [...(owners.get(edge.from) ?? []), path]);
  }
  return [...owners]
    .filter(([, paths]) => paths.length > 1)
    .map(([node, paths]) => ({
      code: 'multiple-edges',
      path: paths[1],
      message: `Node "${node}" has more than one outgoing edge (${paths.join(', ')}); use routes or a fork instead`,
    }));
}

function checkNodeOutputs({ config, fieldNames }: CheckContext): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const fields = new Map(config.state.fields.map((f) => [f.name, f]));

  config.nodes.forEach((node, i) => {
    const base = `nodes.${i}`;
    node.outputs.forEach((output, j) => {
      if (!fields.has(output)) {
        issues.push({
          code: 'unknown-field',
          path: `${base}.outputs.${j}`,
          message: `Node "${node.id}" writes "${output}", which is not a state field`,
          suggestion: suggestName(output, fieldNames),
        });
      }
    });

    const schema = node.output_schema;
    if (!schema) return;

    let declared: { name: string; type: string }[];
    if (schema.type === 'object') {
      declared = schema.fields ?? [];
      const names = declared.map((f) => f.name);
      const missing = node.outputs.filter((o) => !names.includes(o));
      const extra = names.filter((n) => !node.outputs.includes(n));
      if (missing.length > 0 || extra.length > 0) {
        const parts = [
          missing.length > 0 ? `missing ${missing.join(', ')}` : '',
          extra.length > 0 ? `undeclared ${extra.join(', ')}` : '',
        ].filter(Boolean);
        issues.push({
          code: 'output-schema-mismatch',
          path: `${base}.output_schema.fields`,
          message: `Output schema of "${node.id}" does not match its outputs (${parts.join('; ')})`,
        });
      }
    } else {
      if (node.outputs.length !== 1) {
        issues.push({
          code: 'output-schema-mismatch',
          path: `${base}.output_schema`,
          message: `Node "${node.id}" uses a simple output schema but declares ${node.outputs.length} outputs; use type: object`,
        });
        return;
      }
      declared = [{ name: node.outputs[0], type: schema.type }];
    }

    for (const out of declared) {
      const field = fields.get(out.name);
      const source = parseFieldType(out.type);
      const target = field ? parseFieldType(field.type) : null;
      if (source && target && !isTypeCompatible(source, target)) {
        issues.push({
          code: 'type-mismatch',
          path: `${base}.output_schema`,
          message: `Node "${node.id}" outputs "${out.name}" as ${formatFieldType(source)} but the state field is ${formatFieldType(target)}`,
        });
      }
    }
  });
  return issues;
}

function checkPrompts({ config, fieldNames }: CheckContext): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  config.nodes.forEach((node, i) => {
    // Input templates see state only.
    for (const [name, template] of Object.entries(node.inputs)) {
      for (const placeholder of findPlaceholders(template)) {
        if (fieldNames.includes(placeholder.field)) continue;
        issues.push({
          code: 'unknown-placeholder',
          path: `nodes.${i}.inputs.${name}`,
          message: `Input "${name}" of "${node.id}" references ${placeholder.raw}, which is not a state field`,
          suggestion: suggestName(placeholder.field, fieldNames),
        });
      }
    }

    const inputNames = Object.keys(node.inputs);
    for (const placeholder of findPlaceholders(node.prompt)) {
      const known = placeholder.stateOnly ? fieldNames : [...fieldNames, ...inputNames];
      if (known.includes(placeholder.field)) continue;
      issues.push({
        code: 'unknown-placeholder',
        path: `nodes.${i}.prompt`,
        message:
          placeholder.stateOnly || inputNames.length === 0
            ? `Prompt of "${node.id}" references ${placeholder.raw}, which is not a state field`
            : `Prompt of "${node.id}" references ${placeholder.raw}, which is neither a state field nor a node input`,
        suggestion: suggestName(placeholder.field, known),
      });
    }
  });
  return issues;
}

function checkTools({ config, options }: CheckContext): ValidationIssue[] {
  const registry = options.tools ?? NO_TOOLS;
  const issues: ValidationIssue[] = [];
  config.nodes.forEach((node, i) => {
    node.tools.forEach((tool, j) => {
      if (!registry.has(tool.name)) {
        issues.push({
          code: 'unknown-tool',
          path: `nodes.${i}.tools.${j}`,
          message: `Node "${node.id}" uses unregistered tool "${tool.name}"`,
        });
      }
    });
  });
  return issues;
}

function checkRoutes({ entries, fieldNames }: CheckContext): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  for (const { edge, path } of entries) {
    if (!edge.routes) continue;
    const defaults = edge.routes.filter(isDefaultRoute).length;
    if (defaults === 0) {
      issues.push({
        code: 'missing-default',
        path: `${path}.routes`,
        message: `Conditional edge from "${edge.from}" needs a "default" route`,
      });
    } else if (defaults > 1) {
      issues.push({
        code: 'duplicate-default',
        path: `${path}.routes`,
        message: `Conditional edge from "${edge.from}" has ${defaults} default routes`,
      });
    }

    edge.routes.forEach((route, j) => {
      if (isDefaultRoute(route)) return;
      const routePath = `${path}.routes.${j}.condition`;
      try {
        const expression = parseExpression(route.condition.logic);
        for (const field of referencedFields(expression)) {
          if (!fieldNames.includes(field)) {
            issues.push({
              code: 'unknown-field',
              path: routePath,
              message: `Condition "${route.condition.logic}" reads unknown state field "${field}"`,
              suggestion: suggestName(field, fieldNames),
            });
          }
        }
      } catch (error) {
        if (!(error instanceof ExpressionError)) throw error;
        issues.push({
          code: 'invalid-condition',
          path: routePath,
          message: `Cannot parse condition "${route.condition.logic}": ${error.message}`,
        });
      }
    });
  }
  return issues;
}

function checkLoops({ config, entries, adjacency, fieldNames }: CheckContext): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const reversed = reverseAdjacency(adjacency);

  for (const { edge, path } of entries) {
    if (!edge.loop) continue;
    const conditionField = edge.loop.condition_field;
    const field = config.state.fields.find((f) => f.name === conditionField);

    if (!field) {
      issues.push({
        code: 'unknown-field',
        path: `${path}.condition_field`,
        message: `Loop on "${edge.from}" checks unknown state field "${conditionField}"`,
        suggestion: suggestName(conditionField, fieldNames),
      });
      continue;
    }
    if (field.type !== 'bool') {
      issues.push({
        code: 'type-mismatch',
        path: `${path}.condition_field`,
        message: `Loop condition "${conditionField}" must be a bool field, found ${field.type}`,
      });
    }

    // Producers must run before the check: the loop body itself or anything upstream of it.
    const upstream = reachableFrom(reversed, edge.from);
    const produced = config.nodes.some((n) => upstream.has(n.id) && n.outputs.includes(conditionField));
    if (!produced) {
      issues.push({
        code: 'loop-condition-not-produced',
        path: `${path}.condition_field`,
        message: `No node at or before "${edge.from}" writes loop condition "${conditionField}"`,
      });
    }
  }
  return issues;
}

function checkForks({ entries, adjacency }: CheckContext): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  for (const { edge, path } of entries) {
    if (!Array.isArray(edge.to)) continue;
    const targets = edge.to;

    if (new Set(targets).size !== targets.length) {
      issues.push({
        code: 'duplicate-fork-target',
        path: `${path}.to`,
        message: `Fork from "${edge.from}" lists a target more than once`,
      });
    }
    if (targets.includes(END)) {
      issues.push({
        code: 'fork-to-end',
        path: `${path}.to`,
        message: `Fork from "${edge.from}" cannot target ${END} directly`,
      });
    }
    for (const a of targets) {
      const reach = reachableFrom(adjacency, a);
      const overlapping = targets.find((b) => b !== a && reach.has(b));
      if (overlapping) {
        issues.push({
          code: 'fork-branches-overlap',
          path: `${path}.to`,
          message: `Fork branch "${a}" reaches sibling branch "${overlapping}"`,
        });
      }
    }
  }
  return issues;
}

function checkReachability({ adjacency, nodeIds, entries }: CheckContext): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const fromStart = reachableFrom(adjacency, START);
  const toEnd = reachableFrom(reverseAdjacency(adjacency), END);
  const owners = new Set(entries.map((e) => e.edge.from));

  nodeIds.forEach((id, i) => {
    if (!fromStart.has(id)) {
      issues.push({
        code: 'unreachable-node',
        path: `nodes.${i}`,
        message: `Node "${id}" is not reachable from ${START}`,
      });
    }
    if (!owners.has(id)) {
      issues.push({
        code: 'dead-end',
        path: `nodes.${i}`,
        message: `Node "${id}" has no outgoing edge; add an edge to ${END}`,
      });
    } else if (!toEnd.has(id)) {
      issues.push({
        code: 'no-path-to-end',
        path: `nodes.${i}`,
        message: `Node "${id}" has no path to ${END}`,
      });
    }
  });
  return issues;
}

const CHECKS: Check[] = [
  checkEdgeReferences,
  checkStartEdge,
  checkOutgoingEdges,
  checkNodeOutputs,
  checkPrompts,
  checkTools,
  checkRoutes,
  checkLoops,
  checkForks,
  checkReachability,
];

/** Run every business rule and return all issues found. */
export function collectIssues(config: WorkflowConfig, options: ValidateOptions = {}): ValidationIssue[] {
  const entries = collectEdges(config);
  const ctx: CheckContext = {
    config,
    entries,
    adjacency: buildAdjacency(entries),
    nodeIds: config.nodes.map((n) => n.id),
    fieldNames: config.state.fields.map((f) => f.name),
    options,
  };
  return CHECKS.flatMap((check) => check(ctx));
}

/**
 * Structural then business-rule validation of a raw workflow document.
 * Throws ConfigValidationError with every issue found; makes no model calls.
 */
export function validateWorkflow(raw: unknown, options: ValidateOptions = {}): WorkflowConfig {
  const config = validateStructure(raw);
  const issues = collectIssues(config, options);
  if (issues.length > 0) throw new ConfigValidationError(issues);
  return config;
}
