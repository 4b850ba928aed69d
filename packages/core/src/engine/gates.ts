// packages/core/src/engine/gates.ts — Post-run quality gates over run metrics

import type { GateAction, GatesConfig } from '../types/config.js';
import type { GateResult, RunMetrics } from '../types/run.js';

export type GateDecision = 'pass' | GateAction;

export interface GateEvaluation {
  decision: GateDecision;
  results: GateResult[];
  failed: GateResult[];
}

const METRIC_READERS: Record<string, (m: RunMetrics) => number> = {
  cost_usd: (m) => m.costUsd,
  duration_ms: (m) => m.durationMs,
  total_tokens: (m) => m.totalTokens,
  input_tokens: (m) => m.inputTokens,
  output_tokens: (m) => m.outputTokens,
  node_count: (m) => m.nodeCount,
  llm_calls: (m) => m.llmCalls,
  tool_calls: (m) => m.toolCalls,
};

export function readMetric(metrics: RunMetrics, name: string): number | null {
  return Object.hasOwn(METRIC_READERS, name) ? METRIC_READERS[name](metrics) : null;
}

/** Evaluate every gate; any failure yields the configured `on_fail` action. */
export function evaluateGates(config: GatesConfig, metrics: RunMetrics): GateEvaluation {
  const results = config.gates.map((gate): GateResult => {
    const value = readMetric(metrics, gate.metric);
    const bounds = { max: gate.max, min: gate.min };

    if (value === null) {
      return { metric: gate.metric, value, ...bounds, passed: false, message: `Unknown metric "${gate.metric}"` };
    }
    if (gate.max !== undefined && value > gate.max) {
      return { metric: gate.metric, value, ...bounds, passed: false, message: `${gate.metric} = ${value} exceeds max ${gate.max}` };
    }
    if (gate.min !== undefined && value < gate.min) {
      return { metric: gate.metric, value, ...bounds, passed: false, message: `${gate.metric} = ${value} is below min ${gate.min}` };
    }
    return { metric: gate.metric, value, ...bounds, passed: true, message: `${gate.metric} = ${value} ok` };
  });

  const failed = results.filter((r) => !r.passed);
  return { decision: failed.length > 0 ? config.on_fail : 'pass', results, failed };
}
