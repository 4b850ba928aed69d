import { describe, expect, it } from 'vitest';
import { evaluateGates, readMetric } from '../../../src/engine/gates.js';
import { RunMetricsCollector } from '../../../src/engine/run-metrics.js';
import type { NodeMetrics } from '../../../src/types/run.js';

function nodeMetrics(overrides: Partial<NodeMetrics> = {}): NodeMetrics {
  return {
    durationMs: 10,
    inputTokens: 100,
    outputTokens: 50,
    totalTokens: 150,
    costUsd: 0.25,
    llmCalls: 1,
    toolCalls: 0,
    retries: 0,
    ...overrides,
  };
}

function runMetrics() {
  const collector = new RunMetricsCollector();
  collector.recordNode('a', 'completed', nodeMetrics());
  collector.recordNode('b', 'completed', nodeMetrics({ costUsd: 0.5, toolCalls: 2 }));
  return collector.snapshot(1200);
}

describe('RunMetricsCollector', () => {
  it('sums node metrics and tracks loops', () => {
    const collector = new RunMetricsCollector();
    collector.recordNode('a', 'completed', nodeMetrics());
    collector.recordNode('a', 'failed', nodeMetrics({ inputTokens: 0, outputTokens: 0, totalTokens: 0, costUsd: 0 }));
    collector.recordLoopIteration('a', false);
    collector.recordLoopIteration('a', true);

    const snapshot = collector.snapshot(42);
    expect(snapshot).toMatchObject({
      durationMs: 42,
      totalTokens: 150,
      costUsd: 0.25,
      llmCalls: 2,
      nodeCount: 2,
      loopIterations: { a: 2 },
      loopCapsHit: ['a'],
    });
    expect(snapshot.nodes.map((n) => n.status)).toEqual(['completed', 'failed']);
  });
});

describe('evaluateGates', () => {
  it('passes when every gate holds', () => {
    const evaluation = evaluateGates(
      { gates: [{ metric: 'cost_usd', max: 1 }, { metric: 'node_count', min: 2 }], on_fail: 'fail' },
      runMetrics(),
    );
    expect(evaluation.decision).toBe('pass');
    expect(evaluation.results.map((r) => r.message)).toEqual(['cost_usd = 0.75 ok', 'node_count = 2 ok']);
  });

  it('returns the configured action on failure', () => {
    const evaluation = evaluateGates(
      { gates: [{ metric: 'total_tokens', max: 200 }, { metric: 'tool_calls', min: 3 }], on_fail: 'block_deploy' },
      runMetrics(),
    );
    expect(evaluation.decision).toBe('block_deploy');
    expect(evaluation.failed.map((r) => r.message)).toEqual([
      'total_tokens = 300 exceeds max 200',
      'tool_calls = 2 is below min 3',
    ]);
  });

  it('fails gates on unknown metrics', () => {
    const evaluation = evaluateGates({ gates: [{ metric: 'latency_p99', max: 1 }], on_fail: 'warn' }, runMetrics());
    expect(evaluation.decision).toBe('warn');
    expect(evaluation.results[0]).toEqual({
      metric: 'latency_p99',
      value: null,
      max: 1,
      min: undefined,
      passed: false,
      message: 'Unknown metric "latency_p99"',
    });
  });

  it('does not mistake inherited object keys for metrics', () => {
    expect(readMetric(runMetrics(), 'constructor')).toBeNull();
    const evaluation = evaluateGates({ gates: [{ metric: 'toString', max: 1 }], on_fail: 'warn' }, runMetrics());
    expect(evaluation.failed.map((r) => r.message)).toEqual(['Unknown metric "toString"']);
  });

  it('reads every documented metric', () => {
    const metrics = runMetrics();
    expect(readMetric(metrics, 'duration_ms')).toBe(1200);
    expect(readMetric(metrics, 'input_tokens')).toBe(200);
    expect(readMetric(metrics, 'output_tokens')).toBe(100);
    expect(readMetric(metrics, 'llm_calls')).toBe(2);
  });
});
