// packages/core/src/engine/run-metrics.ts — Aggregates node metrics across a run

import type { NodeMetrics, NodeRunRecord, RunMetrics } from '../types/run.js';

export function emptyNodeMetrics(durationMs = 0): NodeMetrics {
  return {
    durationMs,
    inputTokens: 0,
    outputTokens: 0,
    totalTokens: 0,
    costUsd: 0,
    llmCalls: 0,
    toolCalls: 0,
    retries: 0,
  };
}

export class RunMetricsCollector {
  private readonly nodes: NodeRunRecord[] = [];
  private readonly loopIterations: Record<string, number> = {};
  private readonly loopCapsHit = new Set<string>();

  recordNode(nodeId: string, status: NodeRunRecord['status'], metrics: NodeMetrics): void {
    this.nodes.push({ nodeId, status, metrics });
  }

  recordLoopIteration(nodeId: string, capHit: boolean): void {
    this.loopIterations[nodeId] = (this.loopIterations[nodeId] ?? 0) + 1;
    if (capHit) this.loopCapsHit.add(nodeId);
  }

  snapshot(durationMs: number): RunMetrics {
    const sum = (pick: (m: NodeMetrics) => number) =>
      this.nodes.reduce((total, node) => total + pick(node.metrics), 0);
    return {
      durationMs,
      inputTokens: sum((m) => m.inputTokens),
      outputTokens: sum((m) => m.outputTokens),
      totalTokens: sum((m) => m.totalTokens),
      costUsd: sum((m) => m.costUsd),
      llmCalls: sum((m) => m.llmCalls),
      toolCalls: sum((m) => m.toolCalls),
      nodeCount: this.nodes.length,
      nodes: [...this.nodes],
      loopIterations: { ...this.loopIterations },
      loopCapsHit: [...this.loopCapsHit],
    };
  }
}
