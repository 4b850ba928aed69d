// packages/core/src/observability/trackers.ts

import type { ObservabilityTracker } from '../types/collaborators.js';
import type { NodeMetrics, RunOutcome } from '../types/run.js';
import type { Logger } from '../utils/logger.js';

export class NoopTracker implements ObservabilityTracker {
  recordNodeStart(): void {}
  recordNodeEnd(): void {}
  recordRunEnd(): void {}
}

/** Writes node and run timings to a logger at debug/info level. */
export class LoggingTracker implements ObservabilityTracker {
  constructor(private readonly logger: Logger) {}

  recordNodeStart(runId: string, nodeId: string): void {
    this.logger.debug(`[${runId}] node ${nodeId} started`);
  }

  recordNodeEnd(runId: string, nodeId: string, metrics: NodeMetrics): void {
    this.logger.debug(
      `[${runId}] node ${nodeId} finished in ${metrics.durationMs}ms (${metrics.totalTokens} tokens, $${metrics.costUsd.toFixed(4)})`,
    );
  }

  recordRunEnd(runId: string, outcome: RunOutcome): void {
    this.logger.info(
      `[${runId}] run ${outcome.status} in ${outcome.metrics.durationMs}ms: ${outcome.metrics.nodeCount} node executions, $${outcome.metrics.costUsd.toFixed(4)}`,
    );
  }
}
