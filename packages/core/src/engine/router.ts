// packages/core/src/engine/router.ts — Conditional edge resolution

import { evaluateCondition } from '../expressions/evaluate.js';
import type { StateSnapshot } from '../state/state-record.js';
import type { ConditionalEdge } from '../types/plan.js';
import { ExpressionError } from '../utils/errors.js';
import { type Logger, silentLogger } from '../utils/logger.js';

/**
 * Pick the target of a conditional edge: the first non-default route whose
 * condition holds, else the default. A condition that cannot be evaluated
 * against the current state counts as not matching.
 */
export function selectRoute(edge: ConditionalEdge, snapshot: StateSnapshot, logger: Logger = silentLogger): string {
  for (const route of edge.routes) {
    if (!route.expression) continue;
    try {
      if (evaluateCondition(route.expression, snapshot)) return route.to;
    } catch (error) {
      if (!(error instanceof ExpressionError)) throw error;
      logger.debug(`Route "${route.condition}" from ${edge.from} skipped: ${error.message}`);
    }
  }
  return edge.defaultTo;
}
