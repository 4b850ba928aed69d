// packages/core/src/engine/loop-controller.ts

import type { StateSnapshot } from '../state/state-record.js';
import type { LoopEdge } from '../types/plan.js';

export interface LoopDecision {
  iteration: number;
  conditionMet: boolean;
  /** Exited because max_iterations was reached, not because the condition held. */
  capHit: boolean;
  next: string;
}

/**
 * Hidden per-loop iteration counters. Each fork branch gets its own copy so
 * sibling branches never see each other's counts.
 */
export class LoopController {
  constructor(private readonly counters = new Map<string, number>()) {}

  /** Called after the loop body ran once; decides where control goes next. */
  advance(edge: LoopEdge, snapshot: StateSnapshot): LoopDecision {
    const iteration = (this.counters.get(edge.counter) ?? 0) + 1;
    const conditionMet = snapshot[edge.conditionField] === true;

    if (conditionMet || iteration >= edge.maxIterations) {
      // Reset so a later re-entry starts a fresh budget.
      this.counters.delete(edge.counter);
      return { iteration, conditionMet, capHit: !conditionMet, next: edge.exitTo };
    }

    this.counters.set(edge.counter, iteration);
    return { iteration, conditionMet, capHit: false, next: edge.body };
  }

  iterations(counter: string): number {
    return this.counters.get(counter) ?? 0;
  }

  fork(): LoopController {
    return new LoopController(new Map(this.counters));
  }
}
