// packages/core/src/config/graph.ts — Edge normalization and reachability helpers

import type { EdgeConfig, RouteConfig, WorkflowConfig } from '../types/config.js';
import { END, START } from '../utils/constants.js';

export const DEFAULT_ROUTE = 'default';

export interface EdgeEntry {
  edge: EdgeConfig;
  /** Where the edge was declared: `edges.<i>` or `nodes.<i>.loop`. */
  path: string;
}

export function isDefaultRoute(route: RouteConfig): boolean {
  return route.condition.logic.trim() === DEFAULT_ROUTE;
}

/** Declared edges plus the loop edges implied by node-level `loop` blocks. */
export function collectEdges(config: WorkflowConfig): EdgeEntry[] {
  const entries: EdgeEntry[] = config.edges.map((edge, i) => ({ edge, path: `edges.${i}` }));
  config.nodes.forEach((node, i) => {
    if (node.loop) {
      entries.push({ edge: { from: node.id, loop: node.loop }, path: `nodes.${i}.loop` });
    }
  });
  return entries;
}

/** Every node an edge can transfer control to. */
export function edgeTargets(edge: EdgeConfig): string[] {
  if (edge.to !== undefined) return Array.isArray(edge.to) ? edge.to : [edge.to];
  if (edge.routes) return edge.routes.map((r) => r.to);
  if (edge.loop) return [edge.from, edge.loop.exit_to];
  return [];
}

export type Adjacency = ReadonlyMap<string, readonly string[]>;

export function buildAdjacency(entries: readonly EdgeEntry[]): Adjacency {
  const adjacency = new Map<string, string[]>();
  for (const { edge } of entries) {
    const targets = adjacency.get(edge.from) ?? [];
    for (const target of edgeTargets(edge)) {
      if (!targets.includes(target)) targets.push(target);
    }
    adjacency.set(edge.from, targets);
  }
  return adjacency;
}

export function reverseAdjacency(adjacency: Adjacency): Adjacency {
  const reversed = new Map<string, string[]>();
  for (const [from, targets] of adjacency) {
    for (const target of targets) {
      const sources = reversed.get(target) ?? [];
      sources.push(from);
      reversed.set(target, sources);
    }
  }
  return reversed;
}

/** Breadth-first visit order from `start`, `start` first. */
export function bfsOrder(adjacency: Adjacency, start: string): string[] {
  const order = [start];
  const seen = new Set(order);
  for (let i = 0; i < order.length; i++) {
    for (const next of adjacency.get(order[i]) ?? []) {
      if (!seen.has(next)) {
        seen.add(next);
        order.push(next);
      }
    }
  }
  return order;
}

export function reachableFrom(adjacency: Adjacency, start: string): Set<string> {
  return new Set(bfsOrder(adjacency, start));
}

/** Breadth-first hop counts from `start` to every node it reaches. */
export function distancesFrom(adjacency: Adjacency, start: string): Map<string, number> {
  const distances = new Map([[start, 0]]);
  const queue = [start];
  for (let i = 0; i < queue.length; i++) {
    const hops = (distances.get(queue[i]) ?? 0) + 1;
    for (const next of adjacency.get(queue[i]) ?? []) {
      if (!distances.has(next)) {
        distances.set(next, hops);
        queue.push(next);
      }
    }
  }
  return distances;
}

/**
 * Join node of a fork: the node every branch reaches that is nearest to all of
 * them (smallest farthest distance, then smallest total, then breadth-first
 * order from the first branch). END only when no other node is shared, so a
 * branch's early route to END never hides the node where the branches meet.
 */
export function findJoinNode(adjacency: Adjacency, branches: readonly string[]): string {
  if (branches.length === 0) return END;
  const distances = branches.map((b) => distancesFrom(adjacency, b));
  let best: { node: string; farthest: number; total: number } | null = null;

  for (const candidate of bfsOrder(adjacency, branches[0]).slice(1)) {
    if (candidate === START || candidate === END || branches.includes(candidate)) continue;
    const hops = distances.map((d) => d.get(candidate));
    if (hops.some((h) => h === undefined)) continue;
    const counts = hops.map((h) => h ?? 0);
    const farthest = Math.max(...counts);
    const total = counts.reduce((sum, h) => sum + h, 0);
    if (!best || farthest < best.farthest || (farthest === best.farthest && total < best.total)) {
      best = { node: candidate, farthest, total };
    }
  }
  return best?.node ?? END;
}
