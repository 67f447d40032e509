import type { Dependency } from '../dependency.js';
import { unitRefKey, type UnitRef } from './unit-ref.js';

export interface DependencyGraphView {
  /** Outgoing edges of a unit; empty when the unit is unknown */
  edgesOf(ref: UnitRef): Dependency[];
  /** The unit an edge points at, or undefined for untracked targets */
  resolve(dependency: Dependency): UnitRef | undefined;
}

/**
 * Whether `goal` is reachable from `start` by following dependency edges,
 * `start` itself included. Walks with an explicit stack so deep chains do
 * not grow the call stack.
 */
export function canReach(graph: DependencyGraphView, start: UnitRef, goal: UnitRef): boolean {
  const goalKey = unitRefKey(goal);
  const visited = new Set<string>();
  const stack: UnitRef[] = [start];

  while (stack.length > 0) {
    const current = stack.pop();
    if (!current) {
      break;
    }
    const key = unitRefKey(current);
    if (key === goalKey) {
      return true;
    }
    if (visited.has(key)) {
      continue;
    }
    visited.add(key);

    for (const edge of graph.edgesOf(current)) {
      const next = graph.resolve(edge);
      if (next && !visited.has(unitRefKey(next))) {
        stack.push(next);
      }
    }
  }
  return false;
}

/**
 * First unit among `units` that lies on a cycle, if any.
 */
export function findCycle(graph: DependencyGraphView, units: UnitRef[]): UnitRef | undefined {
  return units.find(unit =>
    graph.edgesOf(unit).some(edge => {
      const next = graph.resolve(edge);
      return next !== undefined && canReach(graph, next, unit);
    })
  );
}
