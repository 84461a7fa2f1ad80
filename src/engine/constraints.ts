import type { AssignmentState, ConstraintGraph, Value } from "./types";

// True when no peer of `variable` already holds `value`.
export function isConsistent<V, T extends Value>(
  graph: ConstraintGraph<V>,
  state: AssignmentState<V, T>,
  variable: V,
  value: T,
): boolean {
  for (const peer of graph.peers(variable)) {
    if (state.valueOf(peer) === value) return false;
  }
  return true;
}

export function isComplete<V, T extends Value>(
  graph: ConstraintGraph<V>,
  state: AssignmentState<V, T>,
): boolean {
  for (const variable of graph.variables) {
    if (state.valueOf(variable) === undefined) return false;
  }
  return true;
}
