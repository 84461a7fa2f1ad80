import type { DomainStore } from "./domains";
import type { AssignmentState, ConstraintGraph, SelectionPolicy, Value } from "./types";

export function selectStatic<V, T extends Value>(
  graph: ConstraintGraph<V>,
  state: AssignmentState<V, T>,
): V | undefined {
  for (const variable of graph.variables) {
    if (state.valueOf(variable) === undefined) return variable;
  }
  return undefined;
}

/**
 * Minimum remaining values: the unassigned variable with the smallest
 * domain, ties going to the smaller variable. An empty domain is returned
 * at once so the caller fails fast; a singleton ends the scan since only
 * an empty one could beat it.
 */
export function selectMrv<V, T extends Value>(
  graph: ConstraintGraph<V>,
  state: AssignmentState<V, T>,
  domains: DomainStore<V, T>,
): V | undefined {
  let best: V | undefined;
  let bestSize = Number.POSITIVE_INFINITY;

  for (const variable of graph.variables) {
    if (state.valueOf(variable) !== undefined) continue;
    const size = domains.size(variable);
    if (size === 0) return variable;
    if (
      best === undefined ||
      size < bestSize ||
      (size === bestSize && graph.compare(variable, best) < 0)
    ) {
      best = variable;
      bestSize = size;
      if (size === 1) return best;
    }
  }
  return best;
}

export function selectVariable<V, T extends Value>(
  policy: SelectionPolicy,
  graph: ConstraintGraph<V>,
  state: AssignmentState<V, T>,
  domains: DomainStore<V, T>,
): V | undefined {
  return policy === "mrv" ? selectMrv(graph, state, domains) : selectStatic(graph, state);
}
