import { PruningRecord } from "./domains";
import type { DomainStore } from "./domains";
import type { AssignmentState, ConstraintGraph, Value } from "./types";

export type Propagation<V, T extends Value> =
  | { ok: true; record: PruningRecord<V, T> }
  | { ok: false; record: PruningRecord<V, T>; wipedOut: V };

/**
 * Forward checking after `variable := value`: drops `value` from every
 * unassigned peer's domain. Stops at the first peer left with no values;
 * the record then holds the removals made so far and must still be undone.
 */
export function forwardCheck<V, T extends Value>(
  graph: ConstraintGraph<V>,
  state: AssignmentState<V, T>,
  domains: DomainStore<V, T>,
  variable: V,
  value: T,
): Propagation<V, T> {
  const record = new PruningRecord<V, T>();

  for (const peer of graph.peers(variable)) {
    if (state.valueOf(peer) !== undefined) continue;
    if (!domains.remove(peer, value)) continue;
    record.add(peer, value);
    if (domains.size(peer) === 0) {
      return { ok: false, record, wipedOut: peer };
    }
  }

  return { ok: true, record };
}
