import type { DomainStore, PruningRecord } from "./domains";
import { isComplete, isConsistent } from "./constraints";
import { selectVariable } from "./select";
import { forwardCheck } from "./propagate";
import { DEFAULT_SOLVER_CONFIG, SearchStatus, emptyStats } from "./types";
import type {
  AssignmentState,
  ConstraintGraph,
  SearchEvent,
  SearchOutcome,
  SolveOptions,
  SolverConfig,
  Value,
} from "./types";

export interface CspProblem<V, T extends Value> {
  graph: ConstraintGraph<V>;
  state: AssignmentState<V, T>;
  domains: DomainStore<V, T>;
}

/**
 * Depth-first backtracking over `problem`, mutating its state and domains
 * in place. On `solved` the state holds the full assignment; otherwise
 * every trial has been undone and state and domains are as they were.
 */
export function solve<V, T extends Value>(
  problem: CspProblem<V, T>,
  options: SolveOptions<V, T> = {},
): SearchOutcome {
  const { onEvent, ...overrides } = options;
  const config: SolverConfig = { ...DEFAULT_SOLVER_CONFIG, ...overrides };
  const { graph, state, domains } = problem;
  const stats = emptyStats();
  const startedAt = performance.now();
  let aborted = false;

  function emit(event: SearchEvent<V, T>): void {
    if (onEvent) onEvent(event);
  }

  function undoTrial(
    variable: V,
    value: T,
    record: PruningRecord<V, T> | null,
    savedDomain: T[] | null,
  ): void {
    if (record) record.undo(domains);
    state.unassign(variable);
    if (savedDomain) domains.replace(variable, savedDomain);
    emit({ type: "unassign", variable, value });
  }

  function search(): boolean {
    stats.nodes++;
    if (stats.nodes > config.maxSearchNodes) {
      aborted = true;
      return false;
    }

    if (isComplete(graph, state)) return true;

    const variable = selectVariable(config.selection, graph, state, domains);
    if (variable === undefined) return true;

    // Iterate a copy: propagation below edits the live domains.
    const candidates = [...domains.get(variable)];
    emit({ type: "select", variable, domain: candidates });
    if (candidates.length === 0) return false;

    for (const value of candidates) {
      if (!isConsistent(graph, state, variable, value)) {
        emit({ type: "reject", variable, value });
        continue;
      }

      state.assign(variable, value);
      stats.assignments++;
      emit({ type: "assign", variable, value });

      let record: PruningRecord<V, T> | null = null;
      let savedDomain: T[] | null = null;
      let viable = true;
      if (config.forwardChecking) {
        savedDomain = domains.collapse(variable, value);
        const propagation = forwardCheck(graph, state, domains, variable, value);
        record = propagation.record;
        if (!propagation.ok) {
          viable = false;
          emit({ type: "wipeout", variable, value, peer: propagation.wipedOut });
        }
      }

      if (viable && search()) return true;

      undoTrial(variable, value, record, savedDomain);
      if (aborted) return false;
      stats.backtracks++;
    }

    return false;
  }

  const solved = search();
  stats.elapsedMs = performance.now() - startedAt;

  if (solved) return { status: SearchStatus.Solved, stats };
  if (aborted) {
    return {
      status: SearchStatus.Aborted,
      stats,
      reason: `Search limit of ${config.maxSearchNodes} nodes reached.`,
    };
  }
  return { status: SearchStatus.Exhausted, stats };
}
