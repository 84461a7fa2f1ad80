export type Value = string | number;

export type SelectionPolicy = "static" | "mrv";

export type SolverPreset = "simple" | "forward-checking" | "mrv-forward-checking";

export interface Pos {
  row: number;
  col: number;
}

/**
 * Variables, their order and who constrains whom.
 * `variables` must be listed in the order `compare` defines.
 */
export interface ConstraintGraph<V> {
  readonly variables: readonly V[];
  key(variable: V): string;
  compare(a: V, b: V): number;
  peers(variable: V): readonly V[];
}

// The partial assignment; a grid for Sudoku, a map for map coloring.
export interface AssignmentState<V, T extends Value> {
  valueOf(variable: V): T | undefined;
  assign(variable: V, value: T): void;
  unassign(variable: V): void;
}

export interface SolverConfig {
  selection: SelectionPolicy;
  forwardChecking: boolean;
  maxSearchNodes: number;
}

export enum SearchStatus {
  Solved = "solved",
  Exhausted = "exhausted",
  Aborted = "aborted",
}

export interface SolveStats {
  assignments: number;
  backtracks: number;
  nodes: number;
  elapsedMs: number;
}

export interface SearchOutcome {
  status: SearchStatus;
  stats: SolveStats;
  reason?: string;
}

export type SearchEvent<V, T extends Value> =
  | { type: "select"; variable: V; domain: readonly T[] }
  | { type: "reject"; variable: V; value: T }
  | { type: "assign"; variable: V; value: T }
  | { type: "wipeout"; variable: V; value: T; peer: V }
  | { type: "unassign"; variable: V; value: T };

export type SearchListener<V, T extends Value> = (event: SearchEvent<V, T>) => void;

export interface SolveOptions<V, T extends Value> extends Partial<SolverConfig> {
  onEvent?: SearchListener<V, T>;
}

/** Default config */
export const DEFAULT_SOLVER_CONFIG: SolverConfig = {
  selection: "mrv",
  forwardChecking: true,
  maxSearchNodes: Number.POSITIVE_INFINITY,
};

export const SOLVER_PRESETS: Record<SolverPreset, Partial<SolverConfig>> = {
  simple:                 { selection: "static", forwardChecking: false },
  "forward-checking":     { selection: "static", forwardChecking: true },
  "mrv-forward-checking": { selection: "mrv",    forwardChecking: true },
};

export function emptyStats(): SolveStats {
  return { assignments: 0, backtracks: 0, nodes: 0, elapsedMs: 0 };
}
