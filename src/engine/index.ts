export { solve } from "./solver";
export type { CspProblem } from "./solver";
export { DomainStore, PruningRecord, compareValues, sortedUnique } from "./domains";
export type { Pruning } from "./domains";
export { isConsistent, isComplete } from "./constraints";
export { selectStatic, selectMrv, selectVariable } from "./select";
export { forwardCheck } from "./propagate";
export type { Propagation } from "./propagate";
export {
  SIZE,
  BOX,
  DIGITS,
  CELLS,
  GridState,
  sudokuGraph,
  posKey,
  peersOf,
  cloneGrid,
  parseGrid,
  assertGridShape,
  initialDomains,
  findGivenConflict,
  isValidSolution,
  solveSudoku,
} from "./sudoku";
export type { Grid, SudokuResult } from "./sudoku";
export {
  DEFAULT_PALETTE,
  MapAssignment,
  createMapGraph,
  normalizeAdjacency,
  paletteDomains,
  findColoringConflicts,
  solveMapColoring,
} from "./coloring";
export type {
  Adjacency,
  Color,
  Region,
  MapColoringOptions,
  MapColoringResult,
} from "./coloring";
export { formatGrid, formatColoring, formatStats } from "./format";
export { createConsoleTracer, describeEvent } from "./trace";
export { SearchStatus, DEFAULT_SOLVER_CONFIG, SOLVER_PRESETS, emptyStats } from "./types";
export type {
  Value,
  Pos,
  ConstraintGraph,
  AssignmentState,
  SelectionPolicy,
  SolverConfig,
  SolverPreset,
  SolveOptions,
  SolveStats,
  SearchOutcome,
  SearchEvent,
  SearchListener,
} from "./types";
