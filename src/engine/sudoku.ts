import { DomainStore } from "./domains";
import { isConsistent } from "./constraints";
import { solve } from "./solver";
import { SearchStatus, emptyStats } from "./types";
import type {
  AssignmentState,
  ConstraintGraph,
  Pos,
  SolveOptions,
  SolveStats,
} from "./types";

export type Grid = number[][];

export const SIZE = 9;
export const BOX = 3;
export const DIGITS: readonly number[] = [1, 2, 3, 4, 5, 6, 7, 8, 9];

export interface SudokuResult {
  status: SearchStatus;
  grid: Grid | null; // null unless solved
  stats: SolveStats;
  reason?: string;
}

export function posKey(pos: Pos): string {
  return `${pos.row},${pos.col}`;
}

function comparePos(a: Pos, b: Pos): number {
  return a.row - b.row || a.col - b.col;
}

function buildCells(): Pos[] {
  const cells: Pos[] = [];
  for (let row = 0; row < SIZE; row++) {
    for (let col = 0; col < SIZE; col++) cells.push({ row, col });
  }
  return cells;
}

// Row-major, which is also the (row, col) order.
export const CELLS: readonly Pos[] = buildCells();

const peerCache = new Map<string, Pos[]>();

/** Cells sharing a row, column or box with `pos`: row first, then column, then the rest of the box. */
export function peersOf(pos: Pos): readonly Pos[] {
  const key = posKey(pos);
  const cached = peerCache.get(key);
  if (cached) return cached;

  const peers: Pos[] = [];
  const seen = new Set<string>([key]);
  const add = (row: number, col: number): void => {
    const k = `${row},${col}`;
    if (seen.has(k)) return;
    seen.add(k);
    peers.push({ row, col });
  };

  for (let col = 0; col < SIZE; col++) add(pos.row, col);
  for (let row = 0; row < SIZE; row++) add(row, pos.col);
  const br = Math.floor(pos.row / BOX) * BOX;
  const bc = Math.floor(pos.col / BOX) * BOX;
  for (let row = br; row < br + BOX; row++) {
    for (let col = bc; col < bc + BOX; col++) add(row, col);
  }

  peerCache.set(key, peers);
  return peers;
}

export const sudokuGraph: ConstraintGraph<Pos> = {
  variables: CELLS,
  key: posKey,
  compare: comparePos,
  peers: peersOf,
};

// Reads and writes the grid in place; 0 is an empty cell.
export class GridState implements AssignmentState<Pos, number> {
  constructor(readonly grid: Grid) {}

  valueOf(pos: Pos): number | undefined {
    const v = this.grid[pos.row][pos.col];
    return v === 0 ? undefined : v;
  }

  assign(pos: Pos, value: number): void {
    this.grid[pos.row][pos.col] = value;
  }

  unassign(pos: Pos): void {
    this.grid[pos.row][pos.col] = 0;
  }
}

export function cloneGrid(grid: Grid): Grid {
  return grid.map((row) => [...row]);
}

export function assertGridShape(grid: Grid): void {
  if (grid.length !== SIZE) throw new Error(`Grid must have ${SIZE} rows, got ${grid.length}.`);
  grid.forEach((row, r) => {
    if (row.length !== SIZE) {
      throw new Error(`Row ${r} must have ${SIZE} cells, got ${row.length}.`);
    }
    row.forEach((v, c) => {
      if (!Number.isInteger(v) || v < 0 || v > SIZE) {
        throw new Error(`Invalid value ${v} at (${r}, ${c}).`);
      }
    });
  });
}

// Parse 81 cells (digits 1-9 = givens, 0/. = empty), whitespace ignored.
export function parseGrid(text: string): Grid {
  const s = text.replace(/\s+/g, "");
  if (s.length !== SIZE * SIZE) {
    throw new Error(`Grid text must have ${SIZE * SIZE} cells, got ${s.length}.`);
  }
  const grid: Grid = [];
  for (let r = 0; r < SIZE; r++) {
    const row: number[] = [];
    for (let c = 0; c < SIZE; c++) {
      const ch = s[r * SIZE + c];
      if (ch === "." || ch === "0") {
        row.push(0);
        continue;
      }
      const v = Number(ch);
      if (!Number.isInteger(v) || v < 1 || v > SIZE) {
        throw new Error(`Invalid cell "${ch}" at (${r}, ${c}).`);
      }
      row.push(v);
    }
    grid.push(row);
  }
  return grid;
}

/**
 * Givens keep their single value; empty cells start with the digits no
 * given peer already uses.
 */
export function initialDomains(grid: Grid): DomainStore<Pos, number> {
  const domains = new DomainStore<Pos, number>(posKey);
  for (const cell of CELLS) {
    const given = grid[cell.row][cell.col];
    if (given !== 0) {
      domains.set(cell, [given]);
      continue;
    }
    const used = new Set<number>();
    for (const peer of peersOf(cell)) {
      const v = grid[peer.row][peer.col];
      if (v !== 0) used.add(v);
    }
    domains.set(cell, DIGITS.filter((d) => !used.has(d)));
  }
  return domains;
}

// First given (row-major) that repeats a value in its row, column or box.
export function findGivenConflict(grid: Grid): Pos | null {
  const state = new GridState(grid);
  for (const cell of CELLS) {
    const v = state.valueOf(cell);
    if (v !== undefined && !isConsistent(sudokuGraph, state, cell, v)) return cell;
  }
  return null;
}

function units(): Pos[][] {
  const out: Pos[][] = [];
  for (let i = 0; i < SIZE; i++) {
    out.push(CELLS.filter((p) => p.row === i));
    out.push(CELLS.filter((p) => p.col === i));
    const br = Math.floor(i / BOX) * BOX;
    const bc = (i % BOX) * BOX;
    out.push(
      CELLS.filter((p) => p.row >= br && p.row < br + BOX && p.col >= bc && p.col < bc + BOX),
    );
  }
  return out;
}

/** Every row, column and box holds 1-9 once, and every given of `puzzle` is kept. */
export function isValidSolution(puzzle: Grid, grid: Grid): boolean {
  for (const cell of CELLS) {
    const given = puzzle[cell.row][cell.col];
    if (given !== 0 && grid[cell.row][cell.col] !== given) return false;
  }
  for (const unit of units()) {
    const seen = new Set(unit.map((p) => grid[p.row][p.col]));
    if (seen.size !== SIZE || DIGITS.some((d) => !seen.has(d))) return false;
  }
  return true;
}

/**
 * Solves a copy of `puzzle`; the input is left untouched. Clashing givens
 * are reported as exhausted without searching.
 */
export function solveSudoku(
  puzzle: Grid,
  options: SolveOptions<Pos, number> = {},
): SudokuResult {
  assertGridShape(puzzle);

  const conflict = findGivenConflict(puzzle);
  if (conflict) {
    const v = puzzle[conflict.row][conflict.col];
    return {
      status: SearchStatus.Exhausted,
      grid: null,
      stats: emptyStats(),
      reason: `Given ${v} at (${conflict.row}, ${conflict.col}) clashes with a peer.`,
    };
  }

  const work = cloneGrid(puzzle);
  const outcome = solve(
    { graph: sudokuGraph, state: new GridState(work), domains: initialDomains(work) },
    options,
  );
  if (outcome.status !== SearchStatus.Solved) {
    return { ...outcome, grid: null, reason: outcome.reason ?? "No completion satisfies the givens." };
  }
  return { ...outcome, grid: work };
}
