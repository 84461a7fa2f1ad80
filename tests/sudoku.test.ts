// ─── Sudoku tests ──────────────────────────────────────────────────────────

import { describe, it, expect } from "vitest";
import {
  SOLVER_PRESETS,
  SearchStatus,
  assertGridShape,
  cloneGrid,
  findGivenConflict,
  initialDomains,
  isValidSolution,
  parseGrid,
  peersOf,
  solveSudoku,
} from "../src/engine/index";
import type { SolverPreset } from "../src/engine/index";

const PRESETS: SolverPreset[] = ["simple", "forward-checking", "mrv-forward-checking"];

const CLASSIC = parseGrid(`
  530070000
  600195000
  098000060
  800060003
  400803001
  700020006
  060000280
  000419005
  000080079
`);

const CLASSIC_SOLUTION = parseGrid(`
  534678912
  672195348
  198342567
  859761423
  426853791
  713924856
  961537284
  287419635
  345286179
`);

// ─── Peers and domains ─────────────────────────────────────────────────────

describe("peersOf", () => {
  it("lists the 20 cells sharing a row, column or box", () => {
    const peers = peersOf({ row: 4, col: 4 });
    expect(peers).toHaveLength(20);
    expect(peers.some((p) => p.row === 4 && p.col === 4)).toBe(false);
  });

  it("includes the far corner of its box", () => {
    const peers = peersOf({ row: 0, col: 0 });
    expect(peers.some((p) => p.row === 2 && p.col === 2)).toBe(true);
    expect(peers.some((p) => p.row === 3 && p.col === 3)).toBe(false);
  });
});

describe("initialDomains", () => {
  it("pins givens and removes peer givens from empty cells", () => {
    const domains = initialDomains(CLASSIC);
    expect(domains.get({ row: 0, col: 0 })).toEqual([5]);
    expect(domains.get({ row: 0, col: 2 })).toEqual([1, 2, 4]);
  });
});

// ─── Solving ───────────────────────────────────────────────────────────────

describe("solveSudoku", () => {
  it.each(PRESETS)("solves the classic puzzle to its known completion (%s)", (preset) => {
    const before = cloneGrid(CLASSIC);
    const result = solveSudoku(CLASSIC, SOLVER_PRESETS[preset]);

    expect(result.status).toBe(SearchStatus.Solved);
    expect(result.grid).toEqual(CLASSIC_SOLUTION);
    expect(result.grid?.[0]).toEqual([5, 3, 4, 6, 7, 8, 9, 1, 2]);
    expect(isValidSolution(CLASSIC, result.grid ?? [])).toBe(true);
    // 51 empty cells each need at least one assignment.
    expect(result.stats.assignments).toBeGreaterThanOrEqual(51);
    expect(CLASSIC).toEqual(before);
  });

  it("reports clashing givens as infeasible without touching the grid", () => {
    const puzzle = cloneGrid(CLASSIC);
    puzzle[0][1] = 5;
    const before = cloneGrid(puzzle);

    const result = solveSudoku(puzzle);

    expect(result.status).toBe(SearchStatus.Exhausted);
    expect(result.grid).toBeNull();
    expect(result.reason).toBe("Given 5 at (0, 0) clashes with a peer.");
    expect(result.stats.assignments).toBe(0);
    expect(puzzle).toEqual(before);
  });

  it.each(PRESETS)("fails fast on a cell with no candidates (%s)", (preset) => {
    const puzzle = parseGrid("123456780" + "000000009" + "0".repeat(63));
    const result = solveSudoku(puzzle, SOLVER_PRESETS[preset]);

    expect(result.status).toBe(SearchStatus.Exhausted);
    expect(result.reason).toBe("No completion satisfies the givens.");
    expect(result.stats.assignments).toBe(0);
    expect(result.stats.backtracks).toBe(0);
  });

  it("returns a full grid unchanged with no assignments", () => {
    const result = solveSudoku(CLASSIC_SOLUTION);
    expect(result.status).toBe(SearchStatus.Solved);
    expect(result.grid).toEqual(CLASSIC_SOLUTION);
    expect(result.stats.assignments).toBe(0);
    expect(result.stats.backtracks).toBe(0);
  });

  it("solves an empty grid", () => {
    const empty = parseGrid("0".repeat(81));
    const result = solveSudoku(empty);
    expect(result.status).toBe(SearchStatus.Solved);
    expect(isValidSolution(empty, result.grid ?? [])).toBe(true);
  });
});

describe("findGivenConflict", () => {
  it("finds nothing in a consistent puzzle", () => {
    expect(findGivenConflict(CLASSIC)).toBeNull();
  });

  it("returns the first clashing given in row-major order", () => {
    const puzzle = cloneGrid(CLASSIC);
    puzzle[8][0] = 5; // same column as (0, 0)
    expect(findGivenConflict(puzzle)).toEqual({ row: 0, col: 0 });
  });
});

describe("isValidSolution", () => {
  it("rejects a grid that drops a given", () => {
    const grid = cloneGrid(CLASSIC_SOLUTION);
    const puzzle = cloneGrid(CLASSIC);
    puzzle[0][2] = 9;
    expect(isValidSolution(puzzle, grid)).toBe(false);
  });

  it("rejects a repeated digit", () => {
    const grid = cloneGrid(CLASSIC_SOLUTION);
    grid[0][0] = grid[0][1];
    expect(isValidSolution(parseGrid("0".repeat(81)), grid)).toBe(false);
  });
});

// ─── Input checks ──────────────────────────────────────────────────────────

describe("parseGrid", () => {
  it("accepts dots for empty cells", () => {
    const grid = parseGrid(".".repeat(80) + "7");
    expect(grid[8][8]).toBe(7);
    expect(grid[0][0]).toBe(0);
  });

  it("rejects the wrong number of cells", () => {
    expect(() => parseGrid("123")).toThrow("Grid text must have 81 cells, got 3.");
  });

  it("rejects characters that are not digits", () => {
    expect(() => parseGrid("x" + "0".repeat(80))).toThrow('Invalid cell "x" at (0, 0).');
  });
});

describe("assertGridShape", () => {
  it("rejects values outside 0-9", () => {
    const grid = cloneGrid(CLASSIC);
    grid[2][3] = 12;
    expect(() => assertGridShape(grid)).toThrow("Invalid value 12 at (2, 3).");
  });

  it("rejects short rows", () => {
    const grid = cloneGrid(CLASSIC);
    grid[1] = [1, 2, 3];
    expect(() => assertGridShape(grid)).toThrow("Row 1 must have 9 cells, got 3.");
  });
});
