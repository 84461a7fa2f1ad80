import { readFileSync } from "node:fs";
import { parseArgs } from "node:util";
import {
  DEFAULT_PALETTE,
  SOLVER_PRESETS,
  SearchStatus,
  createConsoleTracer,
  formatColoring,
  formatGrid,
  formatStats,
  normalizeAdjacency,
  parseGrid,
  solveMapColoring,
  solveSudoku,
} from "../engine/index";
import type { Pos, SolveOptions, SolverPreset, Value } from "../engine/index";

export const CLASSIC_PUZZLE = `
  530070000
  600195000
  098000060
  800060003
  400803001
  700020006
  060000280
  000419005
  000080079
`;

export const DEFAULT_MAP_FILE = new URL("../../data/regions.json", import.meta.url);

const USAGE = "usage: csp [sudoku | map <adjacency.json>] [--preset name] [--puzzle cells] [--colors n] [--verbose]";

type Write = (line: string) => void;

function isPreset(name: string): name is SolverPreset {
  return Object.prototype.hasOwnProperty.call(SOLVER_PRESETS, name);
}

function isAdjacencyLike(value: unknown): value is Record<string, string[]> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false;
  return Object.values(value).every(
    (list: unknown) => Array.isArray(list) && list.every((item: unknown) => typeof item === "string"),
  );
}

function readAdjacency(file: string | URL): Record<string, string[]> {
  const parsed: unknown = JSON.parse(readFileSync(file, "utf8"));
  if (!isAdjacencyLike(parsed)) {
    throw new Error(`${String(file)} must map region names to lists of region names.`);
  }
  return parsed;
}

function solverOptions<V, T extends Value>(
  preset: SolverPreset,
  verbose: boolean,
  label: (variable: V) => string,
  write: Write,
): SolveOptions<V, T> {
  return {
    ...SOLVER_PRESETS[preset],
    onEvent: verbose ? createConsoleTracer<V, T>(label, write) : undefined,
  };
}

/**
 * Runs one solve, prints the input, the result and the stats line, and returns
 * the exit code. Bad flags, grid text or map files print their message and
 * return 2.
 */
export function run(argv: string[], write: Write = (line) => console.log(line)): number {
  try {
    return runCommand(argv, write);
  } catch (error) {
    write(error instanceof Error ? error.message : String(error));
    return 2;
  }
}

function runCommand(argv: string[], write: Write): number {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      preset: { type: "string" },
      puzzle: { type: "string" },
      colors: { type: "string" },
      verbose: { type: "boolean" },
    },
  });

  const preset = values.preset ?? "mrv-forward-checking";
  if (!isPreset(preset)) {
    write(`Unknown preset "${preset}". Choose one of: ${Object.keys(SOLVER_PRESETS).join(", ")}.`);
    return 2;
  }
  const verbose = values.verbose ?? false;
  const [command = "sudoku", file] = positionals;

  if (command === "sudoku") {
    const puzzle = parseGrid(values.puzzle ?? CLASSIC_PUZZLE);
    write("=== Given puzzle ===");
    write(formatGrid(puzzle));
    const label = (pos: Pos): string => `(${pos.row}, ${pos.col})`;
    const result = solveSudoku(puzzle, solverOptions<Pos, number>(preset, verbose, label, write));
    if (result.status === SearchStatus.Solved && result.grid) {
      write("=== Solved puzzle ===");
      write(formatGrid(result.grid));
    } else {
      write(`No solution found. ${result.reason ?? ""}`.trimEnd());
    }
    write(formatStats(result.stats));
    return result.status === SearchStatus.Solved ? 0 : 1;
  }

  if (command === "map") {
    const colors = values.colors === undefined ? DEFAULT_PALETTE.length : Number(values.colors);
    if (!Number.isInteger(colors) || colors < 1 || colors > DEFAULT_PALETTE.length) {
      write(`--colors must be a whole number from 1 to ${DEFAULT_PALETTE.length}.`);
      return 2;
    }
    const palette = DEFAULT_PALETTE.slice(0, colors);
    const adjacency = normalizeAdjacency(readAdjacency(file ?? DEFAULT_MAP_FILE));
    write(`Detected ${Object.keys(adjacency).length} regions.`);
    const result = solveMapColoring(adjacency, {
      ...solverOptions<string, string>(preset, verbose, (region) => region, write),
      palette,
    });
    if (result.status === SearchStatus.Solved && result.coloring) {
      write("Solution found!");
      write(formatColoring(result.coloring));
    } else {
      write(`No solution found with palette of size ${palette.length}.`);
    }
    write(formatStats(result.stats));
    return result.status === SearchStatus.Solved ? 0 : 1;
  }

  write(USAGE);
  return 2;
}
