import { BOX, SIZE } from "./sudoku";
import type { Grid } from "./sudoku";
import type { Color, Region } from "./coloring";
import type { SolveStats } from "./types";

const RULE = "-".repeat(21);

// Dots for empty cells, " | " between boxes, a rule under every third row.
export function formatGrid(grid: Grid): string {
  const lines: string[] = [];
  for (let r = 0; r < SIZE; r++) {
    let line = "";
    for (let c = 0; c < SIZE; c++) {
      const v = grid[r][c];
      line += v !== 0 ? String(v) : ".";
      line += c % BOX === BOX - 1 && c < SIZE - 1 ? " | " : " ";
    }
    lines.push(line.trimEnd());
    if (r % BOX === BOX - 1 && r < SIZE - 1) lines.push(RULE);
  }
  return lines.join("\n");
}

export function formatColoring(coloring: Readonly<Record<Region, Color>>): string {
  return Object.keys(coloring)
    .sort()
    .map((region) => `${region}: ${coloring[region]}`)
    .join("\n");
}

export function formatStats(stats: SolveStats): string {
  const seconds = (stats.elapsedMs / 1000).toFixed(4);
  return `Assignments: ${stats.assignments}, Backtracks: ${stats.backtracks}, Time: ${seconds}s`;
}
