import { DomainStore, compareValues, sortedUnique } from "./domains";
import { solve } from "./solver";
import { SearchStatus } from "./types";
import type { AssignmentState, ConstraintGraph, SolveOptions, SolveStats } from "./types";

export type Region = string;
export type Color = string;
export type Adjacency = Record<Region, Region[]>;

export const DEFAULT_PALETTE: readonly Color[] = [
  "#e31a93",
  "#ffff00",
  "#1f78b4",
  "#33a02c",
  "#e31a1c",
  "#ff7f00",
];

export interface MapColoringOptions extends SolveOptions<Region, Color> {
  palette?: readonly Color[];
}

export interface MapColoringResult {
  status: SearchStatus;
  coloring: Record<Region, Color> | null; // null unless solved
  stats: SolveStats;
  reason?: string;
}

/**
 * Makes an adjacency mapping symmetric, drops self-loops and duplicate
 * entries and sorts every list. A neighbour that is not itself a key is
 * rejected.
 */
export function normalizeAdjacency(raw: Readonly<Record<Region, readonly Region[]>>): Adjacency {
  const sets = new Map<Region, Set<Region>>();
  for (const region of Object.keys(raw)) sets.set(region, new Set());

  for (const [region, neighbours] of Object.entries(raw)) {
    for (const neighbour of neighbours) {
      if (neighbour === region) continue;
      const back = sets.get(neighbour);
      if (!back) {
        throw new Error(`Region "${region}" lists unknown neighbour "${neighbour}".`);
      }
      sets.get(region)?.add(neighbour);
      back.add(region);
    }
  }

  // fromEntries keeps a region named "__proto__" as an own key.
  return Object.fromEntries(
    sortedUnique(sets.keys()).map((region): [Region, Region[]] => [region, sortedUnique(sets.get(region) ?? [])]),
  );
}

export function createMapGraph(adjacency: Adjacency): ConstraintGraph<Region> {
  const variables = sortedUnique(Object.keys(adjacency));
  return {
    variables,
    key: (region) => region,
    compare: compareValues,
    peers: (region) => adjacency[region] ?? [],
  };
}

export class MapAssignment implements AssignmentState<Region, Color> {
  readonly colors = new Map<Region, Color>();

  valueOf(region: Region): Color | undefined {
    return this.colors.get(region);
  }

  assign(region: Region, color: Color): void {
    this.colors.set(region, color);
  }

  unassign(region: Region): void {
    this.colors.delete(region);
  }
}

// Every region starts with the whole palette; no precoloring.
export function paletteDomains(
  regions: readonly Region[],
  palette: readonly Color[],
): DomainStore<Region, Color> {
  const domains = new DomainStore<Region, Color>((region) => region);
  for (const region of regions) domains.set(region, palette);
  return domains;
}

/** Adjacent pairs (each reported once) sharing a colour, plus regions left uncoloured or off-palette. */
export function findColoringConflicts(
  adjacency: Adjacency,
  coloring: Readonly<Record<Region, Color>>,
  palette: readonly Color[] = DEFAULT_PALETTE,
): string[] {
  const problems: string[] = [];
  for (const region of Object.keys(adjacency).sort(compareValues)) {
    const color = coloring[region];
    if (color === undefined) {
      problems.push(`${region} is uncoloured`);
      continue;
    }
    if (!palette.includes(color)) problems.push(`${region} uses ${color}, not in the palette`);
    for (const neighbour of adjacency[region]) {
      if (compareValues(region, neighbour) < 0 && coloring[neighbour] === color) {
        problems.push(`${region} and ${neighbour} are both ${color}`);
      }
    }
  }
  return problems;
}

export function solveMapColoring(
  adjacency: Adjacency,
  options: MapColoringOptions = {},
): MapColoringResult {
  const { palette = DEFAULT_PALETTE, ...solveOptions } = options;
  const graph = createMapGraph(adjacency);
  const state = new MapAssignment();
  const outcome = solve(
    { graph, state, domains: paletteDomains(graph.variables, palette) },
    solveOptions,
  );

  if (outcome.status !== SearchStatus.Solved) {
    const reason =
      outcome.reason ?? `No colouring of ${graph.variables.length} regions with ${palette.length} colours.`;
    return { ...outcome, coloring: null, reason };
  }

  const coloring: Record<Region, Color> = Object.fromEntries(
    [...state.colors].sort(([a], [b]) => compareValues(a, b)),
  );
  return { ...outcome, coloring };
}
