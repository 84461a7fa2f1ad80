import type { SearchEvent, SearchListener, Value } from "./types";

export function describeEvent<V, T extends Value>(
  event: SearchEvent<V, T>,
  label: (variable: V) => string,
): string {
  const name = label(event.variable);
  switch (event.type) {
    case "select":
      return `Selecting variable: ${name}, domain = [${event.domain.join(", ")}]`;
    case "reject":
      return `  => ${event.value} not allowed for ${name} (neighbour conflict)`;
    case "assign":
      return `  ASSIGN ${name} = ${event.value}`;
    case "wipeout":
      return `  WIPEOUT ${label(event.peer)} after ${name} = ${event.value}`;
    case "unassign":
      return `  UNASSIGN ${name} (backtracking)`;
  }
}

/** Listener printing every search step, for the verbose runs. */
export function createConsoleTracer<V, T extends Value>(
  label: (variable: V) => string,
  write: (line: string) => void = (line) => console.log(line),
): SearchListener<V, T> {
  return (event) => write(describeEvent(event, label));
}
