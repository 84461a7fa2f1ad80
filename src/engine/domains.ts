import type { Value } from "./types";

export interface Pruning<V, T extends Value> {
  variable: V;
  value: T;
}

// Ascending for numbers, code-unit order for strings.
export function compareValues<T extends Value>(a: T, b: T): number {
  if (typeof a === "number" && typeof b === "number") return a - b;
  const sa = String(a);
  const sb = String(b);
  return sa < sb ? -1 : sa > sb ? 1 : 0;
}

export function sortedUnique<T extends Value>(values: Iterable<T>): T[] {
  return Array.from(new Set(values)).sort(compareValues);
}

/**
 * Current candidate values of every variable. Each domain is kept sorted
 * and duplicate-free, so iterating it gives the fixed trial order.
 */
export class DomainStore<V, T extends Value> {
  private readonly domains = new Map<string, T[]>();

  constructor(private readonly keyOf: (variable: V) => string) {}

  set(variable: V, values: Iterable<T>): void {
    this.domains.set(this.keyOf(variable), sortedUnique(values));
  }

  get(variable: V): readonly T[] {
    return this.domains.get(this.keyOf(variable)) ?? [];
  }

  size(variable: V): number {
    return this.get(variable).length;
  }

  has(variable: V, value: T): boolean {
    return this.get(variable).includes(value);
  }

  /** Removes `value`; returns false when it was not there. */
  remove(variable: V, value: T): boolean {
    const domain = this.domains.get(this.keyOf(variable));
    if (!domain) return false;
    const idx = domain.indexOf(value);
    if (idx < 0) return false;
    domain.splice(idx, 1);
    return true;
  }

  // Re-inserts in sorted position; no-op when already present.
  restore(variable: V, value: T): void {
    const key = this.keyOf(variable);
    const domain = this.domains.get(key);
    if (!domain) {
      this.domains.set(key, [value]);
      return;
    }
    if (domain.includes(value)) return;
    let idx = 0;
    while (idx < domain.length && compareValues(domain[idx], value) < 0) idx++;
    domain.splice(idx, 0, value);
  }

  /** Narrows the domain to `{value}` and hands back the previous one for `replace`. */
  collapse(variable: V, value: T): T[] {
    const key = this.keyOf(variable);
    const previous = this.domains.get(key) ?? [];
    this.domains.set(key, [value]);
    return previous;
  }

  replace(variable: V, values: T[]): void {
    this.domains.set(this.keyOf(variable), values);
  }

  snapshot(): Map<string, T[]> {
    const copy = new Map<string, T[]>();
    for (const [key, domain] of this.domains) copy.set(key, [...domain]);
    return copy;
  }
}

/**
 * Values forward checking removed for one trial assignment. Owned by the
 * search frame that made the trial and undone exactly once by it.
 */
export class PruningRecord<V, T extends Value> {
  private readonly entries: Pruning<V, T>[] = [];

  get size(): number {
    return this.entries.length;
  }

  add(variable: V, value: T): void {
    this.entries.push({ variable, value });
  }

  list(): readonly Pruning<V, T>[] {
    return this.entries;
  }

  // Replays in reverse and empties the record.
  undo(domains: DomainStore<V, T>): void {
    for (let i = this.entries.length - 1; i >= 0; i--) {
      const { variable, value } = this.entries[i];
      domains.restore(variable, value);
    }
    this.entries.length = 0;
  }
}
