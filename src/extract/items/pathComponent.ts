import type { Item, RawType } from '../../graph/symbolGraph';

/**
 * One step on the path from a root to an item.
 *
 * The same item can be reached through several paths (re-exports, impls of shared traits), so a path
 * component records how it was reached, not just what it is.
 */
export type PathComponent = {
  readonly item: Item;
  /** Name under which the item was re-exported (`use a::B as C`). */
  readonly overriddenName: string | null;
  readonly sortPriority: number;
  /** Index among positional siblings; null for named members. */
  readonly position: number | null;
  /** For impls: the type the impl is for. */
  readonly type: RawType | null;
  /** Still part of the path, but not rendered (ancestors of impl members). */
  readonly hide: boolean;
};

export type SortKey = {
  priority: number;
  name: string;
  position: number | null;
};

export function sortableName(component: PathComponent): string {
  return component.overriddenName ?? component.item.name ?? '';
}

export function sortKeyOf(component: PathComponent): SortKey {
  return {
    priority: component.sortPriority,
    name: sortableName(component),
    position: component.position,
  };
}

// Code-unit order: independent of the host locale.
function compareStrings(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function comparePositions(a: number | null, b: number | null): number {
  if (a === b) return 0;
  if (a === null) return -1;
  if (b === null) return 1;
  return a - b;
}

export function compareSortKeys(a: SortKey, b: SortKey): number {
  return a.priority - b.priority || compareStrings(a.name, b.name) || comparePositions(a.position, b.position);
}

/** Lexicographic over components; a proper prefix sorts before its extensions. */
export function compareSortPaths(a: readonly SortKey[], b: readonly SortKey[]): number {
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    const c = compareSortKeys(a[i], b[i]);
    if (c !== 0) return c;
  }
  return a.length - b.length;
}
