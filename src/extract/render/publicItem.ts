import type { Id, ItemKind } from '../../graph/symbolGraph';
import type { IrTypeRef } from '../../ir/irV1';
import { compareSortPaths, type SortKey } from '../items/pathComponent';

/** A finished, rendered item of the public API. */
export type PublicItem = {
  id: Id;
  kind: ItemKind;
  /** Visible path segments, e.g. `['my_lib', 'Event', 'Increment']`. */
  path: string[];
  signature: string;
  /** Portable declared type (fields, aliases, constants), when there is one. */
  type: IrTypeRef | null;
  sortablePath: SortKey[];
};

export function comparePublicItems(a: PublicItem, b: PublicItem): number {
  return compareSortPaths(a.sortablePath, b.sortablePath);
}
