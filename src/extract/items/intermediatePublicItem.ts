import type { Id, Item } from '../../graph/symbolGraph';
import type { TypeNormalization } from '../typeRefImpl';
import { sortKeyOf, type PathComponent, type SortKey } from './pathComponent';

/**
 * An item together with the path it was reached through. Rendering happens later, once every path
 * is known.
 */
export class IntermediatePublicItem {
  constructor(
    readonly path: readonly PathComponent[],
    /** Normalized declared type for fields, aliases and constants; null for everything else. */
    readonly normalizedType: TypeNormalization | null = null,
  ) {
    if (path.length === 0) throw new Error('IntermediatePublicItem needs a non-empty path');
  }

  get item(): Item {
    return this.path[this.path.length - 1].item;
  }

  get id(): Id {
    return this.item.id;
  }

  sortablePath(): SortKey[] {
    return this.path.map(sortKeyOf);
  }

  /** The item appears under a name other than its own somewhere on the path. */
  pathContainsRenamedItem(): boolean {
    return this.path.some((c) => c.overriddenName !== null && c.overriddenName !== c.item.name);
  }
}
