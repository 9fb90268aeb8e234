import type { Id, Item, SymbolGraphDocument } from './symbolGraph';

/**
 * Read-only view over a loaded symbol graph, plus the set of Ids that were referenced but not found.
 *
 * Missing Ids are usually items of other libraries (only summarized in `paths`) or re-exports of
 * foreign items. They are diagnostics, not errors: each one is recorded once, in the order it was
 * first looked up.
 */
export class GraphIndex {
  private readonly itemsById: ReadonlyMap<Id, Item>;
  private readonly missing = new Set<Id>();

  constructor(readonly document: SymbolGraphDocument) {
    this.itemsById = new Map(Object.entries(document.index));
  }

  /** Look up an item; a miss is recorded in the missing-set. */
  getItem(id: Id): Item | undefined {
    const item = this.itemsById.get(id);
    if (!item) this.missing.add(id);
    return item;
  }

  /** Look up an item without recording misses (for callers that only inspect). */
  peekItem(id: Id): Item | undefined {
    return this.itemsById.get(id);
  }

  items(): Iterable<Item> {
    return this.itemsById.values();
  }

  missingItemIds(): Id[] {
    return Array.from(this.missing);
  }

  /** Fully qualified path segments from the document's `paths` table, when present. */
  summaryPath(id: Id): string[] | null {
    return this.document.paths?.[id]?.path ?? null;
  }
}
