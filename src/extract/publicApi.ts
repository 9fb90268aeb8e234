import type { GraphIndex } from '../graph/graphIndex';
import type { Id } from '../graph/symbolGraph';
import { isDataKind } from './items/itemKinds';
import { ItemProcessor } from './items/itemProcessor';
import { comparePublicItems, type PublicItem } from './render/publicItem';
import { RenderingContext } from './render/renderingContext';
import { collectSeeds, type RootSpec, type Seed } from './roots/findRoots';

export type PublicApiOptions = {
  roots: readonly RootSpec[];
  followTypeReferences?: boolean;
};

export type PublicApi = {
  /** Data-facing items, sorted by sortable path. */
  items: PublicItem[];
  /** Ids that were referenced but are not in the graph, in first-seen order. */
  missingItemIds: Id[];
  /** Every rendered item per Id; an Id reached through several paths has several entries. */
  idToItems: ReadonlyMap<Id, PublicItem[]>;
  seeds: Seed[];
};

export function buildPublicApi(graph: GraphIndex, options: PublicApiOptions): PublicApi {
  const seeds = collectSeeds(graph, options.roots);
  const processor = new ItemProcessor(graph, { followTypeReferences: options.followTypeReferences ?? false });
  // The queue pops from the back; enqueue in reverse so the first seed is expanded first.
  for (const seed of [...seeds].reverse()) processor.addToWorkQueue([], seed.id);
  processor.run();

  const context = new RenderingContext(graph, processor.output);
  const idToItems = new Map<Id, PublicItem[]>();
  const items: PublicItem[] = [];
  for (const [id, intermediates] of context.idToItems) {
    const rendered = intermediates
      .filter((i) => isDataKind(i.item.inner.kind))
      .map((i) => context.toPublicItem(i))
      .sort(comparePublicItems);
    if (rendered.length === 0) continue;
    idToItems.set(id, rendered);
    items.push(...rendered);
  }
  items.sort(comparePublicItems);

  return { items, missingItemIds: graph.missingItemIds(), idToItems, seeds };
}

/** One signature per line, in public API order. */
export function publicApiToString(api: PublicApi): string {
  return api.items.map((i) => `${i.signature}\n`).join('');
}
