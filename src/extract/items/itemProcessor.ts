import type { GraphIndex } from '../../graph/graphIndex';
import type { Id, InnerOf, Item, RawType } from '../../graph/symbolGraph';
import { InaccessibleFieldsError } from '../errors';
import { collectReferencedIds, rawTypeToIr, type TypeNormalization } from '../typeRefImpl';
import { IntermediatePublicItem } from './intermediatePublicItem';
import {
  childrenForItem,
  classifyImpl,
  declaredType,
  hasStrippedFields,
  implsForItem,
  isImplRetained,
  sortPriority,
} from './itemKinds';
import type { PathComponent } from './pathComponent';

type UnprocessedItem = {
  parentPath: readonly PathComponent[];
  id: Id;
  position: number | null;
  /** Modules already inlined by a glob import on the way here; a glob adds no path component. */
  globTargets: ReadonlySet<Id>;
};

const NO_GLOB_TARGETS: ReadonlySet<Id> = new Set();

export type ItemProcessorOptions = {
  /** Also walk into the definitions named by field, alias and constant types. */
  followTypeReferences?: boolean;
};

/**
 * Walks the graph from the queued roots and records every path that reaches an item.
 *
 * Cycles are broken per path (an Id may not repeat among its own ancestors), never with a global
 * visited set: the same item reached through two re-exports must yield two results.
 */
export class ItemProcessor {
  // Used as a stack: the end of the array is the front of the queue, so children are expanded
  // before the siblings of their parent.
  private readonly workQueue: UnprocessedItem[] = [];
  private readonly finished: IntermediatePublicItem[] = [];

  constructor(
    private readonly graph: GraphIndex,
    private readonly options: ItemProcessorOptions = {},
  ) {}

  get output(): readonly IntermediatePublicItem[] {
    return this.finished;
  }

  addToWorkQueue(
    parentPath: readonly PathComponent[],
    id: Id,
    position: number | null = null,
    globTargets: ReadonlySet<Id> = NO_GLOB_TARGETS,
  ): void {
    this.workQueue.push({ parentPath, id, position, globTargets });
  }

  run(): void {
    for (let next = this.workQueue.pop(); next; next = this.workQueue.pop()) {
      const item = this.graph.getItem(next.id);
      if (item) this.processAnyItem(item, next);
    }
  }

  private processAnyItem(item: Item, unprocessed: UnprocessedItem): void {
    const inner = item.inner;
    switch (inner.kind) {
      case 'import':
        if (inner.glob) this.processGlobImport(item, inner, unprocessed);
        else this.processImport(item, inner, unprocessed);
        return;
      case 'impl':
        this.processImpl(item, inner, unprocessed);
        return;
      default:
        this.processItemUnlessRecursive(item, unprocessed, null);
    }
  }

  private processImport(item: Item, imp: InnerOf<'import'>, unprocessed: UnprocessedItem): void {
    const target = imp.id === null ? undefined : this.getItemIfNotInPath(unprocessed.parentPath, imp.id);
    // An unresolvable re-export is still part of the API; it shows up as the import itself.
    this.processItem(target ?? item, unprocessed, imp.name, null);
  }

  private processGlobImport(item: Item, imp: InnerOf<'import'>, unprocessed: UnprocessedItem): void {
    const alreadyInlined = imp.id !== null && unprocessed.globTargets.has(imp.id);
    const target =
      imp.id === null || alreadyInlined ? undefined : this.getItemIfNotInPath(unprocessed.parentPath, imp.id);
    if (target && target.inner.kind === 'module') {
      // The glob itself adds no path segment.
      const globTargets = new Set(unprocessed.globTargets).add(target.id);
      for (const id of target.inner.items) this.addToWorkQueue(unprocessed.parentPath, id, null, globTargets);
      return;
    }
    this.processItem(item, unprocessed, `<<${imp.source}::*>>`, null);
  }

  private processImpl(item: Item, impl: InnerOf<'impl'>, unprocessed: UnprocessedItem): void {
    if (!isImplRetained(classifyImpl(item, impl))) return;
    this.processItem(item, unprocessed, null, impl.for);
  }

  private processItemUnlessRecursive(item: Item, unprocessed: UnprocessedItem, overriddenName: string | null): void {
    if (isInPath(unprocessed.parentPath, item.id)) {
      const name = overriddenName ?? item.name ?? '';
      this.finished.push(finish(unprocessed, item, `<<${name}>>`, null, null));
      return;
    }
    this.processItem(item, unprocessed, overriddenName, null);
  }

  private processItem(
    item: Item,
    unprocessed: UnprocessedItem,
    overriddenName: string | null,
    type: RawType | null,
  ): void {
    if (hasStrippedFields(item)) {
      throw new InaccessibleFieldsError(overriddenName ?? item.name ?? item.id, item.id);
    }

    const declared = declaredType(item);
    const normalized = declared && normalizesInline(item) ? rawTypeToIr(declared) : null;
    const finishedItem = finish(unprocessed, item, overriddenName, type, normalized);
    const path = finishedItem.path;

    for (const child of childrenForItem(item)) {
      this.addToWorkQueue(path, child.id, child.position, unprocessed.globTargets);
    }

    const impls = implsForItem(item);
    if (impls.length > 0) {
      const hidden = path.map((c) => ({ ...c, hide: true }));
      for (const id of impls) this.addToWorkQueue(hidden, id, null, unprocessed.globTargets);
    }

    if (declared && this.options.followTypeReferences && normalizesInline(item)) {
      for (const id of new Set(collectReferencedIds(declared))) {
        this.addToWorkQueue(path, id, null, unprocessed.globTargets);
      }
    }

    this.finished.push(finishedItem);
  }

  private getItemIfNotInPath(parentPath: readonly PathComponent[], id: Id): Item | undefined {
    if (isInPath(parentPath, id)) return undefined;
    return this.graph.getItem(id);
  }
}

function isInPath(path: readonly PathComponent[], id: Id): boolean {
  return path.some((c) => c.item.id === id);
}

function normalizesInline(item: Item): boolean {
  const kind = item.inner.kind;
  return kind === 'struct_field' || kind === 'type_alias' || kind === 'constant';
}

function finish(
  unprocessed: UnprocessedItem,
  item: Item,
  overriddenName: string | null,
  type: RawType | null,
  normalized: TypeNormalization | null,
): IntermediatePublicItem {
  const component: PathComponent = {
    item,
    overriddenName,
    sortPriority: sortPriority(item),
    position: unprocessed.position,
    type,
    hide: false,
  };
  return new IntermediatePublicItem([...unprocessed.parentPath, component], normalized);
}
