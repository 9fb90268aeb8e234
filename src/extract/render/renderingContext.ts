import type { GraphIndex } from '../../graph/graphIndex';
import type { Id, Item, ItemKind } from '../../graph/symbolGraph';
import type { IntermediatePublicItem } from '../items/intermediatePublicItem';
import { declaredType } from '../items/itemKinds';
import { sortableName, type PathComponent } from '../items/pathComponent';
import { renderIrTypeRef } from '../typeRefImpl';
import type { PublicItem } from './publicItem';
import { renderRawType } from './renderRawType';

const KEYWORD: Record<ItemKind, string> = {
  module: 'mod',
  extern_crate: 'extern crate',
  import: 'use',
  union: 'union',
  struct: 'struct',
  struct_field: 'field',
  enum: 'enum',
  variant: 'variant',
  function: 'fn',
  trait: 'trait',
  trait_alias: 'trait',
  impl: 'impl',
  type_alias: 'type',
  opaque_ty: 'type',
  constant: 'const',
  static: 'static',
  foreign_type: 'extern type',
  macro: 'macro',
  proc_macro: 'proc macro',
  primitive: 'primitive',
  assoc_const: 'const',
  assoc_type: 'type',
};

const TYPED_KINDS: ReadonlySet<ItemKind> = new Set<ItemKind>(['struct_field', 'type_alias', 'constant']);

/**
 * Turns finished paths into public items. Holds the Id → paths multimap; an Id reached through
 * several re-exports maps to several items.
 */
export class RenderingContext {
  readonly idToItems: ReadonlyMap<Id, readonly IntermediatePublicItem[]>;

  constructor(
    private readonly graph: GraphIndex,
    items: readonly IntermediatePublicItem[],
  ) {
    const byId = new Map<Id, IntermediatePublicItem[]>();
    for (const item of items) {
      const list = byId.get(item.id);
      if (list) list.push(item);
      else byId.set(item.id, [item]);
    }
    this.idToItems = byId;
  }

  itemsForId(id: Id): readonly IntermediatePublicItem[] {
    return this.idToItems.get(id) ?? [];
  }

  renderPath(item: IntermediatePublicItem): string[] {
    return item.path.filter((c) => !c.hide).map(renderComponent);
  }

  renderSignature(item: IntermediatePublicItem, path: readonly string[]): string {
    const kind = item.item.inner.kind;
    const head = `${KEYWORD[kind]} ${path.join('::')}`;
    if (TYPED_KINDS.has(kind)) {
      const text = this.renderDeclaredType(item);
      return text === null ? head : `${head}: ${text}`;
    }
    if (kind === 'variant') return head + this.renderTupleVariantFields(item.item);
    return head;
  }

  toPublicItem(item: IntermediatePublicItem): PublicItem {
    const path = this.renderPath(item);
    return {
      id: item.id,
      kind: item.item.inner.kind,
      path,
      signature: this.renderSignature(item, path),
      type: item.normalizedType?.type ?? null,
      sortablePath: item.sortablePath(),
    };
  }

  private renderDeclaredType(item: IntermediatePublicItem): string | null {
    const normalized = item.normalizedType?.type;
    if (normalized) return renderIrTypeRef(normalized);
    const raw = declaredType(item.item);
    return raw ? renderRawType(raw) : null;
  }

  private renderTupleVariantFields(variant: Item): string {
    if (variant.inner.kind !== 'variant' || variant.inner.variant_kind.kind !== 'tuple') return '';
    const types = variant.inner.variant_kind.fields.map((id) => {
      const field = id === null ? undefined : this.graph.peekItem(id);
      const raw = field ? declaredType(field) : null;
      return raw ? renderRawType(raw) : '_';
    });
    return `(${types.join(', ')})`;
  }
}

function renderComponent(component: PathComponent): string {
  // An impl step is shown as the type it is for.
  if (component.type !== null) return renderRawType(component.type);
  return sortableName(component);
}
