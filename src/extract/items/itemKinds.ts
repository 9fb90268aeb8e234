import type { Id, InnerOf, Item, ItemKind, RawType, StructKind, VariantKind } from '../../graph/symbolGraph';

export type ImplKind =
  /** `impl Foo` */
  | 'INHERENT'
  /** `impl Bar for Foo` */
  | 'TRAIT'
  /** Generated by a derive attribute. */
  | 'AUTO_DERIVED'
  /** Compiler-synthesized auto-trait impl such as `impl Send for Foo`. */
  | 'AUTO_TRAIT'
  /** `impl<T> Any for T` */
  | 'BLANKET';

const AUTOMATICALLY_DERIVED_ATTR = '#[automatically_derived]';

export function classifyImpl(item: Item, impl: InnerOf<'impl'>): ImplKind {
  const hasBlanket = impl.blanket_impl !== null;
  if (impl.synthetic && !hasBlanket) return 'AUTO_TRAIT';
  if (!impl.synthetic && hasBlanket) return 'BLANKET';
  if (item.attrs.includes(AUTOMATICALLY_DERIVED_ATTR)) return 'AUTO_DERIVED';
  if (impl.trait === null) return 'INHERENT';
  return 'TRAIT';
}

/** Blanket, auto-trait and derived impls would connect almost every type to every other one. */
export function isImplRetained(kind: ImplKind): boolean {
  switch (kind) {
    case 'INHERENT':
    case 'TRAIT':
      return true;
    case 'AUTO_DERIVED':
    case 'AUTO_TRAIT':
    case 'BLANKET':
      return false;
  }
}

/**
 * Sort priority of each kind. Items are grouped by this before they are ordered by name, so e.g. all
 * variants of an enum come before its impl members.
 */
const SORT_PRIORITY: Record<Exclude<ItemKind, 'impl'>, number> = {
  extern_crate: 1,
  import: 2,
  primitive: 3,
  module: 4,
  macro: 5,
  proc_macro: 6,
  enum: 7,
  union: 8,
  struct: 9,
  struct_field: 10,
  variant: 11,
  constant: 12,
  static: 13,
  trait: 14,
  assoc_type: 15,
  assoc_const: 16,
  function: 17,
  type_alias: 19,
  foreign_type: 25,
  opaque_ty: 26,
  trait_alias: 27,
};

// Manual and derived trait impls share a group so switching between them does not reorder output.
const IMPL_SORT_PRIORITY: Record<ImplKind, number> = {
  INHERENT: 20,
  TRAIT: 21,
  AUTO_DERIVED: 21,
  AUTO_TRAIT: 23,
  BLANKET: 24,
};

export function sortPriority(item: Item): number {
  const inner = item.inner;
  if (inner.kind === 'impl') return IMPL_SORT_PRIORITY[classifyImpl(item, inner)];
  return SORT_PRIORITY[inner.kind];
}

/** Kinds that describe the shape of data and therefore end up in the public API. */
const DATA_KINDS: ReadonlySet<ItemKind> = new Set<ItemKind>([
  'struct',
  'enum',
  'struct_field',
  'variant',
  'primitive',
  'type_alias',
  'union',
  'foreign_type',
  'constant',
]);

export function isDataKind(kind: ItemKind): boolean {
  return DATA_KINDS.has(kind);
}

export type ChildRef = {
  id: Id;
  /** Index among positional siblings (tuple fields); null for named members. */
  position: number | null;
};

function named(ids: Id[]): ChildRef[] {
  return ids.map((id) => ({ id, position: null }));
}

function positional(ids: Array<Id | null>): ChildRef[] {
  const out: ChildRef[] = [];
  ids.forEach((id, position) => {
    // null marks a field hidden from the graph
    if (id !== null) out.push({ id, position });
  });
  return out;
}

function structChildren(kind: StructKind): ChildRef[] {
  switch (kind.kind) {
    case 'unit':
      return [];
    case 'tuple':
      return positional(kind.fields);
    case 'plain':
      return named(kind.fields);
  }
}

function variantChildren(kind: VariantKind): ChildRef[] {
  switch (kind.kind) {
    case 'plain':
      return [];
    case 'tuple':
      return positional(kind.fields);
    case 'struct':
      return named(kind.fields);
  }
}

/** Structural children: module members, fields, variants, trait and impl members. */
export function childrenForItem(item: Item): ChildRef[] {
  const inner = item.inner;
  switch (inner.kind) {
    case 'module':
      return named(inner.items);
    case 'union':
      return named(inner.fields);
    case 'struct':
      return structChildren(inner.struct_kind);
    case 'variant':
      return variantChildren(inner.variant_kind);
    case 'enum':
      return named(inner.variants);
    case 'trait':
      return named(inner.items);
    case 'impl':
      return named(inner.items);
    case 'extern_crate':
    case 'import':
    case 'struct_field':
    case 'function':
    case 'trait_alias':
    case 'type_alias':
    case 'opaque_ty':
    case 'constant':
    case 'static':
    case 'foreign_type':
    case 'macro':
    case 'proc_macro':
    case 'primitive':
    case 'assoc_const':
    case 'assoc_type':
      return [];
  }
  const unreachable: never = inner;
  throw new Error(`Unhandled item kind: ${JSON.stringify(unreachable)}`);
}

/** Impl blocks attached to an item (for a trait: its implementations). */
export function implsForItem(item: Item): Id[] {
  const inner = item.inner;
  switch (inner.kind) {
    case 'union':
    case 'struct':
    case 'enum':
    case 'primitive':
      return inner.impls;
    case 'trait':
      return inner.implementations;
    default:
      return [];
  }
}

/** Type declared by the item itself (field, alias, constant, static, associated const). */
export function declaredType(item: Item): RawType | null {
  const inner = item.inner;
  switch (inner.kind) {
    case 'struct_field':
    case 'type_alias':
    case 'constant':
    case 'static':
    case 'assoc_const':
      return inner.type;
    default:
      return null;
  }
}

/**
 * Whether the graph hides some of the item's fields. Only data-bearing items with named fields can
 * report this.
 */
export function hasStrippedFields(item: Item): boolean {
  const inner = item.inner;
  switch (inner.kind) {
    case 'struct':
      return inner.struct_kind.kind === 'plain' && inner.struct_kind.fields_stripped;
    case 'variant':
      return inner.variant_kind.kind === 'struct' && inner.variant_kind.fields_stripped;
    case 'union':
      return inner.fields_stripped;
    default:
      return false;
  }
}
