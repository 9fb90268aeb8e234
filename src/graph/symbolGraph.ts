/**
 * Symbol graph document model.
 *
 * A symbol graph is produced by the compiler's documentation tool for one library target. Every node
 * is keyed by an opaque Id and references other nodes by Id; a referenced Id is not guaranteed to be
 * present in `index` (items defined in other libraries usually only appear in `paths`).
 *
 * Source of truth for the wire shape: src/graph/schema/symbol-graph-v1.json
 */

export type Id = string;

export type GenericParamDef = {
  name: string;
  kind: 'lifetime' | 'type' | 'const';
};

export type Generics = {
  params: GenericParamDef[];
};

/** A reference to a named item, optionally with generic arguments (`Vec<T>`, `Fn(A) -> B`). */
export type ResolvedPath = {
  /** Path as written at the use site (`Vec`, `std::collections::HashMap`). */
  name: string;
  id: Id;
  args: GenericArgs | null;
};

export type GenericArgs =
  | { kind: 'angle_bracketed'; args: GenericArg[] }
  | { kind: 'parenthesized'; inputs: RawType[]; output: RawType | null };

export type GenericArg =
  | { kind: 'lifetime'; name: string }
  | { kind: 'type'; type: RawType }
  | { kind: 'const'; expr: string }
  | { kind: 'infer' };

export type RawType =
  | { kind: 'resolved_path'; path: ResolvedPath }
  | { kind: 'primitive'; name: string }
  | { kind: 'generic'; name: string }
  | { kind: 'tuple'; types: RawType[] }
  | { kind: 'slice'; type: RawType }
  | { kind: 'array'; type: RawType; len: string }
  | { kind: 'dyn_trait'; traits: ResolvedPath[] }
  | { kind: 'function_pointer' }
  | { kind: 'impl_trait' }
  | { kind: 'infer' }
  | { kind: 'raw_pointer'; mutable: boolean; type: RawType }
  | { kind: 'borrowed_ref'; lifetime: string | null; mutable: boolean; type: RawType }
  | { kind: 'qualified_path'; name: string; self_type: RawType; trait: ResolvedPath | null };

export type RawTypeKind = RawType['kind'];

export type StructKind =
  | { kind: 'unit' }
  | { kind: 'tuple'; fields: Array<Id | null> }
  | { kind: 'plain'; fields: Id[]; fields_stripped: boolean };

export type VariantKind =
  | { kind: 'plain' }
  | { kind: 'tuple'; fields: Array<Id | null> }
  | { kind: 'struct'; fields: Id[]; fields_stripped: boolean };

export type ItemInner =
  | { kind: 'module'; items: Id[]; is_crate?: boolean }
  | { kind: 'extern_crate'; name: string }
  | { kind: 'import'; source: string; name: string; id: Id | null; glob: boolean }
  | { kind: 'union'; fields: Id[]; fields_stripped: boolean; impls: Id[]; generics?: Generics }
  | { kind: 'struct'; struct_kind: StructKind; impls: Id[]; generics?: Generics }
  | { kind: 'struct_field'; type: RawType }
  | { kind: 'enum'; variants: Id[]; impls: Id[]; generics?: Generics }
  | { kind: 'variant'; variant_kind: VariantKind }
  | { kind: 'function' }
  | { kind: 'trait'; items: Id[]; implementations: Id[] }
  | { kind: 'trait_alias' }
  | {
      kind: 'impl';
      trait: ResolvedPath | null;
      for: RawType;
      items: Id[];
      synthetic: boolean;
      blanket_impl: RawType | null;
    }
  | { kind: 'type_alias'; type: RawType; generics?: Generics }
  | { kind: 'opaque_ty' }
  | { kind: 'constant'; type: RawType; expr?: string }
  | { kind: 'static'; type: RawType }
  | { kind: 'foreign_type' }
  | { kind: 'macro' }
  | { kind: 'proc_macro' }
  | { kind: 'primitive'; name: string; impls: Id[] }
  | { kind: 'assoc_const'; type: RawType; default: string | null }
  | { kind: 'assoc_type'; default: RawType | null };

export type ItemKind = ItemInner['kind'];

/** Narrow an item payload to one kind. */
export type InnerOf<K extends ItemKind> = Extract<ItemInner, { kind: K }>;

export type Item = {
  id: Id;
  name: string | null;
  docs?: string | null;
  attrs: string[];
  inner: ItemInner;
};

export type ItemSummary = {
  path: string[];
  kind: string;
};

export type SymbolGraphDocument = {
  format_version: number;
  /** Id of the library's root module. */
  root: Id;
  crate_version?: string | null;
  index: Record<Id, Item>;
  paths?: Record<Id, ItemSummary>;
};

export const SUPPORTED_FORMAT_VERSIONS: readonly number[] = [1];
