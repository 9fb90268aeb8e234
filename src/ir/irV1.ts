/**
 * Portable model (v1): the data-facing public API of one library, with every referenced type
 * normalized into a source-independent type IR. This is the input contract for binding generators.
 *
 * Source of truth: src/ir/schema/ir-model-v1.json
 */

export type IrSchemaVersion = string;

/** Fixed-width numeric, boolean, character and string primitives. */
export type SpecialPrimitive =
  | 'String'
  | 'Char'
  | 'I8'
  | 'I16'
  | 'I32'
  | 'I64'
  | 'U8'
  | 'U16'
  | 'U32'
  | 'U64'
  | 'ISize'
  | 'USize'
  | 'Bool'
  | 'F32'
  | 'F64'
  | 'I54'
  | 'U53';

export type IrSpecialType =
  | { name: SpecialPrimitive }
  /** The empty tuple. */
  | { name: 'Unit' }
  | { name: 'Tuple'; elements: IrTypeRef[] };

/**
 * Type IR. Deliberately small: anything that cannot be expressed by these three shapes has no
 * portable representation and is reported instead.
 */
export type IrTypeRef =
  | { kind: 'SPECIAL'; special: IrSpecialType }
  | { kind: 'GENERIC'; name: string; typeArgs: IrTypeRef[] }
  | { kind: 'SIMPLE'; name: string };

export type IrTypeRefKind = IrTypeRef['kind'];

export type IrField = {
  id: string;
  /** Declared name; positional fields use their index (`0`, `1`, ...). */
  name: string;
  type: IrTypeRef;
  /** The field may be absent on the wire and falls back to its default. */
  hasDefault: boolean;
  comments: string[];
};

export type IrStruct = {
  id: string;
  name: string;
  qualifiedName: string | null;
  genericTypes: string[];
  fields: IrField[];
  comments: string[];
};

export type IrTypeAlias = {
  id: string;
  name: string;
  qualifiedName: string | null;
  genericTypes: string[];
  type: IrTypeRef;
  comments: string[];
};

export type IrEnumVariant =
  | { kind: 'UNIT'; id: string; name: string; comments: string[] }
  | { kind: 'TUPLE'; id: string; name: string; comments: string[]; types: IrTypeRef[] }
  | { kind: 'STRUCT'; id: string; name: string; comments: string[]; fields: IrField[] };

export type IrEnumKind = 'UNIT' | 'ALGEBRAIC';

export type IrEnum = {
  id: string;
  name: string;
  qualifiedName: string | null;
  kind: IrEnumKind;
  genericTypes: string[];
  /** Adjacent/internal tagging keys, when the enum declares them. */
  tagKey: string | null;
  contentKey: string | null;
  variants: IrEnumVariant[];
  /** A variant refers back to the enum itself (some targets need an indirection for this). */
  isRecursive: boolean;
  comments: string[];
};

export type IrModel = {
  schemaVersion: IrSchemaVersion;
  library: string;
  structs: IrStruct[];
  enums: IrEnum[];
  aliases: IrTypeAlias[];
};

export function createEmptyIrModel(library: string): IrModel {
  return {
    schemaVersion: '1.0',
    library,
    structs: [],
    enums: [],
    aliases: [],
  };
}
