import type { IrEnum, IrModel, IrStruct, IrTypeAlias } from './irV1';

/**
 * Canonicalize an IR model for deterministic output.
 *
 * Top-level entries are order-insensitive and sorted by id. Fields and variants keep declaration
 * order: it is part of the wire format.
 */
export function canonicalizeIrModel(model: IrModel): IrModel {
  return {
    ...model,
    structs: sortById(model.structs).map(canonicalizeStruct),
    enums: sortById(model.enums).map(canonicalizeEnum),
    aliases: sortById(model.aliases).map(canonicalizeAlias),
  };
}

function canonicalizeStruct(s: IrStruct): IrStruct {
  return { ...s, genericTypes: [...s.genericTypes], fields: s.fields.map((f) => ({ ...f })) };
}

function canonicalizeEnum(e: IrEnum): IrEnum {
  return { ...e, genericTypes: [...e.genericTypes], variants: e.variants.map((v) => ({ ...v })) };
}

function canonicalizeAlias(a: IrTypeAlias): IrTypeAlias {
  return { ...a, genericTypes: [...a.genericTypes] };
}

function compareIds(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function sortById<T extends { id: string }>(arr: readonly T[]): T[] {
  return [...arr].sort((a, b) => compareIds(a.id, b.id));
}
