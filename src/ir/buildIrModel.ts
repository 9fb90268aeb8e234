import type { GraphIndex } from '../graph/graphIndex';
import type { Generics, Id, Item } from '../graph/symbolGraph';
import type { PublicApi } from '../extract/publicApi';
import type { PublicItem } from '../extract/render/publicItem';
import { rawTypeToIr } from '../extract/typeRefImpl';
import type { ExtractionReport } from '../report/extractionReport';
import { addFinding, incCount } from '../report/reportBuilder';
import {
  createEmptyIrModel,
  type IrEnum,
  type IrEnumVariant,
  type IrField,
  type IrModel,
  type IrStruct,
  type IrTypeAlias,
  type IrTypeRef,
} from './irV1';
import { hasSerdeFlag, serdeValue } from './serdeAttrs';

export type BuildIrModelOptions = {
  /** Variants carrying exactly this attribute are left out. */
  skipAttribute: string;
  /** Findings for left-out fields, variants and aliases go here. */
  report?: ExtractionReport;
};

/**
 * Build the portable model from the structs, enums and aliases of a public API.
 * Each Id contributes one entry, however many paths reach it.
 */
export function buildIrModel(graph: GraphIndex, api: PublicApi, options: BuildIrModelOptions): IrModel {
  const model = createEmptyIrModel(libraryName(graph));
  const builder = new ModelBuilder(graph, options);

  for (const [id, items] of api.idToItems) {
    const item = graph.peekItem(id);
    if (!item) continue;
    const where = items[0];
    switch (item.inner.kind) {
      case 'struct': {
        const struct = builder.struct(item, where);
        if (struct) model.structs.push(struct);
        break;
      }
      case 'enum':
        model.enums.push(builder.enum(item, where));
        break;
      case 'type_alias': {
        const alias = builder.alias(item, where);
        if (alias) model.aliases.push(alias);
        break;
      }
      default:
        break;
    }
  }

  if (options.report) {
    const counts = options.report.counts.modelByKind;
    incCount(counts, 'struct', model.structs.length);
    incCount(counts, 'enum', model.enums.length);
    incCount(counts, 'alias', model.aliases.length);
  }
  return model;
}

function libraryName(graph: GraphIndex): string {
  return graph.peekItem(graph.document.root)?.name ?? '';
}

function docComments(item: Item): string[] {
  if (!item.docs) return [];
  return item.docs.split('\n');
}

function genericTypeNames(generics: Generics | undefined): string[] {
  return (generics?.params ?? []).filter((p) => p.kind === 'type').map((p) => p.name);
}

function mentionsName(t: IrTypeRef, name: string): boolean {
  switch (t.kind) {
    case 'SIMPLE':
      return t.name === name;
    case 'GENERIC':
      return t.name === name || t.typeArgs.some((a) => mentionsName(a, name));
    case 'SPECIAL':
      return t.special.name === 'Tuple' && t.special.elements.some((e) => mentionsName(e, name));
  }
}

class ModelBuilder {
  constructor(
    private readonly graph: GraphIndex,
    private readonly options: BuildIrModelOptions,
  ) {}

  /** Null for a tuple struct that cannot be represented with its full arity. */
  struct(item: Item, where: PublicItem): IrStruct | null {
    const name = item.name ?? '';
    const path = where.path.join('::');
    let fields: IrField[] = [];
    if (item.inner.kind === 'struct') {
      const kind = item.inner.struct_kind;
      const containerDefault = hasSerdeFlag(item.attrs, 'default');
      if (kind.kind === 'plain') fields = this.fields(kind.fields, path, containerDefault);
      if (kind.kind === 'tuple') {
        const positional = this.positionalFields(kind.fields, path, item.id, containerDefault);
        if (!positional) return null;
        fields = positional;
      }
    }
    return {
      id: item.id,
      name,
      qualifiedName: this.qualifiedName(item.id),
      genericTypes: item.inner.kind === 'struct' ? genericTypeNames(item.inner.generics) : [],
      fields,
      comments: docComments(item),
    };
  }

  enum(item: Item, where: PublicItem): IrEnum {
    const name = item.name ?? '';
    const variants: IrEnumVariant[] = [];
    const variantIds = item.inner.kind === 'enum' ? item.inner.variants : [];
    for (const id of variantIds) {
      const variant = this.graph.peekItem(id);
      if (!variant || variant.inner.kind !== 'variant') continue;
      const variantPath = `${where.path.join('::')}::${variant.name ?? ''}`;
      if (variant.attrs.some((a) => a.trim() === this.options.skipAttribute)) {
        addFinding(this.options.report, {
          kind: 'skippedVariant',
          severity: 'info',
          message: `Variant ${name}::${variant.name ?? ''} is skipped`,
          location: { path: variantPath, id: variant.id },
        });
        continue;
      }
      const built = this.variant(variant, variantPath);
      if (built) variants.push(built);
    }

    const isRecursive = variants.some((v) => {
      switch (v.kind) {
        case 'UNIT':
          return false;
        case 'TUPLE':
          return v.types.some((t) => mentionsName(t, name));
        case 'STRUCT':
          return v.fields.some((f) => mentionsName(f.type, name));
      }
    });

    return {
      id: item.id,
      name,
      qualifiedName: this.qualifiedName(item.id),
      kind: variants.every((v) => v.kind === 'UNIT') ? 'UNIT' : 'ALGEBRAIC',
      genericTypes: item.inner.kind === 'enum' ? genericTypeNames(item.inner.generics) : [],
      tagKey: serdeValue(item.attrs, 'tag'),
      contentKey: serdeValue(item.attrs, 'content'),
      variants,
      isRecursive,
      comments: docComments(item),
    };
  }

  alias(item: Item, where: PublicItem): IrTypeAlias | null {
    if (item.inner.kind !== 'type_alias') return null;
    const mapped = rawTypeToIr(item.inner.type);
    if (mapped.type === null) {
      this.unsupported(where.path.join('::'), item.id, mapped.reason);
      return null;
    }
    return {
      id: item.id,
      name: item.name ?? '',
      qualifiedName: this.qualifiedName(item.id),
      genericTypes: genericTypeNames(item.inner.generics),
      type: mapped.type,
      comments: docComments(item),
    };
  }

  private variant(variant: Item, path: string): IrEnumVariant | null {
    if (variant.inner.kind !== 'variant') return null;
    const base = { id: variant.id, name: variant.name ?? '', comments: docComments(variant) };
    const kind = variant.inner.variant_kind;
    switch (kind.kind) {
      case 'plain':
        return { kind: 'UNIT', ...base };
      case 'tuple': {
        const fields = this.positionalFields(kind.fields, path, variant.id, false);
        return fields ? { kind: 'TUPLE', ...base, types: fields.map((f) => f.type) } : null;
      }
      case 'struct':
        return { kind: 'STRUCT', ...base, fields: this.fields(kind.fields, path, false) };
    }
  }

  /**
   * Every element of a tuple, or null when one is hidden or has no portable type: dropping an
   * element would change the arity.
   */
  private positionalFields(
    ids: ReadonlyArray<Id | null>,
    ownerPath: string,
    ownerId: Id,
    containerDefault: boolean,
  ): IrField[] | null {
    const out: IrField[] = [];
    for (const [position, id] of ids.entries()) {
      const field = id === null ? undefined : this.graph.peekItem(id);
      if (!field || field.inner.kind !== 'struct_field') {
        this.unsupported(ownerPath, ownerId, `field ${position} is not accessible`);
        return null;
      }
      const mapped = rawTypeToIr(field.inner.type);
      if (mapped.type === null) {
        this.unsupported(`${ownerPath}::${position}`, field.id, mapped.reason);
        return null;
      }
      out.push({
        id: field.id,
        name: String(position),
        type: mapped.type,
        hasDefault: containerDefault || hasSerdeFlag(field.attrs, 'default'),
        comments: docComments(field),
      });
    }
    return out;
  }

  private fields(ids: ReadonlyArray<Id | null>, ownerPath: string, containerDefault: boolean): IrField[] {
    const out: IrField[] = [];
    for (const [position, id] of ids.entries()) {
      if (id === null) continue;
      const field = this.graph.peekItem(id);
      if (!field || field.inner.kind !== 'struct_field') continue;
      const name = field.name ?? String(position);
      const mapped = rawTypeToIr(field.inner.type);
      if (mapped.type === null) {
        this.unsupported(`${ownerPath}::${name}`, field.id, mapped.reason);
        continue;
      }
      out.push({
        id: field.id,
        name,
        type: mapped.type,
        hasDefault: containerDefault || hasSerdeFlag(field.attrs, 'default'),
        comments: docComments(field),
      });
    }
    return out;
  }

  private qualifiedName(id: Id): string | null {
    return this.graph.summaryPath(id)?.join('::') ?? null;
  }

  private unsupported(path: string, id: Id, reason: string): void {
    addFinding(this.options.report, {
      kind: 'unsupportedType',
      severity: 'warning',
      message: `No portable type for ${path}: ${reason}`,
      location: { path, id },
    });
  }
}
