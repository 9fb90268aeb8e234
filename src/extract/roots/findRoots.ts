import type { GraphIndex } from '../../graph/graphIndex';
import type { Id } from '../../graph/symbolGraph';
import { lastPathSegment } from '../typeRefImpl';

/** A marker trait whose implementations name the root types through associated types. */
export type RootSpec = {
  marker: string;
  slots: string[];
};

export type RootSlot = {
  slot: string;
  /** Id of the type the slot's default refers to. */
  id: Id;
};

export type RootImpl = {
  implId: Id;
  /** Id of the implementing type. */
  typeId: Id;
  slots: RootSlot[];
};

export type Seed = {
  marker: string;
  slot: string;
  typeId: Id;
  id: Id;
};

/**
 * Find `impl <marker> for T` blocks and the associated types they bind for the given slot names,
 * e.g. `type Event = MyEvent;`. Slots whose value is not a plain type reference are skipped.
 */
export function findRoots(graph: GraphIndex, marker: string, slotNames: readonly string[]): RootImpl[] {
  const out: RootImpl[] = [];
  for (const item of graph.items()) {
    const inner = item.inner;
    if (inner.kind !== 'impl' || inner.trait === null) continue;
    if (lastPathSegment(inner.trait.name) !== marker) continue;
    if (inner.for.kind !== 'resolved_path') continue;

    const slots: RootSlot[] = [];
    for (const memberId of inner.items) {
      const member = graph.getItem(memberId);
      if (!member || member.inner.kind !== 'assoc_type') continue;
      if (member.name === null || !slotNames.includes(member.name)) continue;
      const value = member.inner.default;
      if (value === null || value.kind !== 'resolved_path') continue;
      slots.push({ slot: member.name, id: value.path.id });
    }
    out.push({ implId: item.id, typeId: inner.for.path.id, slots });
  }
  return out;
}

function compareIds(a: Id, b: Id): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/** Every root type for the given specs, in a stable order independent of graph iteration order. */
export function collectSeeds(graph: GraphIndex, specs: readonly RootSpec[]): Seed[] {
  const seeds: Array<Seed & { specIndex: number; slotIndex: number }> = [];
  specs.forEach((spec, specIndex) => {
    for (const root of findRoots(graph, spec.marker, spec.slots)) {
      for (const slot of root.slots) {
        seeds.push({
          marker: spec.marker,
          slot: slot.slot,
          typeId: root.typeId,
          id: slot.id,
          specIndex,
          slotIndex: spec.slots.indexOf(slot.slot),
        });
      }
    }
  });
  seeds.sort(
    (a, b) =>
      a.specIndex - b.specIndex ||
      a.slotIndex - b.slotIndex ||
      compareIds(a.typeId, b.typeId) ||
      compareIds(a.id, b.id),
  );
  return seeds.map(({ marker, slot, typeId, id }) => ({ marker, slot, typeId, id }));
}
