import { GraphIndex } from '../../graph/graphIndex';
import { buildPublicApi, publicApiToString, type PublicApiOptions } from '../publicApi';
import { APP_API_LISTING, appGraph } from '../../__tests__/fixtures/appGraph';
import {
  assocType,
  enumItem,
  field,
  graph,
  implItem,
  pathType,
  plainStruct,
  prim,
  resolved,
  typeAlias,
  unitStruct,
  unitVariant,
} from '../../__tests__/fixtures/graphBuilder';

const DEFAULT_ROOTS: PublicApiOptions['roots'] = [
  { marker: 'App', slots: ['Event', 'ViewModel'] },
  { marker: 'Effect', slots: ['Ffi'] },
];

function appRootedAt(slot: string, target: ReturnType<typeof pathType>) {
  return [
    unitStruct('0:1', 'MyApp', ['0:2']),
    implItem('0:2', { trait: resolved('App', '1:1'), for: pathType('MyApp', '0:1'), items: ['0:3'] }),
    assocType('0:3', slot, target),
  ];
}

describe('buildPublicApi', () => {
  test('lists the data-facing items reachable from the roots, sorted', () => {
    const api = buildPublicApi(new GraphIndex(appGraph()), { roots: DEFAULT_ROOTS, followTypeReferences: true });
    expect(publicApiToString(api)).toBe(APP_API_LISTING.map((l) => `${l}\n`).join(''));
    expect(api.missingItemIds).toEqual(['0:99']);
  });

  test('does not follow field types by default', () => {
    const api = buildPublicApi(new GraphIndex(appGraph()), { roots: DEFAULT_ROOTS });
    expect(api.items.map((i) => i.signature)).toEqual(APP_API_LISTING.filter((l) => !l.startsWith('type ')));
    expect(api.missingItemIds).toEqual([]);
  });

  test('seeds are ordered by root spec and slot', () => {
    const api = buildPublicApi(new GraphIndex(appGraph()), { roots: DEFAULT_ROOTS });
    expect(api.seeds).toEqual([
      { marker: 'App', slot: 'Event', typeId: '0:1', id: '0:10' },
      { marker: 'App', slot: 'ViewModel', typeId: '0:1', id: '0:20' },
      { marker: 'Effect', slot: 'Ffi', typeId: '0:41', id: '0:45' },
    ]);
  });

  test('is idempotent and independent of the index order of the graph', () => {
    const doc = appGraph();
    const reversed = { ...doc, index: Object.fromEntries(Object.entries(doc.index).reverse()) };
    const options = { roots: DEFAULT_ROOTS, followTypeReferences: true };

    const first = buildPublicApi(new GraphIndex(doc), options);
    const second = buildPublicApi(new GraphIndex(doc), options);
    const third = buildPublicApi(new GraphIndex(reversed), options);
    expect(second.items).toEqual(first.items);
    expect(third.items).toEqual(first.items);
  });

  test('sorts siblings by name regardless of declaration order', () => {
    const doc = graph([
      ...appRootedAt('Event', pathType('Letters', '0:10')),
      enumItem('0:10', 'Letters', ['0:11', '0:12']),
      unitVariant('0:11', 'B'),
      unitVariant('0:12', 'A'),
    ]);
    const api = buildPublicApi(new GraphIndex(doc), { roots: DEFAULT_ROOTS });
    expect(api.items.map((i) => i.path)).toEqual([['Letters'], ['Letters', 'A'], ['Letters', 'B']]);
  });

  test('keeps one item per path for an Id reached through several fields', () => {
    const doc = graph([
      ...appRootedAt('ViewModel', pathType('Model', '0:20')),
      plainStruct('0:20', 'Model', ['0:21', '0:22']),
      field('0:21', 'current', pathType('Level', '0:30')),
      field('0:22', 'previous', pathType('Level', '0:30')),
      typeAlias('0:30', 'Level', prim('u8')),
    ]);
    const api = buildPublicApi(new GraphIndex(doc), { roots: DEFAULT_ROOTS, followTypeReferences: true });

    expect(api.idToItems.get('0:30')?.map((i) => i.path)).toEqual([
      ['Model', 'current', 'Level'],
      ['Model', 'previous', 'Level'],
    ]);
    expect(publicApiToString(api)).toBe(
      [
        'struct Model',
        'field Model::current: Level',
        'type Model::current::Level: u8',
        'field Model::previous: Level',
        'type Model::previous::Level: u8',
        '',
      ].join('\n'),
    );
  });

  test('public items carry the portable type of fields', () => {
    const api = buildPublicApi(new GraphIndex(appGraph()), { roots: DEFAULT_ROOTS });
    const set0 = api.idToItems.get('0:13');
    expect(set0).toHaveLength(1);
    expect(set0?.[0]).toMatchObject({
      kind: 'struct_field',
      path: ['Event', 'Set', '0'],
      type: { kind: 'SPECIAL', special: { name: 'I64' } },
    });
    expect(api.idToItems.has('0:24')).toBe(false);
  });

  test('without roots the API is empty', () => {
    const api = buildPublicApi(new GraphIndex(appGraph()), { roots: [] });
    expect(api.items).toEqual([]);
    expect(api.seeds).toEqual([]);
  });
});
