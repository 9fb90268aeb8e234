import type { SymbolGraphDocument } from '../../graph/symbolGraph';
import {
  assocType,
  constant,
  enumItem,
  field,
  graph,
  implItem,
  item,
  moduleItem,
  pathType,
  plainStruct,
  prim,
  resolved,
  structVariant,
  tupleVariant,
  typeAlias,
  unitStruct,
  unitVariant,
} from './graphBuilder';

/**
 * A small application library:
 *
 * ```
 * impl App for Counter { type Event = Event; type ViewModel = ViewModel; type Capabilities = Caps; }
 * impl Effect for Effect { type Ffi = EffectFfi; }
 * ```
 *
 * `Event` carries a derived and an auto-trait impl, `ViewModel` an inherent and a blanket impl.
 * `RenderOperation` (0:99) is referenced but not part of the graph.
 */
export function appGraph(): SymbolGraphDocument {
  return graph(
    [
      moduleItem('0:0', 'shared', ['0:1', '0:10', '0:20', '0:30', '0:41', '0:45']),

      unitStruct('0:1', 'Counter', ['0:2']),
      implItem('0:2', {
        trait: resolved('app_core::App', '1:1'),
        for: pathType('Counter', '0:1'),
        items: ['0:3', '0:4', '0:5'],
      }),
      assocType('0:3', 'Event', pathType('Event', '0:10')),
      assocType('0:4', 'ViewModel', pathType('ViewModel', '0:20')),
      assocType('0:5', 'Capabilities', pathType('Caps', '0:98')),

      enumItem('0:10', 'Event', ['0:11', '0:12', '0:14', '0:16'], ['0:17', '0:18']),
      unitVariant('0:11', 'Increment'),
      tupleVariant('0:12', 'Set', ['0:13']),
      field('0:13', '0', prim('i64')),
      structVariant('0:14', 'Rename', ['0:15']),
      field('0:15', 'name', prim('String')),
      unitVariant('0:16', 'Internal', ['#[serde(skip)]']),
      implItem('0:17', {
        trait: resolved('Serialize', '2:1'),
        for: pathType('Event', '0:10'),
        attrs: ['#[automatically_derived]'],
      }),
      implItem('0:18', { trait: resolved('Send', '3:1'), for: pathType('Event', '0:10'), synthetic: true }),

      plainStruct('0:20', 'ViewModel', ['0:21', '0:22'], ['0:23', '0:26'], {
        docs: 'The view model.\nRendered by the shell.',
      }),
      field('0:21', 'count', pathType('Count', '0:30')),
      field('0:22', 'label', prim('String'), ['#[serde(default)]']),
      implItem('0:23', { for: pathType('ViewModel', '0:20'), items: ['0:24'] }),
      item('0:24', 'new', { kind: 'function' }),
      implItem('0:26', {
        trait: resolved('From', '3:2'),
        for: { kind: 'generic', name: 'T' },
        items: ['0:27'],
        blanket: { kind: 'generic', name: 'T' },
      }),
      constant('0:27', 'LEAKED', prim('u8')),

      typeAlias('0:30', 'Count', prim('u32')),

      enumItem('0:41', 'Effect', ['0:42'], ['0:43']),
      unitVariant('0:42', 'Render'),
      implItem('0:43', {
        trait: resolved('Effect', '1:2'),
        for: pathType('Effect', '0:41'),
        items: ['0:44'],
      }),
      assocType('0:44', 'Ffi', pathType('EffectFfi', '0:45')),

      enumItem('0:45', 'EffectFfi', ['0:46'], [], { attrs: ['#[serde(tag = "type", content = "value")]'] }),
      tupleVariant('0:46', 'Render', ['0:47']),
      field('0:47', '0', pathType('RenderOperation', '0:99')),
    ],
    {
      paths: {
        '0:10': ['shared', 'Event'],
        '0:20': ['shared', 'ViewModel'],
        '0:30': ['shared', 'Count'],
        '0:99': ['app_core', 'render', 'RenderOperation'],
      },
    },
  );
}

/** Signatures of appGraph() with type references followed, in public API order. */
export const APP_API_LISTING = [
  'enum EffectFfi',
  'variant EffectFfi::Render(RenderOperation)',
  'field EffectFfi::Render::0: RenderOperation',
  'enum Event',
  'variant Event::Increment',
  'variant Event::Internal',
  'variant Event::Rename',
  'field Event::Rename::name: String',
  'variant Event::Set(i64)',
  'field Event::Set::0: i64',
  'struct ViewModel',
  'field ViewModel::count: Count',
  'type ViewModel::count::Count: u32',
  'field ViewModel::label: String',
];
