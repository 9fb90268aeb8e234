import { generateIrFromGraph } from '../generateIrFromGraph';
import { resolveConfig } from '../../config/loadConfig';
import { appGraph } from '../../__tests__/fixtures/appGraph';
import { graph, moduleItem } from '../../__tests__/fixtures/graphBuilder';

describe('generateIrFromGraph', () => {
  test('reports missing items with their summary path', () => {
    const { report, missingCount } = generateIrFromGraph({ document: appGraph(), graphFile: 'shared.json', trackFindings: true });

    expect(missingCount).toBe(1);
    expect(report?.library).toBe('shared');
    expect(report?.seeds).toBe(3);
    expect(report?.publicItems).toBe(14);
    expect(report?.findings.filter((f) => f.kind === 'missingItem')).toEqual([
      {
        kind: 'missingItem',
        severity: 'warning',
        message: 'app_core::render::RenderOperation is not part of the graph',
        location: { path: 'app_core::render::RenderOperation', id: '0:99' },
      },
    ]);
  });

  test('does not build a report unless asked', () => {
    const { report, model } = generateIrFromGraph({ document: appGraph() });
    expect(report).toBeUndefined();
    expect(model.library).toBe('shared');
  });

  test('honours the configured roots', () => {
    const config = resolveConfig({ roots: [{ marker: 'Effect', slots: ['Ffi'] }] });
    const { api } = generateIrFromGraph({ document: appGraph(), config });
    expect(api.seeds.map((s) => s.id)).toEqual(['0:45']);
  });

  test('notes a graph without roots', () => {
    const { report } = generateIrFromGraph({ document: graph([moduleItem('0:0', 'empty', [])]), trackFindings: true });
    expect(report?.findings).toEqual([
      { kind: 'note', severity: 'warning', message: 'No root types found (markers: App, Effect)' },
    ]);
  });
});
