import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { runCodegen, type CodegenOptions } from '../cli';
import { APP_API_LISTING, appGraph } from './fixtures/appGraph';
import { assocType, graph, implItem, item, moduleItem, pathType, resolved, unitStruct } from './fixtures/graphBuilder';

function writeFile(p: string, content: string) {
  fs.mkdirSync(path.dirname(p), { recursive: true });
  fs.writeFileSync(p, content, 'utf8');
}

function mkTmpDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'sg2ir-exit-'));
}

function options(overrides: Partial<CodegenOptions> & Pick<CodegenOptions, 'out'>): CodegenOptions {
  return { failOnMissing: false, verbose: false, ...overrides };
}

describe('CLI exit codes', () => {
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    errorSpy.mockRestore();
  });

  test('returns 0 and writes the model and the API listing', async () => {
    const dir = mkTmpDir();
    const graphFile = path.join(dir, 'shared.json');
    writeFile(graphFile, JSON.stringify(appGraph()));

    const out = path.join(dir, 'out', 'model.json');
    const api = path.join(dir, 'out', 'api.txt');
    const code = await runCodegen(options({ graph: graphFile, out, api }));

    expect(code).toBe(0);
    expect(JSON.parse(fs.readFileSync(out, 'utf8')).library).toBe('shared');
    expect(fs.readFileSync(api, 'utf8')).toBe(APP_API_LISTING.map((l) => `${l}\n`).join(''));
  });

  test('returns 3 when --fail-on-missing is set and items are missing (output is still written)', async () => {
    const dir = mkTmpDir();
    const graphFile = path.join(dir, 'shared.json');
    writeFile(graphFile, JSON.stringify(appGraph()));
    const out = path.join(dir, 'model.json');

    const code = await runCodegen(options({ graph: graphFile, out, failOnMissing: true }));
    expect(code).toBe(3);
    expect(fs.existsSync(out)).toBe(true);
  });

  test('returns 0 with --fail-on-missing when the configuration does not follow field types', async () => {
    const dir = mkTmpDir();
    const graphFile = path.join(dir, 'shared.json');
    writeFile(graphFile, JSON.stringify(appGraph()));
    const config = path.join(dir, 'config.json');
    writeFile(config, JSON.stringify({ followTypeReferences: false }));

    const code = await runCodegen(options({ graph: graphFile, out: path.join(dir, 'model.json'), config, failOnMissing: true }));
    expect(code).toBe(0);
  });

  test('resolves the graph from --target-dir and --lib', async () => {
    const dir = mkTmpDir();
    writeFile(path.join(dir, 'target', 'doc', 'my_shared.json'), JSON.stringify(appGraph()));
    const out = path.join(dir, 'model.json');

    const code = await runCodegen(options({ targetDir: path.join(dir, 'target'), lib: 'my-shared', out }));
    expect(code).toBe(0);
    expect(fs.existsSync(out)).toBe(true);
  });

  test('returns 2 on inaccessible fields and writes nothing', async () => {
    const dir = mkTmpDir();
    const graphFile = path.join(dir, 'lib.json');
    const doc = graph([
      moduleItem('0:0', 'lib', ['0:1']),
      unitStruct('0:1', 'MyApp', ['0:2']),
      implItem('0:2', { trait: resolved('App', '1:1'), for: pathType('MyApp', '0:1'), items: ['0:3'] }),
      assocType('0:3', 'ViewModel', pathType('Hidden', '0:4')),
      item('0:4', 'Hidden', { kind: 'struct', struct_kind: { kind: 'plain', fields: [], fields_stripped: true }, impls: [] }),
    ]);
    writeFile(graphFile, JSON.stringify(doc));
    const out = path.join(dir, 'model.json');

    const code = await runCodegen(options({ graph: graphFile, out }));
    expect(code).toBe(2);
    expect(fs.existsSync(out)).toBe(false);
    expect(errorSpy).toHaveBeenCalledWith(
      'The Hidden type has inaccessible fields. Make its fields public so that bindings can be generated for it.',
    );
  });

  test('returns 2 without an input graph', async () => {
    const dir = mkTmpDir();
    const code = await runCodegen(options({ out: path.join(dir, 'model.json') }));
    expect(code).toBe(2);
    expect(errorSpy).toHaveBeenCalledWith(
      'Missing input: pass --graph <file>, or --target-dir <dir> together with --lib <name>',
    );
  });

  test('returns 2 on an invalid document', async () => {
    const dir = mkTmpDir();
    const graphFile = path.join(dir, 'lib.json');
    writeFile(graphFile, JSON.stringify({ format_version: 1 }));
    const code = await runCodegen(options({ graph: graphFile, out: path.join(dir, 'model.json') }));
    expect(code).toBe(2);
  });
});
