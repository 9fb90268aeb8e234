import Ajv from 'ajv/dist/2020';

import { buildPublicApi } from '../../extract/publicApi';
import { GraphIndex } from '../../graph/graphIndex';
import { buildIrModel } from '../buildIrModel';
import irSchema from '../schema/ir-model-v1.json';
import { serializeIrJson } from '../writeIrJson';
import { appGraph } from '../../__tests__/fixtures/appGraph';

describe('IR schema compliance', () => {
  it('produces IR that validates against ir-model-v1.json', () => {
    const index = new GraphIndex(appGraph());
    const api = buildPublicApi(index, {
      roots: [
        { marker: 'App', slots: ['Event', 'ViewModel'] },
        { marker: 'Effect', slots: ['Ffi'] },
      ],
      followTypeReferences: true,
    });
    const model = buildIrModel(index, api, { skipAttribute: '#[serde(skip)]' });

    // Ensure what we serialize is also what we validate (no hidden transforms).
    const parsed: unknown = JSON.parse(serializeIrJson(model));

    const ajv = new Ajv({ allErrors: true, strict: false });
    const validate = ajv.compile(irSchema);
    const ok = validate(parsed);

    if (!ok) {
      // eslint-disable-next-line no-console
      console.error(validate.errors);
    }
    expect(ok).toBe(true);
  });

  it('rejects a model with an unknown type ref kind', () => {
    const ajv = new Ajv({ allErrors: true, strict: false });
    const validate = ajv.compile(irSchema);
    const model = {
      schemaVersion: '1.0',
      library: 'lib',
      structs: [],
      enums: [],
      aliases: [{ id: '0:1', name: 'A', qualifiedName: null, genericTypes: [], type: { kind: 'UNKNOWN' }, comments: [] }],
    };
    expect(validate(model)).toBe(false);
  });
});
