import { promises as fs } from 'node:fs';
import path from 'node:path';
import Ajv from 'ajv/dist/2020';
import type { ValidateFunction } from 'ajv';

import graphSchema from './schema/symbol-graph-v1.json';
import { SUPPORTED_FORMAT_VERSIONS, type SymbolGraphDocument } from './symbolGraph';

export class SymbolGraphError extends Error {
  constructor(message: string, readonly file?: string) {
    super(message);
    this.name = 'SymbolGraphError';
  }
}

const ajv = new Ajv({ allErrors: true, strict: false });
let validator: ValidateFunction<SymbolGraphDocument> | undefined;

function getValidator(): ValidateFunction<SymbolGraphDocument> {
  validator = validator ?? ajv.compile<SymbolGraphDocument>(graphSchema);
  return validator;
}

/**
 * Validate an already-parsed JSON value as a symbol graph document.
 * Throws SymbolGraphError when the shape or the format version is not supported.
 */
export function parseSymbolGraph(data: unknown, file?: string): SymbolGraphDocument {
  const validate = getValidator();
  if (!validate(data)) {
    const where = file ? ` (${file})` : '';
    const details = ajv.errorsText(validate.errors, { dataVar: 'graph' });
    throw new SymbolGraphError(`Invalid symbol graph document${where}: ${details}`, file);
  }
  if (!SUPPORTED_FORMAT_VERSIONS.includes(data.format_version)) {
    throw new SymbolGraphError(
      `Unsupported symbol graph format_version ${data.format_version} (supported: ${SUPPORTED_FORMAT_VERSIONS.join(', ')})`,
      file,
    );
  }
  return data;
}

/**
 * Read and validate a symbol graph document from disk.
 */
export async function loadSymbolGraph(file: string): Promise<SymbolGraphDocument> {
  let text: string;
  try {
    text = await fs.readFile(file, 'utf8');
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new SymbolGraphError(`Unable to read symbol graph: ${msg}`, file);
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new SymbolGraphError(`Symbol graph is not valid JSON: ${msg}`, file);
  }

  return parseSymbolGraph(data, file);
}

/**
 * Where the documentation build writes the symbol graph of a library target:
 * `<targetDir>/doc/<lib_name>.json`, with dashes in the library name normalized to underscores.
 */
export function symbolGraphPathFor(targetDir: string, libName: string): string {
  return path.join(targetDir, 'doc', `${normalizeLibName(libName)}.json`);
}

export function normalizeLibName(libName: string): string {
  return libName.replace(/-/g, '_');
}
