import { promises as fs } from 'node:fs';
import Ajv from 'ajv/dist/2020';

import type { RootSpec } from '../extract/roots/findRoots';
import configSchema from './schema/config-schema.json';

export type ExtractConfig = {
  /** Marker traits whose associated types name the root types of the API. */
  roots: RootSpec[];
  /** Extract types that are only reachable through field, alias and constant types. */
  followTypeReferences: boolean;
  /** Variants carrying this attribute are left out of the portable model. */
  skipAttribute: string;
};

/** Shape of the file on disk: every key is optional. */
export type ExtractConfigFile = Partial<ExtractConfig>;

export class ConfigError extends Error {
  constructor(message: string, readonly file?: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export const DEFAULT_CONFIG: Readonly<ExtractConfig> = Object.freeze({
  roots: [
    { marker: 'App', slots: ['Event', 'ViewModel'] },
    { marker: 'Effect', slots: ['Ffi'] },
  ],
  followTypeReferences: true,
  skipAttribute: '#[serde(skip)]',
});

const ajv = new Ajv({ allErrors: true, strict: false });
const validateConfig = ajv.compile<ExtractConfigFile>(configSchema);

export function resolveConfig(file: ExtractConfigFile = {}): ExtractConfig {
  return {
    roots: (file.roots ?? DEFAULT_CONFIG.roots).map((r) => ({ marker: r.marker, slots: [...r.slots] })),
    followTypeReferences: file.followTypeReferences ?? DEFAULT_CONFIG.followTypeReferences,
    skipAttribute: file.skipAttribute ?? DEFAULT_CONFIG.skipAttribute,
  };
}

export function parseConfig(data: unknown, file?: string): ExtractConfig {
  if (!validateConfig(data)) {
    const where = file ? ` (${file})` : '';
    throw new ConfigError(`Invalid configuration${where}: ${ajv.errorsText(validateConfig.errors, { dataVar: 'config' })}`, file);
  }
  return resolveConfig(data);
}

/** Load a configuration file and merge it over the defaults. Without a path, the defaults are returned. */
export async function loadConfig(file?: string): Promise<ExtractConfig> {
  if (!file) return resolveConfig();

  let text: string;
  try {
    text = await fs.readFile(file, 'utf8');
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new ConfigError(`Unable to read configuration: ${msg}`, file);
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new ConfigError(`Configuration is not valid JSON: ${msg}`, file);
  }
  return parseConfig(data, file);
}
