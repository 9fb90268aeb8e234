import { promises as fs } from 'node:fs';
import { dirname } from 'node:path';

import type { IrModel } from './irV1';
import { canonicalizeIrModel } from './canonicalizeIrModel';
import { stableStringify } from './deterministicJson';

export type WriteIrJsonOptions = {
  /** Pretty-print indentation (default 2). */
  space?: number;
};

/**
 * Write an IR model to disk in a deterministic form.
 */
export async function writeIrJsonFile(filePath: string, model: IrModel, options: WriteIrJsonOptions = {}): Promise<void> {
  const json = serializeIrJson(model, options);
  await fs.mkdir(dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, json, 'utf8');
}

/**
 * Serialize an IR model to a deterministic JSON string.
 */
export function serializeIrJson(model: IrModel, options: WriteIrJsonOptions = {}): string {
  return stableStringify(canonicalizeIrModel(model), options.space ?? 2);
}
