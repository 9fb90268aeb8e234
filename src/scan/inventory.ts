import path from 'node:path';
import fs from 'node:fs/promises';
import { stableStringify } from '../ir/deterministicJson';
import { scanSymbolGraphs, type GraphScanOptions } from './graphScanner';

export type GraphInventoryEntry = {
  /** Path relative to the target directory (posix). */
  file: string;
  /** Library name as it appears in the file name. */
  library: string;
};

export type GraphInventory = {
  schema: 'graph-inventory-v1';
  targetDir: string;
  graphs: GraphInventoryEntry[];
};

export async function buildGraphInventory(opts: GraphScanOptions): Promise<GraphInventory> {
  const files = await scanSymbolGraphs(opts);
  return {
    schema: 'graph-inventory-v1',
    targetDir: path.resolve(opts.targetDir),
    graphs: files.map((file) => ({ file, library: path.posix.basename(file, '.json') })),
  };
}

export async function writeGraphInventoryFile(outFile: string, inv: GraphInventory): Promise<void> {
  const abs = path.resolve(outFile);
  await fs.mkdir(path.dirname(abs), { recursive: true });
  await fs.writeFile(abs, stableStringify(inv), 'utf8');
}
