import fg from 'fast-glob';
import path from 'node:path';

export type GraphScanOptions = {
  /** Build output directory to search (e.g. `target`). */
  targetDir: string;
  /** Additional exclude globs (evaluated relative to targetDir). */
  excludeGlobs?: string[];
  /** Optional safety cap; if set, results are truncated deterministically after sorting. */
  maxFiles?: number;
};

const DEFAULT_EXCLUDES = ['**/node_modules/**', '**/.git/**', '**/incremental/**', '**/deps/**', '**/build/**'];

// The documentation build writes one `<lib_name>.json` per library into a `doc` folder.
const DEFAULT_INCLUDES = ['doc/*.json', '*/doc/*.json', '*/*/doc/*.json'];

function toPosix(p: string): string {
  return p.split(path.sep).join('/');
}

function compareStrings(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Deterministically discovers symbol graph documents under a build output directory.
 * Returns a stable, sorted list of relative paths (posix-style) from targetDir.
 */
export async function scanSymbolGraphs(opts: GraphScanOptions): Promise<string[]> {
  const targetDir = path.resolve(opts.targetDir);
  const matches = await fg(DEFAULT_INCLUDES, {
    cwd: targetDir,
    onlyFiles: true,
    unique: true,
    dot: false,
    followSymbolicLinks: false,
    ignore: [...DEFAULT_EXCLUDES, ...(opts.excludeGlobs ?? [])],
  });

  // fast-glob usually returns posix paths even on Windows, but normalize anyway
  const rel = matches.map((p) => toPosix(p));
  rel.sort(compareStrings);
  if (opts.maxFiles && opts.maxFiles > 0 && rel.length > opts.maxFiles) {
    return rel.slice(0, opts.maxFiles);
  }
  return rel;
}
