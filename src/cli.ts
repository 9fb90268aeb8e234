#!/usr/bin/env node

import fs from 'node:fs/promises';
import path from 'node:path';
import { Command } from 'commander';
import { VERSION } from './version';
import { loadConfig } from './config/loadConfig';
import { generateIrFromGraph } from './core/generateIrFromGraph';
import { publicApiToString } from './extract/publicApi';
import { loadSymbolGraph, symbolGraphPathFor } from './graph/loadSymbolGraph';
import { writeIrJsonFile } from './ir/writeIrJson';
import { writeReportFile } from './report/writeReport';
import { buildGraphInventory, writeGraphInventoryFile } from './scan/inventory';

function parseBoolish(v: unknown, defaultValue: boolean): boolean {
  if (v === undefined || v === null) return defaultValue;
  if (typeof v === 'boolean') return v;
  const s = String(v).trim().toLowerCase();
  if (s === '') return true; // presence of option with no value
  if (['1', 'true', 'yes', 'y', 'on'].includes(s)) return true;
  if (['0', 'false', 'no', 'n', 'off'].includes(s)) return false;
  return defaultValue;
}

function parseIntish(v: unknown): number | undefined {
  if (v === undefined || v === null || v === '') return undefined;
  const n = Number(v);
  if (!Number.isFinite(n)) return undefined;
  return Math.trunc(n);
}

function optString(v: unknown): string | undefined {
  if (typeof v !== 'string') return undefined;
  return v.trim() === '' ? undefined : v;
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export type CodegenOptions = {
  /** Symbol graph document to read. */
  graph?: string;
  /** Alternatively: build output directory and library name. */
  targetDir?: string;
  lib?: string;
  out: string;
  /** Optional plain listing of the public API. */
  api?: string;
  report?: string;
  config?: string;
  failOnMissing: boolean;
  verbose: boolean;
};

export function resolveGraphFile(opts: Pick<CodegenOptions, 'graph' | 'targetDir' | 'lib'>): string {
  if (opts.graph) return opts.graph;
  if (opts.targetDir && opts.lib) return symbolGraphPathFor(opts.targetDir, opts.lib);
  throw new Error('Missing input: pass --graph <file>, or --target-dir <dir> together with --lib <name>');
}

/**
 * Extract the portable model of one library. Returns the process exit code:
 * 0 on success, 2 on a fatal error, 3 when --fail-on-missing is set and Ids were missing.
 */
export async function runCodegen(opts: CodegenOptions): Promise<number> {
  try {
    const graphFile = resolveGraphFile(opts);
    const config = await loadConfig(opts.config);
    const document = await loadSymbolGraph(graphFile);

    const { api, model, report, missingCount } = generateIrFromGraph({
      document,
      graphFile,
      config,
      trackFindings: Boolean(opts.report),
    });

    await writeIrJsonFile(opts.out, model);
    if (opts.api) {
      await fs.mkdir(path.dirname(opts.api), { recursive: true });
      await fs.writeFile(opts.api, publicApiToString(api), 'utf8');
    }
    if (opts.report && report) await writeReportFile(opts.report, report);

    if (opts.verbose) {
      // eslint-disable-next-line no-console
      console.log(
        `Extracted ${api.items.length} public item(s) from ${api.seeds.length} root type(s): ` +
          `${model.structs.length} struct(s), ${model.enums.length} enum(s), ${model.aliases.length} alias(es). Wrote: ${opts.out}`,
      );
      for (const id of api.missingItemIds) {
        // eslint-disable-next-line no-console
        console.log(`Missing item: ${id}`);
      }
      if (opts.report) {
        // eslint-disable-next-line no-console
        console.log(`Wrote report: ${opts.report} (missing: ${missingCount})`);
      }
    }

    if (opts.failOnMissing && missingCount > 0) return 3;
    return 0;
  } catch (e) {
    // eslint-disable-next-line no-console
    console.error(errorMessage(e));
    return 2;
  }
}

export type ScanOptions = {
  dir: string;
  out: string;
  exclude: string[];
  maxFiles?: number;
  verbose: boolean;
};

export async function runScan(opts: ScanOptions): Promise<number> {
  const inv = await buildGraphInventory({ targetDir: opts.dir, excludeGlobs: opts.exclude, maxFiles: opts.maxFiles });
  await writeGraphInventoryFile(opts.out, inv);
  if (opts.verbose) {
    // eslint-disable-next-line no-console
    console.log(`Found ${inv.graphs.length} symbol graph(s). Wrote: ${opts.out}`);
  }
  return 0;
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('symbolgraph-to-ir')
    .description('Extract the data-facing public API of a library from its symbol graph into a portable model')
    .version(VERSION)
    // Keeps `scan --out` from being taken by the root command's own --out.
    .enablePositionalOptions()
    .option('--graph <file>', 'Symbol graph JSON document')
    .option('--target-dir <dir>', 'Build output directory containing doc/<lib>.json')
    .option('--lib <name>', 'Library name (with --target-dir)')
    .option('--out <file>', 'Output model JSON file path')
    .option('--api <file>', 'Optional plain-text public API listing')
    .option('--report <file>', 'Optional report path (.json or Markdown)')
    .option('--config <file>', 'Configuration file (roots, followTypeReferences, skipAttribute)')
    .option('--fail-on-missing [bool]', 'Exit with 3 if referenced items are missing from the graph (default false)', (v) => v, undefined)
    .option('-v, --verbose', 'Verbose logging', false);

  program
    .command('scan')
    .description('Find symbol graph documents under a build output directory and emit a deterministic inventory JSON.')
    .requiredOption('--dir <path>', 'Directory to scan')
    .requiredOption('--out <file>', 'Output JSON file')
    .option('--exclude <glob...>', 'Additional exclude glob(s).', [])
    .option('--max-files <n>', 'Safety cap (default no cap)', (v) => v, undefined)
    .option('-v, --verbose', 'Verbose logging', false)
    .action(async (raw: Record<string, unknown>) => {
      process.exitCode = await runScan({
        dir: String(raw.dir),
        out: String(raw.out),
        exclude: Array.isArray(raw.exclude) ? raw.exclude.map(String) : [],
        maxFiles: parseIntish(raw.maxFiles),
        verbose: Boolean(raw.verbose),
      });
    });

  program.action(async (raw: Record<string, unknown>) => {
    const out = optString(raw.out);
    if (!out) {
      // eslint-disable-next-line no-console
      console.error('Missing required option: --out <file>');
      process.exitCode = 2;
      return;
    }
    process.exitCode = await runCodegen({
      graph: optString(raw.graph),
      targetDir: optString(raw.targetDir),
      lib: optString(raw.lib),
      out,
      api: optString(raw.api),
      report: optString(raw.report),
      config: optString(raw.config),
      failOnMissing: parseBoolish(raw.failOnMissing, false),
      verbose: Boolean(raw.verbose),
    });
  });

  return program;
}

async function main(argv: string[]): Promise<number> {
  try {
    await buildProgram().parseAsync(argv);
    return Number(process.exitCode ?? 0);
  } catch (e) {
    // eslint-disable-next-line no-console
    console.error(errorMessage(e));
    return 2;
  }
}

// Run CLI only when executed directly (not when imported in tests)
if (require.main === module) {
  void main(process.argv).then((code) => {
    process.exitCode = code;
  });
}
