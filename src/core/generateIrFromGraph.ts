import { resolveConfig, type ExtractConfig } from '../config/loadConfig';
import { buildPublicApi, type PublicApi } from '../extract/publicApi';
import { GraphIndex } from '../graph/graphIndex';
import type { SymbolGraphDocument } from '../graph/symbolGraph';
import { buildIrModel } from '../ir/buildIrModel';
import type { IrModel } from '../ir/irV1';
import { createEmptyReport, finalizeReport, type ExtractionReport } from '../report/extractionReport';
import { addFinding, incCount } from '../report/reportBuilder';
import { VERSION } from '../version';

export type SymbolGraphToIrOptions = {
  document: SymbolGraphDocument;
  /** Where the document came from; only used in the report. */
  graphFile?: string;
  /** Defaults to DEFAULT_CONFIG. */
  config?: ExtractConfig;
  /**
   * If true, the report will be generated (in-memory) even if you don't write it to disk.
   */
  trackFindings?: boolean;
};

export type SymbolGraphToIrResult = {
  api: PublicApi;
  model: IrModel;
  report?: ExtractionReport;
  missingCount: number;
};

/**
 * Core library entrypoint: extract the public API and the portable model from a loaded symbol graph.
 *
 * - Does not read or write files.
 * - Throws on fatal conditions (inaccessible fields, unknown primitives).
 */
export function generateIrFromGraph(opts: SymbolGraphToIrOptions): SymbolGraphToIrResult {
  const config = opts.config ?? resolveConfig();
  const graph = new GraphIndex(opts.document);

  const report = opts.trackFindings
    ? createEmptyReport({
        toolName: 'symbolgraph-to-ir',
        toolVersion: VERSION,
        graphFile: opts.graphFile ?? '',
        library: graph.peekItem(opts.document.root)?.name ?? '',
      })
    : undefined;

  const api = buildPublicApi(graph, {
    roots: config.roots,
    followTypeReferences: config.followTypeReferences,
  });

  if (report) {
    report.seeds = api.seeds.length;
    report.publicItems = api.items.length;
    for (const item of api.items) incCount(report.counts.itemsByKind, item.kind);

    if (api.seeds.length === 0) {
      addFinding(report, {
        kind: 'note',
        severity: 'warning',
        message: `No root types found (markers: ${config.roots.map((r) => r.marker).join(', ')})`,
      });
    }
    for (const id of api.missingItemIds) {
      const known = graph.summaryPath(id);
      addFinding(report, {
        kind: 'missingItem',
        severity: 'warning',
        message: known ? `${known.join('::')} is not part of the graph` : `Item ${id} is not part of the graph`,
        location: { path: known ? known.join('::') : '', id },
      });
    }
  }

  const model = buildIrModel(graph, api, { skipAttribute: config.skipAttribute, report });

  return {
    api,
    model,
    report: report ? finalizeReport(report) : undefined,
    missingCount: api.missingItemIds.length,
  };
}
