import { stableStringify } from '../ir/deterministicJson';

export type ReportSeverity = 'info' | 'warning' | 'error';

export type ReportLocation = {
  /** Rendered item path, e.g. `Event::Increment`. */
  path: string;
  /** Graph Id of the item. */
  id?: string;
};

export type ReportFindingKind =
  /** An Id referenced from the public API that is not in the graph. */
  | 'missingItem'
  /** A field, variant or alias whose type has no portable representation. */
  | 'unsupportedType'
  /** A variant left out of the model because it carries the skip attribute. */
  | 'skippedVariant'
  | 'note';

export type ReportFinding = {
  kind: ReportFindingKind;
  severity: ReportSeverity;
  message: string;
  location?: ReportLocation;
  tags?: Record<string, string>;
};

export type ExtractionReport = {
  schema: 'extraction-report-v1';
  tool: { name: string; version: string };
  /** The symbol graph document the report is about. */
  graphFile: string;
  library: string;
  startedAtIso: string;
  finishedAtIso: string;
  seeds: number;
  publicItems: number;
  counts: {
    itemsByKind: Record<string, number>;
    modelByKind: Record<string, number>;
  };
  findings: ReportFinding[];
};

export function createEmptyReport(args: {
  toolName: string;
  toolVersion: string;
  graphFile: string;
  library?: string;
  startedAtIso?: string;
}): ExtractionReport {
  const now = args.startedAtIso ?? new Date().toISOString();
  return {
    schema: 'extraction-report-v1',
    tool: { name: args.toolName, version: args.toolVersion },
    graphFile: args.graphFile,
    library: args.library ?? '',
    startedAtIso: now,
    finishedAtIso: now,
    seeds: 0,
    publicItems: 0,
    counts: { itemsByKind: {}, modelByKind: {} },
    findings: [],
  };
}

export function finalizeReport(report: ExtractionReport, finishedAtIso?: string): ExtractionReport {
  report.finishedAtIso = finishedAtIso ?? new Date().toISOString();
  return report;
}

export function serializeReport(report: ExtractionReport): string {
  // Keep it deterministic for tests and CI diffs.
  return stableStringify(report);
}
