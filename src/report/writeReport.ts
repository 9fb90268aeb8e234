import fs from 'node:fs/promises';
import path from 'node:path';
import { type ExtractionReport, serializeReport } from './extractionReport';
import { reportToMarkdown } from './markdownReport';

export type ReportFormat = 'json' | 'md';

/** Infer the report format from the file extension (`.json`, anything else is markdown). */
export function reportFormatFor(outFile: string): ReportFormat {
  return path.extname(outFile).toLowerCase() === '.json' ? 'json' : 'md';
}

export async function writeReportFile(
  outFile: string,
  report: ExtractionReport,
  format: ReportFormat = reportFormatFor(outFile),
): Promise<void> {
  await fs.mkdir(path.dirname(outFile), { recursive: true });
  const content = format === 'json' ? serializeReport(report) : reportToMarkdown(report);
  await fs.writeFile(outFile, content, 'utf8');
}
