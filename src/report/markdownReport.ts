import type { ExtractionReport, ReportFinding, ReportFindingKind } from './extractionReport';

function fmtLoc(f: ReportFinding): string {
  if (!f.location) return '';
  const { path, id } = f.location;
  return id ? `${path} (${id})` : path;
}

function escapeCell(s: string): string {
  return s.replace(/\|/g, '\\|');
}

function countByKind(findings: ReportFinding[]): Record<string, number> {
  const out: Record<string, number> = {};
  for (const f of findings) out[f.kind] = (out[f.kind] ?? 0) + 1;
  return out;
}

function topMessages(findings: ReportFinding[], kind: ReportFindingKind, limit = 20): Array<{ message: string; count: number }> {
  const m = new Map<string, number>();
  for (const f of findings) {
    if (f.kind !== kind) continue;
    m.set(f.message, (m.get(f.message) ?? 0) + 1);
  }
  const arr = Array.from(m.entries()).map(([message, count]) => ({ message, count }));
  arr.sort((a, b) => (b.count - a.count) || a.message.localeCompare(b.message));
  return arr.slice(0, limit);
}

function countsTable(lines: string[], title: string, counts: Record<string, number>): void {
  lines.push(`### ${title}`);
  lines.push('');
  lines.push(`| Kind | Count |`);
  lines.push(`|---|---:|`);
  const keys = Object.keys(counts).sort((a, b) => a.localeCompare(b));
  for (const k of keys) lines.push(`| ${k} | ${counts[k]} |`);
  if (keys.length === 0) lines.push(`| (none) | 0 |`);
  lines.push('');
}

export function reportToMarkdown(report: ExtractionReport): string {
  const lines: string[] = [];
  const problems = report.findings.filter((f) => f.kind === 'missingItem' || f.kind === 'unsupportedType');
  const byKind = countByKind(report.findings);

  lines.push(`# Extraction report`);
  lines.push('');
  lines.push(`- Tool: **${report.tool.name}** ${report.tool.version}`);
  lines.push(`- Symbol graph: \`${report.graphFile}\``);
  lines.push(`- Library: \`${report.library}\``);
  lines.push(`- Started: ${report.startedAtIso}`);
  lines.push(`- Finished: ${report.finishedAtIso}`);
  lines.push(`- Root types: **${report.seeds}**`);
  lines.push(`- Public items: **${report.publicItems}**`);
  lines.push(`- Findings: **${report.findings.length}** (missing or unsupported: **${problems.length}**)`);
  lines.push('');

  lines.push(`## Counts`);
  lines.push('');
  countsTable(lines, 'Public items by kind', report.counts.itemsByKind);
  countsTable(lines, 'Model entries by kind', report.counts.modelByKind);

  lines.push(`## Findings summary`);
  lines.push('');
  lines.push(`| Kind | Count |`);
  lines.push(`|---|---:|`);
  const fk = Object.keys(byKind).sort((a, b) => a.localeCompare(b));
  for (const k of fk) lines.push(`| ${k} | ${byKind[k]} |`);
  if (fk.length === 0) lines.push(`| (none) | 0 |`);
  lines.push('');

  if (problems.length > 0) {
    lines.push(`## Top missing and unsupported`);
    lines.push('');
    for (const kind of ['missingItem', 'unsupportedType'] as const) {
      const top = topMessages(problems, kind, 20);
      if (top.length === 0) continue;
      lines.push(`### ${kind}`);
      lines.push('');
      lines.push(`| Count | Message |`);
      lines.push(`|---:|---|`);
      for (const t of top) lines.push(`| ${t.count} | ${escapeCell(t.message)} |`);
      lines.push('');
    }
  }

  lines.push(`## All findings`);
  lines.push('');
  lines.push(`| Severity | Kind | Location | Message |`);
  lines.push(`|---|---|---|---|`);
  const all = [...report.findings];
  all.sort((a, b) => {
    const ak = a.kind.localeCompare(b.kind);
    if (ak !== 0) return ak;
    const al = fmtLoc(a).localeCompare(fmtLoc(b));
    if (al !== 0) return al;
    return a.message.localeCompare(b.message);
  });
  for (const f of all) {
    lines.push(`| ${f.severity} | ${f.kind} | ${escapeCell(fmtLoc(f))} | ${escapeCell(f.message)} |`);
  }
  if (all.length === 0) lines.push(`| (none) | (none) |  |  |`);
  lines.push('');
  return lines.join('\n');
}
