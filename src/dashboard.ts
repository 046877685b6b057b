import fs from 'fs';
import path from 'path';
import ejs from 'ejs';
import type { EnrichedRow } from './types';

export type DashboardOptions = {
  templatesDir?: string;
  now?: Date;
  title?: string;
};

// templates/ sits at the package root, one level above src/ and two above dist/src/
export function defaultTemplatesDir(): string {
  const candidates = [path.join(__dirname, '..', 'templates'), path.join(__dirname, '..', '..', 'templates')];
  return candidates.find(dir => fs.existsSync(path.join(dir, 'report.ejs'))) ?? candidates[0];
}

function countBy(rows: readonly EnrichedRow[], key: (r: EnrichedRow) => string | undefined) {
  const out: Record<string, number> = {};
  for (const r of rows) {
    const k = key(r) || 'Unknown';
    out[k] = (out[k] || 0) + 1;
  }
  return out;
}

export async function renderDashboard(rows: readonly EnrichedRow[], outDir = 'out/report', options: DashboardOptions = {}) {
  const templatesDir = options.templatesDir ?? defaultTemplatesDir();
  const tpl = await fs.promises.readFile(path.join(templatesDir, 'report.ejs'), 'utf-8');
  const html = ejs.render(tpl, {
    title: options.title ?? 'Failure triage report',
    generatedAt: (options.now ?? new Date()).toISOString(),
    total: rows.length,
    correlated: rows.filter(r => r.correlated_issue).length,
    byOutcome: countBy(rows, r => r.outcome),
    byPattern: countBy(rows.filter(r => r.pattern_tag), r => r.pattern_tag),
    byIssue: countBy(rows.filter(r => r.correlated_issue), r => r.correlated_issue ?? undefined),
    samples: rows,
  });

  await fs.promises.mkdir(outDir, { recursive: true });
  const outFile = path.join(outDir, 'triage_report.html');
  await fs.promises.writeFile(outFile, html, 'utf-8');
  await fs.promises.copyFile(path.join(templatesDir, 'report.css'), path.join(outDir, 'report.css'));
  return outFile;
}
