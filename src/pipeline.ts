import path from 'path';
import { signatureText } from './correlate';
import { renderDashboard } from './dashboard';
import { createTriageEngine, type TriageEngine } from './engine';
import { errorMessage, isTriageError } from './errors';
import { degradedOutcome } from './extractor';
import { toFailureRow } from './fields';
import { loadArtifact, readIssues, readJsonl, recordUnmatched, writeJsonl } from './io';
import { logInfo, logWarning } from './logger';
import { postSlack, type SlackOptions } from './slack';
import type { AnalysisOutcome, EnrichedRow, FailureRow } from './types';

export type TriageRunOptions = {
  /** JSON/JSONL rows with suite, test and log_path; log paths resolve against this file's directory */
  failuresPath: string;
  /** CSV, JSON or JSONL issue export */
  issuesPath?: string;
  outDir: string;
  engine?: TriageEngine;
  modelPath?: string;
  unmatchedPath?: string;
  templatesDir?: string;
  slack?: SlackOptions;
  now?: Date;
};

export type TriageSummary = {
  total: number;
  invalidRows: number;
  byOutcome: Record<AnalysisOutcome['kind'], number>;
  correlated: number;
  skippedCandidates: number;
  unmatchedRecorded: number;
  enrichedPath: string;
  reportPath: string;
  slackPosted: boolean;
  text: string;
};

type Triaged = { row: EnrichedRow; outcome: AnalysisOutcome; skipped: number };

async function triageOne(engine: TriageEngine, row: FailureRow, baseDir: string, issues: readonly unknown[]): Promise<Triaged> {
  const logPath = row.log_path ? path.resolve(baseDir, row.log_path) : undefined;
  let outcome: AnalysisOutcome;
  try {
    outcome = await engine.analyzeFile(logPath, { suite: row.suite, test: row.test });
  } catch (err) {
    if (isTriageError(err)) throw err;
    logWarning('log read failed, ranking by test name', { test: row.test, log: logPath, error: errorMessage(err) });
    outcome = degradedOutcome(row.test, row.suite, `log read failed: ${errorMessage(err)}`);
  }

  // a log without a classified line is still searched by its test name
  const signature = outcome.kind === 'not-found'
    ? degradedOutcome(outcome.test, outcome.suite, outcome.reason).signature
    : outcome.signature;
  const ranked = engine.match(signature, issues);
  const matches = ranked.matches;
  const top = matches[0];

  const found = outcome.kind === 'found' ? outcome.signature : undefined;
  return {
    outcome,
    skipped: ranked.skipped,
    row: {
      ...row,
      suite: row.suite ?? (signature.suite !== 'unknown' ? signature.suite : undefined),
      outcome: outcome.kind,
      signature: found ? signatureText(found) : undefined,
      error_level: found?.error_level,
      pattern_tag: found?.pattern_tag,
      tool_name: found?.tool_name ?? (outcome.kind === 'not-found' ? outcome.tool_name : undefined),
      keywords: signature.keywords,
      correlated_issue: top ? top.issue_id : null,
      correlation_score: top ? Number(top.score.toFixed(2)) : null,
      matches: matches.map(m => ({ issue_id: m.issue_id, score: Number(m.score.toFixed(4)), rank: m.rank, reason: m.reason })),
    },
  };
}

export function summaryText(summary: Pick<TriageSummary, 'total' | 'byOutcome' | 'correlated'>): string {
  const outcomes = Object.entries(summary.byOutcome).map(([k, v]) => `${k}:${v}`).join(', ');
  return `Triage summary: total ${summary.total} | ${outcomes} | correlated ${summary.correlated}`;
}

/**
 * Batch triage: analyze every failing test's log, rank the issue export against
 * it, then write enriched.jsonl, render the HTML report and post a summary.
 */
export async function runTriage(options: TriageRunOptions): Promise<TriageSummary> {
  const engine = options.engine ?? await createTriageEngine();
  if (options.modelPath) {
    const artifact = await loadArtifact(options.modelPath);
    if (artifact) engine.publishModel(artifact);
  }

  const raw = await readJsonl(options.failuresPath);
  const rows: FailureRow[] = [];
  for (const rec of raw) {
    const row = toFailureRow(rec);
    if (row) rows.push(row);
  }
  const invalidRows = raw.length - rows.length;
  if (invalidRows) logWarning('failure rows without a test name were skipped', { skipped: invalidRows });

  const issues = await readIssues(options.issuesPath);
  const baseDir = path.dirname(path.resolve(options.failuresPath));
  logInfo('triage started', { failures: rows.length, issues: issues.length });

  // one log open at a time
  const triaged: Triaged[] = [];
  for (const row of rows) {
    triaged.push(await triageOne(engine, row, baseDir, issues));
  }

  // appended one after another so records never interleave
  const unmatchedPath = options.unmatchedPath ?? path.join(options.outDir, 'unmatched_errors.jsonl');
  let unmatchedRecorded = 0;
  for (const { row, outcome } of triaged) {
    if (outcome.kind === 'unavailable') continue;
    const lines = outcome.unmatched_lines;
    if (await recordUnmatched(unmatchedPath, { test: row.test, suite: row.suite, lines, now: options.now })) unmatchedRecorded++;
  }

  const enriched = triaged.map(t => t.row);
  const enrichedPath = path.join(options.outDir, 'enriched.jsonl');
  await writeJsonl(enrichedPath, enriched);
  const reportPath = await renderDashboard(enriched, path.join(options.outDir, 'report'), {
    templatesDir: options.templatesDir,
    now: options.now,
  });

  const byOutcome: Record<AnalysisOutcome['kind'], number> = { found: 0, 'not-found': 0, unavailable: 0 };
  for (const r of enriched) byOutcome[r.outcome] += 1;
  const correlated = enriched.filter(r => r.correlated_issue).length;
  const text = summaryText({ total: enriched.length, byOutcome, correlated });
  const slackPosted = await postSlack(text, engine.config.slack, options.slack);

  logInfo('triage finished', { total: enriched.length, correlated });
  return {
    total: enriched.length,
    invalidRows,
    byOutcome,
    correlated,
    skippedCandidates: triaged.reduce((n, t) => n + t.skipped, 0),
    unmatchedRecorded,
    enrichedPath,
    reportPath,
    slackPosted,
    text,
  };
}
