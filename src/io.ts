import fs from 'fs';
import path from 'path';
import { parse } from 'csv-parse';
import { z } from 'zod';
import { FEATURE_NAMES } from './classifier';
import { errorMessage } from './errors';
import { isRecord, type AnyRec } from './fields';
import { logDebug, logWarning } from './logger';
import type { FeedbackRecord, FeedbackStats, ModelArtifact } from './types';

const UNMATCHED_LINES_KEPT = 10;

export const FeedbackRecordSchema = z.object({
  signature_keywords: z.array(z.string()),
  issue_id: z.string().min(1),
  is_relevant: z.boolean(),
  timestamp: z.string().min(1),
  test_name: z.string().optional(),
  signature_text: z.string().optional(),
  issue_summary: z.string().optional(),
  issue_description: z.string().optional(),
  issue_status: z.string().optional(),
  issue_labels: z.array(z.string()).optional(),
});

export const ModelArtifactSchema = z.object({
  version: z.string().min(1),
  trained_at: z.string().min(1),
  accuracy: z.number().min(0).max(1),
  sample_count: z.number().int().nonnegative(),
  feature_names: z.array(z.string()),
  weights: z.array(z.number()),
  bias: z.number(),
});

const UnmatchedRecordSchema = z.object({
  timestamp: z.string(),
  test_name: z.string(),
  suite: z.string().optional(),
  error_lines: z.array(z.string()),
});

export type UnmatchedRecord = z.infer<typeof UnmatchedRecordSchema>;

/**
 * Tolerant reader for:
 *  - Proper JSONL (one object per line)
 *  - Multi-line pretty-printed objects
 *  - A single JSON array file
 *  - BOM, CRLF, trailing commas, comment lines (# or //)
 *
 * A missing or blank file reads as no records. Anything else that does not
 * parse throws a SyntaxError naming the file and line.
 */
export async function readJsonl(file: string): Promise<unknown[]> {
  if (!fs.existsSync(file)) return [];
  const raw = await fs.promises.readFile(file, 'utf-8');
  const content = raw.replace(/^\uFEFF/, '');
  const trimmed = content.trim();
  if (!trimmed) return [];

  if (trimmed.startsWith('[') && trimmed.endsWith(']')) {
    try {
      const arr: unknown = JSON.parse(stripTrailingComma(trimmed));
      if (Array.isArray(arr)) return arr;
    } catch (err) {
      logDebug('not a JSON array, reading as JSONL', { file, error: errorMessage(err) });
    }
  }

  // comment lines are blanked, not removed, so line numbers stay right
  const lines = content.split(/\r?\n/).map(ln => {
    const s = ln.trim();
    return s.startsWith('//') || s.startsWith('#') ? '' : ln;
  });

  const out: unknown[] = [];
  let buf = '';
  let depth = 0;
  let inStr = false;
  let esc = false;
  let startLine = 0;

  const fail = (line: number, snippet: string): never => {
    const context = snippet.slice(0, 160).replace(/\s+/g, ' ');
    throw new SyntaxError(`Invalid JSON near ${path.basename(file)} line ${line}. Context: ${context}`);
  };

  lines.forEach((text, index) => {
    const lineNo = index + 1;
    for (const ch of text) {
      if (depth === 0) {
        // between objects only separators are allowed
        if (ch === '{') {
          depth = 1;
          buf = ch;
          startLine = lineNo;
        } else if (!/[\s,[\]]/.test(ch)) {
          fail(lineNo, text);
        }
        continue;
      }
      buf += ch;
      if (inStr) {
        if (esc) esc = false;
        else if (ch === '\\') esc = true;
        else if (ch === '"') inStr = false;
        continue;
      }
      if (ch === '"') inStr = true;
      else if (ch === '{') depth++;
      else if (ch === '}') {
        depth--;
        if (depth === 0) {
          try {
            out.push(JSON.parse(stripTrailingComma(buf)));
          } catch {
            fail(startLine, buf);
          }
          buf = '';
        }
      }
    }
    if (depth > 0) buf += '\n';
  });

  if (depth > 0) fail(startLine, buf);
  return out;
}

function stripTrailingComma(s: string) {
  return s
    .replace(/,\s*}/g, '}')
    .replace(/,\s*]/g, ']')
    .trim();
}

export async function writeJsonl(file: string, rows: readonly unknown[]) {
  await fs.promises.mkdir(path.dirname(file), { recursive: true });
  const out = rows.map((r) => JSON.stringify(r)).join('\n') + (rows.length ? '\n' : '');
  await fs.promises.writeFile(file, out, 'utf-8');
}

export async function appendJsonl(file: string, row: unknown) {
  await fs.promises.mkdir(path.dirname(file), { recursive: true });
  await fs.promises.appendFile(file, JSON.stringify(row) + '\n', 'utf-8');
}

export async function readIssuesCsv(file?: string): Promise<AnyRec[]> {
  if (!file) return [];
  if (!fs.existsSync(file)) return [];
  const rows: AnyRec[] = [];
  return new Promise((resolve, reject) => {
    fs.createReadStream(file)
      .pipe(parse({ columns: true, trim: true, bom: true, skip_empty_lines: true }))
      .on('data', (r: unknown) => { if (isRecord(r)) rows.push(r); })
      .on('end', () => resolve(rows))
      .on('error', reject);
  });
}

// .csv through csv-parse, anything else as JSON/JSONL
export async function readIssues(file?: string): Promise<unknown[]> {
  if (!file) return [];
  return path.extname(file).toLowerCase() === '.csv' ? readIssuesCsv(file) : readJsonl(file);
}

export async function appendFeedback(file: string, record: FeedbackRecord): Promise<FeedbackRecord> {
  const valid = FeedbackRecordSchema.parse(record);
  await appendJsonl(file, valid);
  return valid;
}

// invalid lines are skipped with a warning
export async function loadFeedback(file: string): Promise<FeedbackRecord[]> {
  const rows = await readJsonl(file);
  const records: FeedbackRecord[] = [];
  rows.forEach((row, i) => {
    const parsed = FeedbackRecordSchema.safeParse(row);
    if (parsed.success) records.push(parsed.data);
    else logWarning('skipping invalid feedback record', { file, index: i, issues: parsed.error.issues.length });
  });
  return records;
}

export async function feedbackStats(file: string): Promise<FeedbackStats> {
  const records = await loadFeedback(file);
  const timestamps = records.map(r => r.timestamp).sort();
  const relevant = records.filter(r => r.is_relevant).length;
  return {
    total: records.length,
    relevant,
    irrelevant: records.length - relevant,
    first_timestamp: timestamps[0],
    last_timestamp: timestamps[timestamps.length - 1],
  };
}

export async function recordUnmatched(
  file: string,
  entry: { test: string; suite?: string; lines: readonly string[]; now?: Date },
): Promise<boolean> {
  if (!entry.lines.length) return false;
  const record: UnmatchedRecord = {
    timestamp: (entry.now ?? new Date()).toISOString(),
    test_name: entry.test,
    suite: entry.suite,
    error_lines: entry.lines.slice(0, UNMATCHED_LINES_KEPT),
  };
  await appendJsonl(file, record);
  return true;
}

export async function loadUnmatchedLines(file: string): Promise<string[]> {
  const rows = await readJsonl(file);
  const lines: string[] = [];
  for (const row of rows) {
    const parsed = UnmatchedRecordSchema.safeParse(row);
    if (parsed.success) lines.push(...parsed.data.error_lines);
    else logWarning('skipping invalid unmatched-line record', { file });
  }
  return lines;
}

export async function saveArtifact(file: string, artifact: ModelArtifact) {
  await fs.promises.mkdir(path.dirname(file), { recursive: true });
  await fs.promises.writeFile(file, JSON.stringify(artifact, null, 2) + '\n', 'utf-8');
}

/**
 * The stored model, or undefined when there is none or it cannot be used;
 * ranking then runs on similarity alone.
 */
export async function loadArtifact(file: string): Promise<ModelArtifact | undefined> {
  if (!fs.existsSync(file)) return undefined;
  let json: unknown;
  try {
    json = JSON.parse((await fs.promises.readFile(file, 'utf-8')).replace(/^\uFEFF/, ''));
  } catch (err) {
    logWarning('model artifact is not valid JSON, ignoring it', { file, error: errorMessage(err) });
    return undefined;
  }
  const parsed = ModelArtifactSchema.safeParse(json);
  if (!parsed.success) {
    logWarning('model artifact has an unexpected shape, ignoring it', { file });
    return undefined;
  }
  const a = parsed.data;
  if (a.weights.length !== FEATURE_NAMES.length) {
    logWarning('model artifact was trained on other features, ignoring it', { file, version: a.version });
    return undefined;
  }
  return Object.freeze({
    ...a,
    feature_names: Object.freeze(a.feature_names),
    weights: Object.freeze(a.weights),
  });
}
