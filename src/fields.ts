// Centralized helpers to normalize fields across tracker and runner export variations
import { z } from 'zod';
import type { CandidateIssue, FailureRow } from './types';

export type AnyRec = Record<string, unknown>;

export const ID_KEYS = ['id', 'key', 'issue_id', 'issue_key'];
export const SUMMARY_KEYS = ['summary', 'title'];
export const DESCRIPTION_KEYS = ['description', 'body', 'details'];
export const STATUS_KEYS = ['status', 'state'];
export const RESOLUTION_KEYS = ['resolution'];
export const UPDATED_KEYS = ['updated', 'updated_at', 'resolved_at', 'created'];
export const LABEL_KEYS = ['labels', 'tags', 'components'];
export const COMMENT_KEYS = ['comment_text', 'comments'];

export const SUITE_KEYS = ['suite', 'suite_name', 'suiteId', 'module'];
export const TEST_KEYS = ['test', 'test_id', 'test_name', 'name'];
export const LOG_KEYS = ['log_path', 'log', 'log_file', 'logfile'];

const COMMENTS_USED = 3;

export const CandidateIssueSchema = z.object({
  id: z.string().trim().min(1),
  summary: z.string().trim().min(1),
  description: z.string(),
  comment_text: z.array(z.string()),
  status: z.string(),
  labels: z.array(z.string()),
  updated: z.string().optional(),
  resolution: z.string().optional(),
});

export function isRecord(value: unknown): value is AnyRec {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function pickFirst(rec: AnyRec, keys: string[]): string | undefined {
  for (const k of keys) {
    const v = rec[k];
    if (typeof v === 'string' && v.trim()) return v.trim();
    if (typeof v === 'number' && Number.isFinite(v)) return String(v);
  }
  return undefined;
}

// arrays of strings, arrays of {body}, or one delimited string
export function pickList(rec: AnyRec, keys: string[], separator: RegExp = /[,;]/): string[] | undefined {
  for (const k of keys) {
    const v = rec[k];
    if (Array.isArray(v)) {
      return v
        .map(item => (typeof item === 'string' ? item : isRecord(item) && typeof item.body === 'string' ? item.body : ''))
        .map(s => s.trim())
        .filter(Boolean);
    }
    if (typeof v === 'string' && v.trim()) {
      return v.split(separator).map(s => s.trim()).filter(Boolean);
    }
  }
  return undefined;
}

/**
 * Coerces a loosely shaped tracker record into a CandidateIssue.
 * Returns undefined when the id or summary is missing.
 */
export function toCandidateIssue(rec: unknown): CandidateIssue | undefined {
  if (!isRecord(rec)) return undefined;
  const parsed = CandidateIssueSchema.safeParse({
    id: pickFirst(rec, ID_KEYS),
    summary: pickFirst(rec, SUMMARY_KEYS),
    description: pickFirst(rec, DESCRIPTION_KEYS) || '',
    comment_text: pickList(rec, COMMENT_KEYS, /\n{2,}/) || [],
    status: pickFirst(rec, STATUS_KEYS) || 'Unknown',
    labels: pickList(rec, LABEL_KEYS) || [],
    updated: pickFirst(rec, UPDATED_KEYS),
    resolution: pickFirst(rec, RESOLUTION_KEYS),
  });
  return parsed.success ? parsed.data : undefined;
}

export function candidateId(rec: unknown): string {
  return (isRecord(rec) && pickFirst(rec, ID_KEYS)) || '(no id)';
}

export function isResolved(status: string | undefined): boolean {
  const s = (status || '').trim().toLowerCase();
  return s === 'resolved' || s === 'closed' || s === 'done' || s === 'fixed';
}

// searchable text of an issue; the summary counts twice
export function buildIssueText(issue: CandidateIssue): string {
  return [
    issue.summary,
    issue.summary,
    issue.description,
    issue.labels.join(' '),
    ...issue.comment_text.slice(0, COMMENTS_USED),
  ].filter(Boolean).join('\n');
}

export function toFailureRow(rec: unknown): FailureRow | undefined {
  if (!isRecord(rec)) return undefined;
  const test = pickFirst(rec, TEST_KEYS);
  if (!test) return undefined;
  return {
    suite: pickFirst(rec, SUITE_KEYS),
    test,
    log_path: pickFirst(rec, LOG_KEYS),
  };
}
