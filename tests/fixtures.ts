import fs from 'fs';
import path from 'path';
import { loadConfig } from '../src/config';
import { createTriageEngine } from '../src/engine';
import { TextNormalizer } from '../src/normalizer';
import type { FailureSignature, FeedbackRecord } from '../src/types';

// plain tokenization keeps expected terms exact
export const plainNormalizer = () => new TextNormalizer();

export const quietEngine = (env: Record<string, string> = {}) =>
  createTriageEngine({ config: loadConfig(env), stemmer: null });

export function signature(matched_text: string, keywords: string[], extra: Partial<FailureSignature> = {}): FailureSignature {
  return {
    suite: 'regress',
    test: 'test_case',
    line_number: 1,
    line_offset: 0,
    matched_text,
    error_level: 10,
    pattern_tag: 'builtin:segfault',
    lines_scanned: 1,
    keywords,
    context: [],
    ...extra,
  };
}

export async function writeFixture(file: string, content: string | string[]) {
  await fs.promises.mkdir(path.dirname(file), { recursive: true });
  await fs.promises.writeFile(file, Array.isArray(content) ? content.join('\n') + '\n' : content, 'utf-8');
  return file;
}

/**
 * Relevant records pair a signature with an issue that says the same thing;
 * irrelevant ones pair it with an unrelated UI issue.
 */
export function separableFeedback(pairs = 12): FeedbackRecord[] {
  const records: FeedbackRecord[] = [];
  for (let i = 0; i < pairs; i++) {
    const text = `memory corruption in block allocator ${100 + i}`;
    records.push({
      signature_keywords: ['memory', 'corruption', 'block', 'allocator'],
      issue_id: `MEM-${i}`,
      is_relevant: true,
      timestamp: '2024-05-01T00:00:00.000Z',
      signature_text: text,
      issue_summary: text,
      issue_status: 'Resolved',
    });
    records.push({
      signature_keywords: ['memory', 'corruption', 'block', 'allocator'],
      issue_id: `UI-${i}`,
      is_relevant: false,
      timestamp: '2024-05-01T00:00:00.000Z',
      signature_text: text,
      issue_summary: `rename label on settings page ${100 + i}`,
      issue_status: 'Open',
    });
  }
  return records;
}
