import type { LeveledRuleEntry } from './catalog';
import { logDebug } from './logger';
import type { Confidence, LearnedPatternCandidate } from './types';

export type DiscoverOptions = {
  /** shingle Jaccard a line needs to join a cluster */
  threshold?: number;
  minSupport?: number;
  maxSamples?: number;
  maxCandidates?: number;
};

const SHINGLE_SIZE = 3;
const NUMBER = /^\d+$/;
const HEX = /^0x[0-9a-fA-F]+$/;

// checked in order, first hit wins
const ERROR_TYPES: [string[], number, string][] = [
  [['fatal', 'critical', 'panic', 'abort'], 9, 'auto:fatal'],
  [['crash', 'segfault', 'sigsegv', 'coredump'], 8, 'auto:crash'],
  [['memory', 'malloc', 'alloc', 'heap', 'leak'], 7, 'auto:memory'],
  [['timeout', 'hang', 'deadlock', 'freeze'], 6, 'auto:timeout'],
  [['assert', 'assertion', 'invariant'], 6, 'auto:assertion'],
  [['null', 'nullptr', 'nil'], 5, 'auto:null_pointer'],
];

const CONFIDENCE_ORDER: Record<Confidence, number> = { LOW: 0, MEDIUM: 1, HIGH: 2 };

type Line = { text: string; tokens: string[]; shingles: Set<string> };

type Part = { regex: string; literal?: string };

export function tokenize(line: string): string[] {
  return line.trim().split(/\s+/).filter(Boolean);
}

export function shingles(tokens: string[], size = SHINGLE_SIZE): Set<string> {
  if (tokens.length <= size) return new Set([tokens.join(' ')]);
  const out = new Set<string>();
  for (let i = 0; i + size <= tokens.length; i++) out.add(tokens.slice(i, i + size).join(' '));
  return out;
}

function overlap(a: Set<string>, b: Set<string>): number {
  let shared = 0;
  for (const s of a) if (b.has(s)) shared++;
  return shared / (a.size + b.size - shared || 1);
}

export function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

// undefined when the column disagrees
function column(tokens: string[]): Part | undefined {
  if (tokens.every(t => NUMBER.test(t))) return { regex: '\\d+' };
  if (tokens.every(t => HEX.test(t))) return { regex: '0x[0-9a-fA-F]+' };
  if (tokens.every(t => t === tokens[0])) return { regex: escapeRegExp(tokens[0]), literal: tokens[0] };
  return undefined;
}

/**
 * Aligns the member lines token by token. Equal lengths give one part per
 * position; otherwise the common prefix and suffix surround a `.*`.
 */
export function generalize(lines: string[][]): Part[] {
  const lengths = new Set(lines.map(l => l.length));
  if (lengths.size === 1) {
    const [length] = lengths;
    const parts: Part[] = [];
    for (let i = 0; i < length; i++) {
      parts.push(column(lines.map(l => l[i])) ?? { regex: '\\S+' });
    }
    return parts;
  }

  const shortest = Math.min(...lengths);
  const prefix: Part[] = [];
  for (let i = 0; i < shortest; i++) {
    const part = column(lines.map(l => l[i]));
    if (!part) break;
    prefix.push(part);
  }
  const suffix: Part[] = [];
  for (let i = 1; i <= shortest - prefix.length; i++) {
    const part = column(lines.map(l => l[l.length - i]));
    if (!part) break;
    suffix.unshift(part);
  }
  return [...prefix, { regex: '.*' }, ...suffix];
}

// tokens are separated by \s+; the `.*` gap absorbs its own whitespace
export function toRegex(parts: Part[]): string {
  let out = '';
  parts.forEach((p, i) => {
    const prev = parts[i - 1];
    if (i > 0 && p.regex !== '.*' && prev.regex !== '.*') out += '\\s+';
    out += p.regex;
  });
  return out;
}

export function confidenceFor(support: number, anchorLength: number): Confidence {
  if (support >= 10 && anchorLength >= 15) return 'HIGH';
  if (support >= 5 && anchorLength >= 8) return 'MEDIUM';
  return 'LOW';
}

export function guessErrorType(text: string): { level: number; tag: string } {
  const lower = text.toLowerCase();
  for (const [words, level, tag] of ERROR_TYPES) {
    if (words.some(w => lower.includes(w))) return { level, tag };
  }
  return { level: 5, tag: 'auto:error' };
}

/**
 * Proposes catalog rules from lines no rule classified. Lines are clustered by
 * 3-token shingle overlap with each cluster's first line; clusters with enough
 * support become one generalized regex each. Proposals are advisory.
 */
export function discover(input: Iterable<string>, options: DiscoverOptions = {}): LearnedPatternCandidate[] {
  const threshold = options.threshold ?? 0.4;
  const minSupport = options.minSupport ?? 3;
  const maxSamples = options.maxSamples ?? 5;
  const maxCandidates = options.maxCandidates ?? 20;

  const clusters: { leader: Line; members: Line[] }[] = [];
  for (const raw of input) {
    const text = raw.trim();
    if (!text) continue;
    const tokens = tokenize(text);
    const line: Line = { text, tokens, shingles: shingles(tokens) };

    let target: (typeof clusters)[number] | undefined;
    let best = threshold;
    for (const c of clusters) {
      const s = overlap(line.shingles, c.leader.shingles);
      if (s >= best && (!target || s > best)) {
        target = c;
        best = s;
      }
    }
    if (target) target.members.push(line);
    else clusters.push({ leader: line, members: [line] });
  }

  const candidates: LearnedPatternCandidate[] = [];
  for (const { members } of clusters) {
    if (members.length < minSupport) continue;
    const parts = generalize(members.map(m => m.tokens));
    const literals = parts.map(p => p.literal).filter((l): l is string => Boolean(l));
    const anchor_length = literals.reduce((n, l) => n + l.length, 0);
    if (!anchor_length) continue;

    const regex_text = toRegex(parts);
    const compiled = new RegExp(regex_text);
    const covered = members.filter(m => compiled.test(m.text));
    if (covered.length < minSupport) continue;

    const { level, tag } = guessErrorType(literals.join(' '));
    candidates.push({
      regex_text,
      sample_lines: covered.slice(0, maxSamples).map(m => m.text),
      confidence: confidenceFor(covered.length, anchor_length),
      support_count: covered.length,
      anchor_length,
      suggested_level: level,
      suggested_tag: tag,
    });
  }

  candidates.sort((a, b) =>
    b.support_count - a.support_count ||
    b.anchor_length - a.anchor_length ||
    (a.regex_text < b.regex_text ? -1 : a.regex_text > b.regex_text ? 1 : 0));
  logDebug('pattern discovery finished', { clusters: clusters.length, candidates: candidates.length });
  return candidates.slice(0, maxCandidates);
}

/**
 * Catalog entries for the candidates at or above `minConfidence`, ready for
 * review and `promoteRules`. Tags are made unique.
 */
export function toCatalogEntries(
  candidates: readonly LearnedPatternCandidate[],
  minConfidence: Confidence = 'MEDIUM',
): LeveledRuleEntry[] {
  const used = new Map<string, number>();
  return candidates
    .filter(c => CONFIDENCE_ORDER[c.confidence] >= CONFIDENCE_ORDER[minConfidence])
    .map(c => {
      const n = (used.get(c.suggested_tag) || 0) + 1;
      used.set(c.suggested_tag, n);
      return {
        tag: n === 1 ? c.suggested_tag : `${c.suggested_tag}:${n}`,
        pattern: c.regex_text,
        level: c.suggested_level,
        description: `learned from ${c.support_count} lines (${c.confidence}), e.g. ${c.sample_lines[0] ?? ''}`.trim(),
      };
    });
}
