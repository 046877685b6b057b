import type { TokenSet } from './normalizer';

const EDIT_MAX_LENGTH = 200;

export function jaccard(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  if (!a.size || !b.size) return 0;
  let shared = 0;
  for (const t of a) if (b.has(t)) shared++;
  return shared / (a.size + b.size - shared);
}

export function levenshtein(a: string, b: string): number {
  if (a === b) return 0;
  if (!a.length) return b.length;
  if (!b.length) return a.length;
  let prev = Array.from({ length: b.length + 1 }, (_, j) => j);
  let curr = new Array<number>(b.length + 1).fill(0);
  for (let i = 1; i <= a.length; i++) {
    curr[0] = i;
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      curr[j] = Math.min(prev[j] + 1, curr[j - 1] + 1, prev[j - 1] + cost);
    }
    [prev, curr] = [curr, prev];
  }
  return prev[b.length];
}

/**
 * 1 - distance / longer length, on lowercased, whitespace-collapsed text
 * cut to 200 characters.
 */
export function editSimilarity(a: string, b: string): number {
  const x = collapse(a).slice(0, EDIT_MAX_LENGTH);
  const y = collapse(b).slice(0, EDIT_MAX_LENGTH);
  if (!x || !y) return 0;
  const longest = Math.max(x.length, y.length);
  return 1 - levenshtein(x, y) / longest;
}

// Overlap that exists only through synonym expansion, relative to all terms.
export function semanticOverlap(a: TokenSet, b: TokenSet): { score: number; terms: string[] } {
  const union = new Set([...a.terms, ...b.terms]);
  if (!union.size) return { score: 0, terms: [] };
  const terms: string[] = [];
  for (const t of a.terms) {
    if (b.terms.has(t) && !(a.direct.has(t) && b.direct.has(t))) terms.push(t);
  }
  return { score: terms.length / union.size, terms: terms.sort() };
}

export function sharedTerms(a: ReadonlySet<string>, b: ReadonlySet<string>): string[] {
  return [...a].filter(t => b.has(t)).sort();
}

function collapse(s: string) {
  return (s || '').toLowerCase().replace(/\s+/g, ' ').trim();
}
