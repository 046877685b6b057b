import stopwordData from '../data/stopwords.json';

export const STOPWORDS: ReadonlySet<string> = new Set(stopwordData.stopwords);

const TEST_PREFIXES = ['test_', 'tc_', 'testcase_'];

// search keywords from a signature line, in order of first appearance
export function extractKeywords(text: string, max = 10): string[] {
  if (!text) return [];
  const words = text.toLowerCase().match(/\b[a-z0-9_]+\b/g) || [];
  const out: string[] = [];
  const seen = new Set<string>();
  for (const w of words) {
    if (seen.has(w) || w.length <= 2 || STOPWORDS.has(w)) continue;
    // short numbers carry nothing; longer ones may be error codes
    if (/^\d+$/.test(w) && w.length < 3) continue;
    seen.add(w);
    out.push(w);
    if (out.length >= max) break;
  }
  return out;
}

/**
 * test_memory_allocation -> ['memory', 'allocation']
 * dmaTransferBasic       -> ['dma', 'transfer', 'basic']
 */
export function keywordsFromTestName(testName: string): string[] {
  if (!testName) return [];
  let name = testName.replace(/([a-z0-9])([A-Z])/g, '$1_$2').toLowerCase();
  for (const prefix of TEST_PREFIXES) {
    if (name.startsWith(prefix)) {
      name = name.slice(prefix.length);
      break;
    }
  }
  const out: string[] = [];
  for (const part of name.split(/[_\-.\s/]+/)) {
    const p = part.trim();
    if (p.length > 2 && !STOPWORDS.has(p) && !out.includes(p)) out.push(p);
  }
  return out;
}
