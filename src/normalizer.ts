import * as natural from 'natural';
import synonymData from '../data/synonyms.json';
import { errorMessage } from './errors';
import { STOPWORDS } from './keywords';
import { logWarning } from './logger';

export type Stemmer = { stem(word: string): string };

export type TokenSet = {
  /** everything used for comparison: direct terms plus synonym expansions */
  terms: ReadonlySet<string>;
  /** stems and technical tokens found in the text itself */
  direct: ReadonlySet<string>;
  /** terms present only through synonym expansion */
  expanded: ReadonlySet<string>;
  frequencies: ReadonlyMap<string, number>;
};

export type SynonymGroups = Record<string, readonly string[]>;

export const DEFAULT_SYNONYMS: SynonymGroups = synonymData.groups;

// kept verbatim, never stemmed
const TECHNICAL_PATTERNS = [
  /\b0x[0-9a-fA-F]+\b/g, // hex literals
  /\b[A-Za-z_][A-Za-z0-9_]*\([^()\s]*\)/g, // malloc(), free(ptr)
  /\b[A-Z][A-Z0-9]+\b/g, // acronyms
  /\b[A-Za-z][A-Za-z0-9]*(?:_[A-Za-z0-9]+)+\b/g, // snake_case identifiers
];

const MAX_STEM_PASSES = 10;

/**
 * Turns free text into a comparable token set. With no stemmer it still works,
 * as a plain lowercase-tokenize-and-strip pass.
 */
export class TextNormalizer {
  readonly mode: 'stemmed' | 'fallback';
  private readonly synonymIndex: ReadonlyMap<string, ReadonlySet<string>>;

  constructor(private readonly stemmer?: Stemmer, synonyms: SynonymGroups = DEFAULT_SYNONYMS) {
    this.mode = stemmer ? 'stemmed' : 'fallback';
    this.synonymIndex = this.buildSynonymIndex(synonyms);
  }

  normalize(input: string | Iterable<string>): TokenSet {
    const text = typeof input === 'string' ? input : [...input].join(' ');
    const frequencies = new Map<string, number>();
    const add = (term: string) => frequencies.set(term, (frequencies.get(term) || 0) + 1);

    for (const pattern of TECHNICAL_PATTERNS) {
      for (const m of text.matchAll(pattern)) add(m[0]);
    }
    for (const word of text.toLowerCase().split(/[^a-z0-9]+/)) {
      const term = this.term(word);
      if (term) add(term);
    }

    const direct = new Set(frequencies.keys());
    const expanded = new Set<string>();
    for (const term of direct) {
      for (const syn of this.synonymIndex.get(term) || []) {
        if (!direct.has(syn)) expanded.add(syn);
      }
    }
    return { terms: new Set([...direct, ...expanded]), direct, expanded, frequencies };
  }

  synonymsOf(term: string): string[] {
    return [...(this.synonymIndex.get(this.stem(term.toLowerCase())) || [])];
  }

  private term(word: string): string | undefined {
    if (word.length < 2 || STOPWORDS.has(word)) return undefined;
    if (/^\d+$/.test(word) && word.length < 3) return undefined;
    const stem = /\d/.test(word) ? word : this.stem(word);
    if (stem.length < 2 || STOPWORDS.has(stem)) return undefined;
    return stem;
  }

  // stems are iterated to a fixed point so normalizing a normalized set changes nothing
  private stem(word: string): string {
    if (!this.stemmer) return word;
    let current = word;
    try {
      for (let i = 0; i < MAX_STEM_PASSES; i++) {
        const next = this.stemmer.stem(current);
        if (!next || next === current) break;
        current = next;
      }
    } catch (err) {
      logWarning('stemmer failed, keeping word as is', { word, error: errorMessage(err) });
      return word;
    }
    return current;
  }

  // groups that share a stem are merged, so expansion is closed
  private buildSynonymIndex(groups: SynonymGroups): Map<string, ReadonlySet<string>> {
    const components: Set<string>[] = [];
    for (const [head, members] of Object.entries(groups)) {
      const group = new Set<string>();
      for (const w of [head, ...members]) {
        const t = this.term(w.toLowerCase());
        if (t) group.add(t);
      }
      const overlapping = components.filter(c => [...group].some(t => c.has(t)));
      const merged = new Set([...group, ...overlapping.flatMap(c => [...c])]);
      for (const c of overlapping) components.splice(components.indexOf(c), 1);
      components.push(merged);
    }
    const index = new Map<string, ReadonlySet<string>>();
    for (const c of components) {
      for (const t of c) index.set(t, c);
    }
    return index;
  }
}

export async function loadPorterStemmer(): Promise<Stemmer | undefined> {
  try {
    const stemmer: Stemmer | undefined = natural.PorterStemmer;
    if (!stemmer) throw new Error('natural exports no PorterStemmer');
    stemmer.stem('testing');
    return stemmer;
  } catch (err) {
    logWarning('Porter stemmer unavailable, using plain tokenization', { error: errorMessage(err) });
    return undefined;
  }
}

/**
 * `stemmer: null` forces the plain tokenizer; leaving it out loads the Porter stemmer.
 */
export async function createNormalizer(options: { stemmer?: Stemmer | null; synonyms?: SynonymGroups } = {}): Promise<TextNormalizer> {
  const stemmer = options.stemmer === null ? undefined : options.stemmer ?? await loadPorterStemmer();
  return new TextNormalizer(stemmer, options.synonyms);
}
