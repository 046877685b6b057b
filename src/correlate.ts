import { WEIGHT_PRESETS, type ScoreWeights } from './config';
import { buildIssueText, candidateId, isResolved, toCandidateIssue } from './fields';
import { logDebug } from './logger';
import type { TextNormalizer, TokenSet } from './normalizer';
import { editSimilarity, jaccard, semanticOverlap, sharedTerms } from './similarity';
import type {
  CandidateIssue, ComponentScores, DegradedSignature, FailureSignature, MatchResult, RankOutcome, StructuralSignals,
} from './types';
import { TfIdf, type SparseVector } from './vectorizer';

export type ScoreQuery = {
  /** raw signature text, compared character-wise to issue summaries */
  text: string;
  keywords: string[];
  tokens: TokenSet;
};

export type RankOptions = {
  weights?: ScoreWeights;
  minScore?: number;
  maxResults?: number;
};

const SOLUTION_KEYWORDS = ['solution', 'fix', 'resolved', 'patch', 'workaround', 'applied'];
const FIXED_RESOLUTIONS = ['fixed', 'done', 'resolved'];
const SOLUTION_MAX_LENGTH = 200;
const MATCHED_TERMS_SHOWN = 10;

type IndexedIssue = { issue: CandidateIssue; tokens: TokenSet; vector: SparseVector };

/**
 * Normalized candidate set plus the TF-IDF statistics fitted on it.
 * Scores computed against one corpus are comparable with each other.
 */
export class IssueCorpus {
  private readonly tfidf = new TfIdf();
  private readonly indexed = new Map<string, IndexedIssue>();

  constructor(private readonly normalizer: TextNormalizer, issues: readonly CandidateIssue[]) {
    const tokenized = issues.map(issue => ({ issue, tokens: normalizer.normalize(buildIssueText(issue)) }));
    this.tfidf.fit(tokenized.map(t => t.tokens.frequencies));
    for (const { issue, tokens } of tokenized) {
      this.indexed.set(issue.id, { issue, tokens, vector: this.tfidf.vectorize(tokens.frequencies) });
    }
  }

  get size() {
    return this.indexed.size;
  }

  entry(issue: CandidateIssue): IndexedIssue {
    const known = this.indexed.get(issue.id);
    if (known && known.issue === issue) return known;
    // issues outside the corpus are vectorized against its statistics
    const tokens = this.normalizer.normalize(buildIssueText(issue));
    return { issue, tokens, vector: this.tfidf.vectorize(tokens.frequencies) };
  }

  vectorize(tokens: TokenSet): SparseVector {
    return this.tfidf.vectorize(tokens.frequencies);
  }

  cosine(a: SparseVector, b: SparseVector) {
    return this.tfidf.cosine(a, b);
  }
}

export function signatureText(signature: FailureSignature | DegradedSignature): string {
  return 'degraded' in signature ? signature.test : signature.matched_text;
}

/**
 * Scores candidate issues against a failure signature and orders them.
 * Pure: the same signature and candidates always give the same ranking.
 */
export class SimilarityScorer {
  constructor(
    private readonly normalizer: TextNormalizer,
    private readonly weights: ScoreWeights = WEIGHT_PRESETS.balanced,
  ) {}

  query(signature: FailureSignature | DegradedSignature): ScoreQuery {
    return this.textQuery(signatureText(signature), signature.keywords);
  }

  textQuery(text: string, keywords: readonly string[] = []): ScoreQuery {
    return { text, keywords: [...keywords], tokens: this.normalizer.normalize([text, ...keywords]) };
  }

  corpus(issues: readonly CandidateIssue[]): IssueCorpus {
    return new IssueCorpus(this.normalizer, issues);
  }

  // rank is 0 until the result is placed by rank()
  score(query: ScoreQuery, issue: CandidateIssue, corpus: IssueCorpus, weights: ScoreWeights = this.weights): MatchResult {
    const entry = corpus.entry(issue);
    const semantic = semanticOverlap(query.tokens, entry.tokens);
    const component_scores: ComponentScores = {
      jaccard: jaccard(query.tokens.direct, entry.tokens.direct),
      cosine_tfidf: corpus.cosine(corpus.vectorize(query.tokens), entry.vector),
      edit_distance: editSimilarity(query.text, issue.summary),
      semantic: semantic.score,
    };
    const signals = structuralSignals(query, issue);
    const exact = sharedTerms(query.tokens.direct, entry.tokens.direct);
    const matched_terms = [...new Set([...exact, ...semantic.terms])].sort().slice(0, MATCHED_TERMS_SHOWN);

    return {
      issue_id: issue.id,
      score: combine(component_scores, weights),
      component_scores,
      signals,
      rank: 0,
      status: issue.status,
      updated: issue.updated,
      matched_terms,
      reason: explain(component_scores, exact, semantic.terms, issue),
      solution_summary: extractSolution(issue),
      resolution: issue.resolution,
    };
  }

  rank(signature: FailureSignature | DegradedSignature, candidates: readonly unknown[], options: RankOptions = {}): RankOutcome {
    const issues: CandidateIssue[] = [];
    const skipped_ids: string[] = [];
    const seen = new Set<string>();
    for (const raw of candidates) {
      const issue = toCandidateIssue(raw);
      if (!issue || seen.has(issue.id)) {
        skipped_ids.push(issue ? issue.id : candidateId(raw));
        continue;
      }
      seen.add(issue.id);
      issues.push(issue);
    }
    if (skipped_ids.length) logDebug('skipped malformed candidates', { skipped: skipped_ids.length });

    const query = this.query(signature);
    const corpus = this.corpus(issues);
    const weights = options.weights ?? this.weights;
    const minScore = options.minScore ?? 0;

    const scored = issues
      .map(issue => this.score(query, issue, corpus, weights))
      .filter(m => m.score >= minScore);
    const matches = orderMatches(scored).slice(0, options.maxResults ?? scored.length);
    return { matches, skipped: skipped_ids.length, skipped_ids };
  }

  // keyword overlap and TF-IDF cosine of two short texts, 0..1
  compareText(a: string, b: string): number {
    const ta = this.normalizer.normalize(a);
    const tb = this.normalizer.normalize(b);
    const tfidf = new TfIdf().fit([ta.frequencies, tb.frequencies]);
    const cosine = tfidf.cosine(tfidf.vectorize(ta.frequencies), tfidf.vectorize(tb.frequencies));
    return Math.min(1, 0.6 * jaccard(ta.direct, tb.direct) + 0.4 * cosine);
  }

  /**
   * Groups matches whose issue summaries read alike. Each group starts at the
   * first unplaced match, so groups keep the order of `matches`. Matches whose
   * issue is not among `candidates` stay alone.
   */
  groupMatches(matches: readonly MatchResult[], candidates: readonly unknown[], threshold = 0.8): MatchResult[][] {
    const summaries = new Map<string, string>();
    for (const raw of candidates) {
      const issue = toCandidateIssue(raw);
      if (issue && !summaries.has(issue.id)) summaries.set(issue.id, issue.summary);
    }
    const groups: MatchResult[][] = [];
    const placed = new Set<number>();
    matches.forEach((first, i) => {
      if (placed.has(i)) return;
      placed.add(i);
      const group = [first];
      const summary = summaries.get(first.issue_id);
      if (summary !== undefined) {
        for (let j = i + 1; j < matches.length; j++) {
          const other = summaries.get(matches[j].issue_id);
          if (placed.has(j) || other === undefined) continue;
          if (this.compareText(summary, other) >= threshold) {
            group.push(matches[j]);
            placed.add(j);
          }
        }
      }
      groups.push(group);
    });
    return groups;
  }
}

// resolved or closed issues, or any with a resolution recorded
export function resolvedOnly(matches: readonly MatchResult[]): MatchResult[] {
  return matches.filter(m => {
    const resolution = (m.resolution || '').trim().toLowerCase();
    return isResolved(m.status) || (resolution !== '' && resolution !== 'unresolved');
  });
}

export function combine(scores: ComponentScores, weights: ScoreWeights): number {
  const total =
    weights.jaccard * scores.jaccard +
    weights.cosine_tfidf * scores.cosine_tfidf +
    weights.edit_distance * scores.edit_distance +
    weights.semantic * scores.semantic;
  return Math.min(1, Math.max(0, total));
}

/**
 * Score descending; equal scores put resolved/closed issues first,
 * then the more recently updated, then the lower id.
 */
export function compareMatches(a: MatchResult, b: MatchResult): number {
  if (a.score !== b.score) return b.score - a.score;
  const ra = isResolved(a.status) ? 1 : 0;
  const rb = isResolved(b.status) ? 1 : 0;
  if (ra !== rb) return rb - ra;
  const ta = timeOf(a.updated);
  const tb = timeOf(b.updated);
  if (ta !== tb) return tb - ta;
  return a.issue_id < b.issue_id ? -1 : a.issue_id > b.issue_id ? 1 : 0;
}

// new array, ranks 1..n
export function orderMatches(matches: readonly MatchResult[]): MatchResult[] {
  return [...matches].sort(compareMatches).map((m, i) => ({ ...m, rank: i + 1 }));
}

function timeOf(iso?: string): number {
  const t = iso ? Date.parse(iso) : NaN;
  return Number.isNaN(t) ? 0 : t;
}

function structuralSignals(query: ScoreQuery, issue: CandidateIssue): StructuralSignals {
  const haystack = `${issue.summary} ${issue.description}`.toLowerCase();
  const keywords = query.keywords.map(k => k.toLowerCase()).filter(Boolean);
  const keywordHits = keywords.filter(k => haystack.includes(k)).length;
  const labels = issue.labels.map(l => l.toLowerCase());
  const labelHits = labels.filter(l => keywords.includes(l) || query.tokens.terms.has(l)).length;
  return {
    keyword_overlap: keywords.length ? keywordHits / keywords.length : 0,
    status_resolved: isResolved(issue.status) ? 1 : 0,
    label_overlap: labels.length ? labelHits / labels.length : 0,
  };
}

function explain(scores: ComponentScores, exact: string[], synonyms: string[], issue: CandidateIssue): string {
  const reasons: string[] = [];
  if (exact.length) reasons.push(`Shared terms: ${exact.slice(0, 6).join(', ')}`);
  if (synonyms.length) reasons.push(`Related terms: ${synonyms.slice(0, 6).join(', ')}`);
  if (scores.edit_distance >= 0.5) reasons.push(`Summary similarity ${scores.edit_distance.toFixed(2)}`);
  if (isResolved(issue.status)) reasons.push(`Status ${issue.status}`);
  return reasons.length ? reasons.join(' | ') : 'No significant overlap';
}

function firstSolutionSentence(text: string): string | undefined {
  const lower = text.toLowerCase();
  for (const keyword of SOLUTION_KEYWORDS) {
    if (!lower.includes(keyword)) continue;
    const sentence = text.split(/[.!?]/).find(s => s.toLowerCase().includes(keyword));
    if (sentence && sentence.trim()) return sentence.trim().slice(0, SOLUTION_MAX_LENGTH);
  }
  return undefined;
}

/**
 * First sentence that mentions a fix. Comments are searched only for fixed
 * issues; the description is searched for any issue.
 */
export function extractSolution(issue: CandidateIssue): string | undefined {
  const resolution = (issue.resolution || '').toLowerCase();
  if (FIXED_RESOLUTIONS.includes(resolution) || isResolved(issue.status)) {
    for (const comment of issue.comment_text) {
      const found = firstSolutionSentence(comment);
      if (found) return found;
    }
  }
  return issue.description ? firstSolutionSentence(issue.description) : undefined;
}
