import type { IssueCorpus, SimilarityScorer } from './correlate';
import { toCandidateIssue } from './fields';
import { logDebug, logInfo } from './logger';
import type { CandidateIssue, FeedbackRecord, MatchResult, ModelArtifact, TrainingOutcome } from './types';

export const FEATURE_NAMES = [
  'jaccard',
  'cosine_tfidf',
  'edit_distance',
  'semantic',
  'keyword_overlap',
  'status_resolved',
  'label_overlap',
] as const;

export type TrainOptions = {
  minRecords?: number;
  folds?: number;
  minAccuracy?: number;
  epochs?: number;
  learningRate?: number;
  l2?: number;
  /** issues to fall back on for records that carry no issue snapshot */
  issues?: readonly CandidateIssue[];
  now?: Date;
};

type Sample = { x: number[]; y: number };

type Fitted = { weights: number[]; bias: number };

export function featureVector(m: Pick<MatchResult, 'component_scores' | 'signals'>): number[] {
  const c = m.component_scores;
  const s = m.signals;
  return [c.jaccard, c.cosine_tfidf, c.edit_distance, c.semantic, s.keyword_overlap, s.status_resolved, s.label_overlap];
}

function sigmoid(z: number) {
  return 1 / (1 + Math.exp(-z));
}

function dot(w: readonly number[], x: readonly number[]) {
  let sum = 0;
  for (let i = 0; i < w.length; i++) sum += w[i] * (x[i] || 0);
  return sum;
}

export function predictRelevance(model: Pick<ModelArtifact, 'weights' | 'bias'>, features: readonly number[]): number {
  return sigmoid(dot(model.weights, features) + model.bias);
}

// batch gradient descent from zero weights; same data, same model
function fit(samples: Sample[], epochs: number, lr: number, l2: number): Fitted {
  const d = FEATURE_NAMES.length;
  const weights = new Array<number>(d).fill(0);
  let bias = 0;
  const n = samples.length || 1;
  for (let epoch = 0; epoch < epochs; epoch++) {
    const grad = new Array<number>(d).fill(0);
    let gradBias = 0;
    for (const { x, y } of samples) {
      const err = sigmoid(dot(weights, x) + bias) - y;
      for (let j = 0; j < d; j++) grad[j] += err * x[j];
      gradBias += err;
    }
    for (let j = 0; j < d; j++) weights[j] -= lr * (grad[j] / n + l2 * weights[j]);
    bias -= lr * (gradBias / n);
  }
  return { weights, bias };
}

// k-fold by index modulo k, pooled over all held-out samples
function crossValidate(samples: Sample[], k: number, epochs: number, lr: number, l2: number): number {
  let correct = 0;
  for (let fold = 0; fold < k; fold++) {
    const train = samples.filter((_, i) => i % k !== fold);
    const held = samples.filter((_, i) => i % k === fold);
    const model = fit(train, epochs, lr, l2);
    for (const s of held) {
      const predicted = predictRelevance(model, s.x) >= 0.5 ? 1 : 0;
      if (predicted === s.y) correct++;
    }
  }
  return correct / samples.length;
}

function issueFromSnapshot(r: FeedbackRecord, fallback: ReadonlyMap<string, CandidateIssue>): CandidateIssue | undefined {
  if (!r.issue_summary) return fallback.get(r.issue_id);
  return toCandidateIssue({
    id: r.issue_id,
    summary: r.issue_summary,
    description: r.issue_description,
    status: r.issue_status,
    labels: r.issue_labels,
  });
}

/**
 * Rebuilds the ranking features for each feedback record: the record's signature
 * is scored against its issue with the same scorer the ranking path uses.
 */
export function buildSamples(
  scorer: SimilarityScorer,
  records: readonly FeedbackRecord[],
  issues: readonly CandidateIssue[] = [],
): Sample[] {
  const fallback = new Map(issues.map(i => [i.id, i] as const));
  const pairs: { record: FeedbackRecord; issue: CandidateIssue }[] = [];
  for (const record of records) {
    const issue = issueFromSnapshot(record, fallback);
    if (issue) pairs.push({ record, issue });
  }
  const byId = new Map(pairs.map(p => [p.issue.id, p.issue] as const));
  const corpus: IssueCorpus = scorer.corpus([...byId.values()]);

  return pairs.map(({ record, issue }) => {
    const text = record.signature_text || record.signature_keywords.join(' ');
    const query = scorer.textQuery(text, record.signature_keywords);
    return { x: featureVector(scorer.score(query, issue, corpus)), y: record.is_relevant ? 1 : 0 };
  });
}

export function trainRelevanceModel(
  scorer: SimilarityScorer,
  records: readonly FeedbackRecord[],
  options: TrainOptions = {},
): TrainingOutcome {
  const minRecords = options.minRecords ?? 20;
  const minAccuracy = options.minAccuracy ?? 0.6;
  const epochs = options.epochs ?? 500;
  const lr = options.learningRate ?? 0.5;
  const l2 = options.l2 ?? 0.01;

  const samples = buildSamples(scorer, records, options.issues);
  if (samples.length < minRecords) {
    return {
      kind: 'skipped',
      reason: 'insufficient-data',
      detail: `need at least ${minRecords} usable feedback records, have ${samples.length}`,
    };
  }
  const positives = samples.filter(s => s.y === 1).length;
  if (positives === 0 || positives === samples.length) {
    return {
      kind: 'skipped',
      reason: 'single-class',
      detail: `all ${samples.length} records are ${positives ? 'relevant' : 'irrelevant'}`,
    };
  }

  const k = Math.max(2, Math.min(options.folds ?? 5, samples.length));
  const accuracy = crossValidate(samples, k, epochs, lr, l2);
  logDebug('relevance model cross-validated', { folds: k, accuracy });
  if (accuracy < minAccuracy) {
    return {
      kind: 'skipped',
      reason: 'underfit',
      detail: `cross-validated accuracy ${accuracy.toFixed(3)} is below ${minAccuracy}`,
    };
  }

  const model = fit(samples, epochs, lr, l2);
  const trained_at = (options.now ?? new Date()).toISOString();
  const artifact: ModelArtifact = Object.freeze({
    version: `relevance-${trained_at.replace(/[-:.]/g, '')}`,
    trained_at,
    accuracy,
    sample_count: samples.length,
    feature_names: Object.freeze([...FEATURE_NAMES]),
    weights: Object.freeze(model.weights),
    bias: model.bias,
  });
  logInfo('relevance model trained', { version: artifact.version, accuracy, samples: samples.length });
  return { kind: 'trained', artifact };
}
