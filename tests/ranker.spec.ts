import { test, expect } from '@playwright/test';
import { ArtifactSlot } from '../src/artifacts';
import { FEATURE_NAMES, trainRelevanceModel } from '../src/classifier';
import { SimilarityScorer } from '../src/correlate';
import { FeedbackRanker, TrainingCoordinator, type ModelSlot } from '../src/ranker';
import type { FeedbackRecord, MatchResult, ModelArtifact, TrainingOutcome } from '../src/types';
import { plainNormalizer, quietEngine, separableFeedback, signature } from './fixtures';

const scorer = new SimilarityScorer(plainNormalizer());
const now = new Date('2024-05-01T00:00:00.000Z');
const sig = signature('memory corruption in block allocator', ['memory', 'corruption', 'block', 'allocator']);

function match(issue_id: string, score: number, strong: boolean): MatchResult {
  const v = strong ? 1 : 0;
  return {
    issue_id,
    score,
    component_scores: { jaccard: v, cosine_tfidf: v, edit_distance: v, semantic: v },
    signals: { keyword_overlap: v, status_resolved: v, label_overlap: 0 },
    rank: 0,
    status: strong ? 'Resolved' : 'Open',
    matched_terms: [],
    reason: 'Shared terms: memory',
  };
}

const issues = [
  { id: 'MEM-7', summary: 'memory corruption in block allocator', description: '', status: 'Resolved', labels: ['memory'] },
  { id: 'UI-7', summary: 'rename label on settings page', description: 'allocator unrelated', status: 'Open', labels: [] },
];

function trainedModel(): ModelArtifact {
  const outcome = trainRelevanceModel(scorer, separableFeedback(), { now });
  if (outcome.kind !== 'trained') throw new Error(`training skipped: ${outcome.detail}`);
  return outcome.artifact;
}

test.describe('relevance training', () => {
  test('too few records are skipped', () => {
    const outcome = trainRelevanceModel(scorer, separableFeedback().slice(0, 3));
    expect(outcome).toEqual({
      kind: 'skipped',
      reason: 'insufficient-data',
      detail: 'need at least 20 usable feedback records, have 3',
    });
  });

  test('one-sided feedback is skipped', () => {
    const relevant = separableFeedback(20).filter(r => r.is_relevant);
    const outcome = trainRelevanceModel(scorer, relevant);
    expect(outcome.kind === 'skipped' && outcome.reason).toBe('single-class');
  });

  test('feedback that cannot be told apart underfits', () => {
    const records: FeedbackRecord[] = Array.from({ length: 20 }, (_, i) => ({
      signature_keywords: ['link', 'training'],
      issue_id: 'PCI-1',
      is_relevant: i % 2 === 0,
      timestamp: now.toISOString(),
      signature_text: 'link training timeout',
      issue_summary: 'PCIe link training flaky',
      issue_status: 'Open',
    }));
    const outcome = trainRelevanceModel(scorer, records);
    expect(outcome).toEqual({
      kind: 'skipped',
      reason: 'underfit',
      detail: 'cross-validated accuracy 0.500 is below 0.6',
    });
  });

  test('separable feedback trains a frozen, versioned model', () => {
    const artifact = trainedModel();
    expect(artifact.version).toBe('relevance-20240501T000000000Z');
    expect(artifact.trained_at).toBe('2024-05-01T00:00:00.000Z');
    expect(artifact.sample_count).toBe(24);
    expect(artifact.accuracy).toBeGreaterThanOrEqual(0.6);
    expect(artifact.feature_names).toEqual([...FEATURE_NAMES]);
    expect(artifact.weights.length).toBe(FEATURE_NAMES.length);
    expect(Object.isFrozen(artifact)).toBe(true);
    expect(Object.isFrozen(artifact.weights)).toBe(true);
  });

  test('training is deterministic', () => {
    expect(trainedModel()).toEqual(trainedModel());
  });

  test('records without a snapshot use the supplied issues', () => {
    const records = separableFeedback().map(({ issue_summary, issue_status, ...rest }) => rest);
    const issues = separableFeedback().map(r => ({
      id: r.issue_id,
      summary: r.issue_summary ?? '',
      description: '',
      comment_text: [],
      status: r.issue_status ?? 'Unknown',
      labels: [],
    }));
    expect(trainRelevanceModel(scorer, records).kind).toBe('skipped');
    expect(trainRelevanceModel(scorer, records, { issues, now })).toEqual({ kind: 'trained', artifact: trainedModel() });
  });
});

test.describe('FeedbackRanker', () => {
  test('without a model the matches come back untouched', () => {
    const ranker = new FeedbackRanker(new ArtifactSlot<ModelArtifact | undefined>(undefined));
    const matches = [match('A', 0.4, false)];
    expect(ranker.rerank(sig, matches)).toBe(matches);
  });

  test('an incompatible model is ignored', () => {
    const model = { ...trainedModel(), feature_names: ['jaccard'], weights: [1] };
    const ranker = new FeedbackRanker(new ArtifactSlot<ModelArtifact | undefined>(model));
    const matches = [match('A', 0.4, false)];
    expect(ranker.rerank(sig, matches)).toBe(matches);
  });

  test('blends model relevance into the order', () => {
    const ranker = new FeedbackRanker(new ArtifactSlot<ModelArtifact | undefined>(trainedModel()), 0.5);
    const input = [match('WEAK', 0.4, false), match('STRONG', 0.2, true)];
    const out = ranker.rerank(sig, input);
    expect(out).not.toBe(input);
    expect(out.map(m => m.issue_id)).toEqual(['STRONG', 'WEAK']);
    expect(out.map(m => m.rank)).toEqual([1, 2]);
    expect(out[0].reason).toMatch(/^Shared terms: memory \| Model relevance \d\.\d\d$/);
    for (const m of out) {
      expect(m.score).toBeGreaterThanOrEqual(0);
      expect(m.score).toBeLessThanOrEqual(1);
    }
    expect(input[0].rank).toBe(0);
  });

  test('blend 0 keeps similarity order', () => {
    const ranker = new FeedbackRanker(new ArtifactSlot<ModelArtifact | undefined>(trainedModel()), 0);
    const out = ranker.rerank(sig, [match('WEAK', 0.4, false), match('STRONG', 0.2, true)]);
    expect(out.map(m => m.issue_id)).toEqual(['WEAK', 'STRONG']);
    expect(out.map(m => m.score)).toEqual([0.4, 0.2]);
  });

  test('engine reranks through its model slot', async () => {
    const engine = await quietEngine();
    const matches = [match('WEAK', 0.4, false), match('STRONG', 0.2, true)];
    expect(engine.rerank(sig, matches)).toBe(matches);
    const outcome = engine.train(separableFeedback(), { now });
    if (outcome.kind !== 'trained') throw new Error('expected a trained model');
    expect(engine.publishModel(outcome.artifact)).toBe(1);
    expect(engine.model?.version).toBe('relevance-20240501T000000000Z');
    expect(engine.rerank(sig, matches)[0].issue_id).toBe('STRONG');
  });

  test('skipped training leaves rank and rerank identical', async () => {
    const engine = await quietEngine();
    const outcome = engine.train(separableFeedback().slice(0, 3));
    expect(outcome.kind === 'skipped' && outcome.reason).toBe('insufficient-data');
    expect(engine.model).toBeUndefined();

    const ranked = engine.rank(sig, issues);
    expect(ranked.matches.length).toBeGreaterThan(0);
    const reranked = engine.rerank(sig, ranked.matches);
    expect(reranked).toBe(ranked.matches);
    expect(reranked.map(m => [m.issue_id, m.score, m.rank])).toEqual(ranked.matches.map(m => [m.issue_id, m.score, m.rank]));
    expect(engine.match(sig, issues)).toEqual(ranked);
  });

  test('match trims after the model has blended its scores', async () => {
    const engine = await quietEngine({ TRIAGE_MIN_SCORE: '0' });
    const outcome = engine.train(separableFeedback(), { now });
    if (outcome.kind !== 'trained') throw new Error('expected a trained model');
    engine.publishModel(outcome.artifact);

    const all = engine.match(sig, issues);
    expect(all.matches.map(m => m.rank)).toEqual([1, 2]);
    for (const m of all.matches) expect(m.reason).toMatch(/ \| Model relevance \d\.\d\d$/);

    const cut = all.matches[0].score;
    const kept = engine.match(sig, issues, { minScore: cut });
    expect(kept.matches.map(m => m.issue_id)).toEqual([all.matches[0].issue_id]);
    expect(engine.match(sig, issues, { maxResults: 1 }).matches).toEqual([all.matches[0]]);
  });
});

test.describe('TrainingCoordinator', () => {
  const slotOf = (): ModelSlot => new ArtifactSlot<ModelArtifact | undefined>(undefined);

  test('retrains once enough feedback arrived', async () => {
    const slot = slotOf();
    const coordinator = new TrainingCoordinator({
      slot,
      scorer,
      loadRecords: async () => separableFeedback(),
      retrainEvery: 3,
      trainOptions: { now },
    });
    const thresholds: number[] = [];
    const published: number[] = [];
    coordinator.on('threshold-reached', (count: number) => thresholds.push(count));
    coordinator.on('model-published', (_artifact: ModelArtifact, generation: number) => published.push(generation));

    const [first] = separableFeedback(1);
    coordinator.accept(first);
    coordinator.accept(first);
    expect(coordinator.pendingCount).toBe(2);
    expect(slot.version).toBe(0);
    coordinator.accept(first);
    expect(coordinator.pendingCount).toBe(0);
    await coordinator.idle();

    expect(thresholds).toEqual([3]);
    expect(published).toEqual([1]);
    expect(slot.version).toBe(1);
    expect(slot.current()?.version).toBe('relevance-20240501T000000000Z');
  });

  test('engine coordinator follows the configured threshold', async () => {
    const engine = await quietEngine({ TRIAGE_RETRAIN_EVERY: '2' });
    const coordinator = engine.feedbackCoordinator(async () => separableFeedback(), { now });
    const [first] = separableFeedback(1);
    coordinator.accept(first);
    expect(engine.modelSlot.version).toBe(0);
    coordinator.accept(first);
    await coordinator.idle();
    expect(engine.modelSlot.version).toBe(1);
    expect(engine.rerank(sig, [match('WEAK', 0.4, false), match('STRONG', 0.2, true)])[0].issue_id).toBe('STRONG');
  });

  test('skipped runs leave the slot alone', async () => {
    const slot = slotOf();
    const coordinator = new TrainingCoordinator({ slot, scorer, loadRecords: async () => [] });
    const skipped: TrainingOutcome[] = [];
    coordinator.on('training-skipped', (outcome: TrainingOutcome) => skipped.push(outcome));
    await coordinator.schedule();
    expect(skipped.map(o => o.kind === 'skipped' && o.reason)).toEqual(['insufficient-data']);
    expect(slot.version).toBe(0);
  });

  test('a failed run is reported and does not block the next', async () => {
    const slot = slotOf();
    let calls = 0;
    const coordinator = new TrainingCoordinator({
      slot,
      scorer,
      loadRecords: async () => {
        calls += 1;
        if (calls === 1) throw new Error('feedback store offline');
        return separableFeedback();
      },
      trainOptions: { now },
    });
    const failures: string[] = [];
    coordinator.on('training-failed', (err: unknown) => failures.push(err instanceof Error ? err.message : String(err)));
    await coordinator.schedule();
    await coordinator.schedule();
    expect(failures).toEqual(['feedback store offline']);
    expect(slot.version).toBe(1);
  });
});
