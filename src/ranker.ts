import { EventEmitter } from 'events';
import type { ArtifactSlot } from './artifacts';
import { FEATURE_NAMES, featureVector, predictRelevance, trainRelevanceModel, type TrainOptions } from './classifier';
import { orderMatches, type SimilarityScorer } from './correlate';
import { errorMessage } from './errors';
import { logDebug, logError, logInfo, logWarning } from './logger';
import type {
  DegradedSignature, FailureSignature, FeedbackRecord, MatchResult, ModelArtifact, TrainingOutcome,
} from './types';

export type ModelSlot = ArtifactSlot<ModelArtifact | undefined>;

function compatible(model: ModelArtifact): boolean {
  return model.feature_names.length === FEATURE_NAMES.length &&
    model.feature_names.every((name, i) => name === FEATURE_NAMES[i]) &&
    model.weights.length === FEATURE_NAMES.length;
}

/**
 * Blends the similarity score with the trained relevance model.
 * Without a model the matches come back untouched, same array.
 */
export class FeedbackRanker {
  constructor(private readonly slot: ModelSlot, private readonly blend = 0.5) {}

  get model(): ModelArtifact | undefined {
    return this.slot.current();
  }

  rerank(signature: FailureSignature | DegradedSignature, matches: MatchResult[]): MatchResult[] {
    // one snapshot for the whole call
    const model = this.slot.current();
    if (!model || !matches.length) return matches;
    if (!compatible(model)) {
      logWarning('model features do not match this build, ranking left as is', { version: model.version });
      return matches;
    }
    const a = this.blend;
    const blended = matches.map(m => {
      const p = predictRelevance(model, featureVector(m));
      return {
        ...m,
        score: Math.min(1, Math.max(0, (1 - a) * m.score + a * p)),
        reason: `${m.reason} | Model relevance ${p.toFixed(2)}`,
      };
    });
    logDebug('matches reranked', { test: signature.test, model: model.version, matches: matches.length });
    return orderMatches(blended);
  }
}

export type CoordinatorOptions = {
  slot: ModelSlot;
  scorer: SimilarityScorer;
  /** every record accumulated so far, read when a training run starts */
  loadRecords: () => Promise<FeedbackRecord[]>;
  retrainEvery?: number;
  trainOptions?: TrainOptions;
};

/**
 * Counts accepted feedback and retrains out of band once enough has arrived.
 *
 * Events:
 * - `threshold-reached` (pending count)
 * - `model-published` (artifact, slot generation)
 * - `training-skipped` (outcome)
 * - `training-failed` (error)
 *
 * The ranking path never talks to this object; it only reads the slot.
 */
export class TrainingCoordinator extends EventEmitter {
  private pending = 0;
  private queue: Promise<void> = Promise.resolve();
  private readonly retrainEvery: number;

  constructor(private readonly options: CoordinatorOptions) {
    super();
    this.retrainEvery = options.retrainEvery ?? 20;
    this.on('threshold-reached', () => this.enqueue());
  }

  accept(record: FeedbackRecord): void {
    this.pending += 1;
    logDebug('feedback accepted', { issue: record.issue_id, pending: this.pending });
    if (this.pending >= this.retrainEvery) {
      const count = this.pending;
      this.pending = 0;
      this.emit('threshold-reached', count);
    }
  }

  get pendingCount() {
    return this.pending;
  }

  // resolves once every scheduled run has finished
  idle(): Promise<void> {
    return this.queue;
  }

  schedule(): Promise<void> {
    this.enqueue();
    return this.queue;
  }

  // runs never overlap; a failed run does not block the next one
  private enqueue(): void {
    this.queue = this.queue
      .then(async () => { await this.retrain(); })
      .catch(err => {
        logError('relevance model training failed', { error: errorMessage(err) });
        this.emit('training-failed', err);
      });
  }

  async retrain(): Promise<TrainingOutcome> {
    const records = await this.options.loadRecords();
    const outcome = trainRelevanceModel(this.options.scorer, records, this.options.trainOptions);
    if (outcome.kind === 'skipped') {
      logInfo('relevance model training skipped', { reason: outcome.reason, detail: outcome.detail });
      this.emit('training-skipped', outcome);
      return outcome;
    }
    const generation = this.options.slot.publish(outcome.artifact);
    this.emit('model-published', outcome.artifact, generation);
    return outcome;
  }
}
