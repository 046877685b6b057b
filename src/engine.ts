import { ArtifactSlot } from './artifacts';
import { builtinCatalog, catalogFromFile, type PatternCatalog } from './catalog';
import { trainRelevanceModel, type TrainOptions } from './classifier';
import { loadConfig, type TriageConfig } from './config';
import { SimilarityScorer, type RankOptions } from './correlate';
import { analyzeLogFile, SignatureExtractor, type AnalyzeOptions, type LineSource } from './extractor';
import { discover, type DiscoverOptions } from './learner';
import { logInfo, setLogLevel } from './logger';
import { createNormalizer, type Stemmer, type TextNormalizer } from './normalizer';
import { FeedbackRanker, TrainingCoordinator, type ModelSlot } from './ranker';
import type {
  AnalysisOutcome, DegradedSignature, FailureSignature, FeedbackRecord, LearnedPatternCandidate, MatchResult,
  ModelArtifact, RankOutcome, TrainingOutcome,
} from './types';

export type EngineOptions = {
  config?: TriageConfig;
  catalog?: PatternCatalog;
  model?: ModelArtifact;
  /** `null` forces plain tokenization */
  stemmer?: Stemmer | null;
};

/**
 * Caller-facing surface. The catalog and the model each live in a slot; every
 * call takes one snapshot of what it reads, so publishing mid-batch is safe.
 */
export class TriageEngine {
  readonly catalogSlot: ArtifactSlot<PatternCatalog>;
  readonly modelSlot: ModelSlot;
  readonly scorer: SimilarityScorer;
  private readonly ranker: FeedbackRanker;

  constructor(
    readonly config: TriageConfig,
    readonly normalizer: TextNormalizer,
    catalog: PatternCatalog,
    model?: ModelArtifact,
  ) {
    this.catalogSlot = new ArtifactSlot(catalog);
    this.modelSlot = new ArtifactSlot<ModelArtifact | undefined>(model);
    this.scorer = new SimilarityScorer(normalizer, config.weights);
    this.ranker = new FeedbackRanker(this.modelSlot, config.blend);
  }

  get catalog(): PatternCatalog {
    return this.catalogSlot.current();
  }

  get model(): ModelArtifact | undefined {
    return this.modelSlot.current();
  }

  private scanOptions(options: AnalyzeOptions): AnalyzeOptions {
    // explicit options replace the configured scan window as a whole
    if (options.maxLines !== undefined || options.endsOnly !== undefined) return options;
    return { maxLines: this.config.maxLines, endsOnly: this.config.endsOnly, ...options };
  }

  analyze(source: LineSource | null | undefined, options: AnalyzeOptions = {}): Promise<AnalysisOutcome> {
    return new SignatureExtractor(this.catalogSlot.current()).analyze(source, this.scanOptions(options));
  }

  analyzeFile(file: string | null | undefined, options: AnalyzeOptions = {}): Promise<AnalysisOutcome> {
    return analyzeLogFile(new SignatureExtractor(this.catalogSlot.current()), file, this.scanOptions(options));
  }

  // similarity only, trimmed by the configured minScore and maxResults
  rank(signature: FailureSignature | DegradedSignature, candidates: readonly unknown[], options: RankOptions = {}): RankOutcome {
    return this.scorer.rank(signature, candidates, {
      minScore: this.config.minScore,
      maxResults: this.config.maxResults,
      ...options,
    });
  }

  rerank(signature: FailureSignature | DegradedSignature, matches: MatchResult[]): MatchResult[] {
    return this.ranker.rerank(signature, matches);
  }

  /**
   * Ranks every candidate, reranks with the current model, then trims. The
   * score and count limits apply to the blended scores, so a candidate the
   * model lifts over `minScore` is kept. Without a model this equals `rank`.
   */
  match(signature: FailureSignature | DegradedSignature, candidates: readonly unknown[], options: RankOptions = {}): RankOutcome {
    const ranked = this.scorer.rank(signature, candidates, { weights: options.weights });
    const minScore = options.minScore ?? this.config.minScore;
    const maxResults = options.maxResults ?? this.config.maxResults;
    // reranked matches are ordered by score, so the filter keeps a prefix and ranks stay 1..n
    const matches = this.rerank(signature, ranked.matches)
      .filter(m => m.score >= minScore)
      .slice(0, maxResults);
    return { ...ranked, matches };
  }

  discover(lines: Iterable<string>, options: DiscoverOptions = {}): LearnedPatternCandidate[] {
    return discover(lines, options);
  }

  // trains without publishing; see publishModel
  train(records: readonly FeedbackRecord[], options: TrainOptions = {}): TrainingOutcome {
    return trainRelevanceModel(this.scorer, records, { minRecords: this.config.minFeedback, ...options });
  }

  // retrains on the engine's scorer and publishes into its model slot
  feedbackCoordinator(loadRecords: () => Promise<FeedbackRecord[]>, options: TrainOptions = {}): TrainingCoordinator {
    return new TrainingCoordinator({
      slot: this.modelSlot,
      scorer: this.scorer,
      loadRecords,
      retrainEvery: this.config.retrainEvery,
      trainOptions: { minRecords: this.config.minFeedback, ...options },
    });
  }

  publishModel(artifact: ModelArtifact): number {
    const generation = this.modelSlot.publish(artifact);
    logInfo('relevance model published', { version: artifact.version, generation });
    return generation;
  }

  publishCatalog(catalog: PatternCatalog): number {
    const generation = this.catalogSlot.publish(catalog);
    logInfo('pattern catalog published', { version: catalog.version, rules: catalog.size, generation });
    return generation;
  }
}

export async function createTriageEngine(options: EngineOptions = {}): Promise<TriageEngine> {
  const config = options.config ?? loadConfig();
  setLogLevel(config.logLevel);
  const catalog = options.catalog ?? (config.catalogPath ? catalogFromFile(config.catalogPath) : builtinCatalog());
  const normalizer = await createNormalizer({ stemmer: options.stemmer });
  return new TriageEngine(config, normalizer, catalog, options.model);
}
