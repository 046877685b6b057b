export * from './types';
export { TriageError, ConfigurationError, CatalogDefinitionError, isTriageError } from './errors';
export { setLogLevel, getLogLevel, type LogLevel } from './logger';
export { loadConfig, resolveWeights, WEIGHT_PRESETS, type TriageConfig, type ScoreWeights, type WeightPreset } from './config';
export {
  PatternCatalog, loadCatalog, catalogFromFile, builtinCatalog, promoteRules,
  type CatalogDefinition, type LeveledRuleEntry,
} from './catalog';
export { ArtifactSlot } from './artifacts';
export { extractKeywords, keywordsFromTestName } from './keywords';
export {
  SignatureExtractor, analyzeLogFile, textLines, fileLines, degradedOutcome,
  type AnalyzeOptions, type LineSource, type SourceLine,
} from './extractor';
export { TextNormalizer, createNormalizer, loadPorterStemmer, type Stemmer, type TokenSet } from './normalizer';
export {
  SimilarityScorer, IssueCorpus, orderMatches, extractSolution, resolvedOnly, type RankOptions, type ScoreQuery,
} from './correlate';
export { toCandidateIssue } from './fields';
export { discover, toCatalogEntries, type DiscoverOptions } from './learner';
export { trainRelevanceModel, predictRelevance, FEATURE_NAMES, type TrainOptions } from './classifier';
export { FeedbackRanker, TrainingCoordinator, type CoordinatorOptions } from './ranker';
export { TriageEngine, createTriageEngine, type EngineOptions } from './engine';
export {
  readJsonl, writeJsonl, readIssuesCsv, readIssues, appendFeedback, loadFeedback, feedbackStats,
  recordUnmatched, loadUnmatchedLines, saveArtifact, loadArtifact,
} from './io';
export { renderDashboard } from './dashboard';
export { postSlack, type SlackTarget } from './slack';
export { runTriage, type TriageRunOptions, type TriageSummary } from './pipeline';
