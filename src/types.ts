export type Confidence = 'LOW' | 'MEDIUM' | 'HIGH';

export type RuleKind = 'ignore' | 'conditional-ignore' | 'error' | 'warning';

export type IgnoreRule = { kind: 'ignore'; tag: string; test: RegExp };

// ignored unless `unless` also matches the line
export type ConditionalIgnoreRule = { kind: 'conditional-ignore'; tag: string; test: RegExp; unless: RegExp };

export type ErrorRule = { kind: 'error'; tag: string; level: number; test: RegExp; description: string };

export type WarningRule = { kind: 'warning'; tag: string; level: number; test: RegExp; description: string };

export type PatternRule = IgnoreRule | ConditionalIgnoreRule | ErrorRule | WarningRule;

export type Classification =
  | { outcome: 'ignored'; tag: string }
  | { outcome: 'matched'; kind: 'error' | 'warning'; level: number; tag: string }
  | { outcome: 'none' };

export type FailureSignature = {
  suite: string;
  test: string;
  line_number: number;
  line_offset: number;
  matched_text: string;
  error_level: number;
  pattern_tag: string;
  tool_name?: string;
  lines_scanned: number;
  keywords: string[];
  context: string[];
};

// built from the test name alone when no log could be read
export type DegradedSignature = {
  suite: string;
  test: string;
  keywords: string[];
  degraded: true;
  reason: string;
};

export type AnalysisOutcome =
  | { kind: 'found'; signature: FailureSignature; unmatched_lines: string[]; lines_scanned: number }
  | {
    kind: 'not-found';
    reason: string;
    suite: string;
    test: string;
    tool_name?: string;
    unmatched_lines: string[];
    lines_scanned: number;
  }
  | { kind: 'unavailable'; signature: DegradedSignature };

export type CandidateIssue = {
  id: string;
  summary: string;
  description: string;
  comment_text: string[];
  status: string;
  labels: string[];
  updated?: string;
  resolution?: string;
};

export type ComponentScores = {
  jaccard: number;
  cosine_tfidf: number;
  edit_distance: number;
  semantic: number;
};

export type StructuralSignals = {
  keyword_overlap: number;
  status_resolved: number;
  label_overlap: number;
};

export type MatchResult = {
  issue_id: string;
  score: number;
  component_scores: ComponentScores;
  signals: StructuralSignals;
  rank: number;
  status: string;
  updated?: string;
  matched_terms: string[];
  reason: string;
  solution_summary?: string;
  resolution?: string;
};

export type RankOutcome = {
  matches: MatchResult[];
  skipped: number;
  skipped_ids: string[];
};

export type LearnedPatternCandidate = {
  regex_text: string;
  sample_lines: string[];
  confidence: Confidence;
  support_count: number;
  anchor_length: number;
  suggested_level: number;
  suggested_tag: string;
};

export type FeedbackStats = {
  total: number;
  relevant: number;
  irrelevant: number;
  first_timestamp?: string;
  last_timestamp?: string;
};

export type FeedbackRecord = {
  signature_keywords: string[];
  issue_id: string;
  is_relevant: boolean;
  timestamp: string;

  // snapshot taken when the feedback was given
  test_name?: string;
  signature_text?: string;
  issue_summary?: string;
  issue_description?: string;
  issue_status?: string;
  issue_labels?: string[];
};

export type ModelArtifact = {
  readonly version: string;
  readonly trained_at: string;
  readonly accuracy: number;
  readonly sample_count: number;
  readonly feature_names: readonly string[];
  readonly weights: readonly number[];
  readonly bias: number;
};

export type TrainingSkipReason = 'insufficient-data' | 'single-class' | 'underfit';

export type TrainingOutcome =
  | { kind: 'trained'; artifact: ModelArtifact }
  | { kind: 'skipped'; reason: TrainingSkipReason; detail: string };

// a failing test as handed to the batch pipeline
export type FailureRow = {
  suite?: string;
  test: string;
  log_path?: string;
};

export type EnrichedRow = FailureRow & {
  outcome: AnalysisOutcome['kind'];
  signature?: string;
  error_level?: number;
  pattern_tag?: string;
  tool_name?: string;
  keywords: string[];
  correlated_issue: string | null;
  correlation_score: number | null;
  matches: Pick<MatchResult, 'issue_id' | 'score' | 'rank' | 'reason'>[];
};
