import { z } from 'zod';
import { ConfigurationError } from './errors';
import type { ComponentScores } from './types';

export type ScoreWeights = Readonly<ComponentScores>;

export const WeightPresetName = z.enum(['balanced', 'lexical', 'fuzzy', 'legacy']);

export type WeightPreset = z.infer<typeof WeightPresetName>;

// Named weight presets for combining the component scores. Each sums to 1.
// The synonym-only (semantic) component always weighs less than the exact-token ones.
export const WEIGHT_PRESETS: Readonly<Record<WeightPreset, ScoreWeights>> = {
  balanced: { jaccard: 0.35, cosine_tfidf: 0.3, edit_distance: 0.15, semantic: 0.2 },
  lexical: { jaccard: 0.4, cosine_tfidf: 0.4, edit_distance: 0.1, semantic: 0.1 },
  fuzzy: { jaccard: 0.25, cosine_tfidf: 0.25, edit_distance: 0.35, semantic: 0.15 },
  legacy: { jaccard: 0.5, cosine_tfidf: 0.3, edit_distance: 0.2, semantic: 0 },
};

const optionalInt = z.coerce.number().int().positive().optional();

const Env = z.object({
  TRIAGE_WEIGHT_PRESET: WeightPresetName.default('balanced'),
  TRIAGE_MAX_LINES: optionalInt,
  TRIAGE_ENDS_ONLY: optionalInt,
  TRIAGE_CATALOG: z.string().min(1).optional(),
  TRIAGE_MIN_SCORE: z.coerce.number().min(0).max(1).default(0.3),
  TRIAGE_MAX_RESULTS: z.coerce.number().int().positive().default(10),
  TRIAGE_MIN_FEEDBACK: z.coerce.number().int().positive().default(20),
  TRIAGE_BLEND: z.coerce.number().min(0).max(1).default(0.5),
  TRIAGE_RETRAIN_EVERY: z.coerce.number().int().positive().default(20),
  TRIAGE_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  SLACK_BOT_TOKEN: z.string().optional(),
  SLACK_CHANNEL: z.string().optional(),
}).refine(env => !(env.TRIAGE_MAX_LINES && env.TRIAGE_ENDS_ONLY), {
  message: 'TRIAGE_MAX_LINES and TRIAGE_ENDS_ONLY are mutually exclusive',
  path: ['TRIAGE_ENDS_ONLY'],
});

export type TriageConfig = {
  weightPreset: WeightPreset;
  weights: ScoreWeights;
  maxLines?: number;
  endsOnly?: number;
  catalogPath?: string;
  minScore: number;
  maxResults: number;
  minFeedback: number;
  blend: number;
  retrainEvery: number;
  logLevel: 'debug' | 'info' | 'warn' | 'error';
  slack?: { token: string; channel: string };
};

type EnvSource = Record<string, string | undefined>;

export function loadConfig(env: EnvSource = process.env): TriageConfig {
  // empty strings count as unset
  const cleaned: EnvSource = {};
  for (const [k, v] of Object.entries(env)) {
    if (v !== undefined && v.trim() !== '') cleaned[k] = v.trim();
  }

  const parsed = Env.safeParse(cleaned);
  if (!parsed.success) {
    throw new ConfigurationError(
      'Invalid triage configuration',
      parsed.error.issues.map(i => `${i.path.join('.') || 'env'}: ${i.message}`),
    );
  }
  const e = parsed.data;
  return {
    weightPreset: e.TRIAGE_WEIGHT_PRESET,
    weights: resolveWeights(e.TRIAGE_WEIGHT_PRESET),
    maxLines: e.TRIAGE_MAX_LINES,
    endsOnly: e.TRIAGE_ENDS_ONLY,
    catalogPath: e.TRIAGE_CATALOG,
    minScore: e.TRIAGE_MIN_SCORE,
    maxResults: e.TRIAGE_MAX_RESULTS,
    minFeedback: e.TRIAGE_MIN_FEEDBACK,
    blend: e.TRIAGE_BLEND,
    retrainEvery: e.TRIAGE_RETRAIN_EVERY,
    logLevel: e.TRIAGE_LOG_LEVEL,
    slack: e.SLACK_BOT_TOKEN && e.SLACK_CHANNEL ? { token: e.SLACK_BOT_TOKEN, channel: e.SLACK_CHANNEL } : undefined,
  };
}

export function resolveWeights(preset: WeightPreset): ScoreWeights {
  const weights = WEIGHT_PRESETS[preset];
  if (!weights) throw new ConfigurationError(`Unknown weight preset "${String(preset)}"`);
  return weights;
}
