import fs from 'fs';
import { z } from 'zod';
import builtinDefinition from '../catalog/builtin.json';
import { CatalogDefinitionError, errorMessage } from './errors';
import type {
  Classification, ConditionalIgnoreRule, ErrorRule, IgnoreRule, PatternRule, WarningRule,
} from './types';

const Level = z.number().int().min(1).max(10);

const IgnoreEntry = z.object({
  tag: z.string().min(1),
  pattern: z.string().min(1),
  flags: z.string().optional(),
  unless: z.string().min(1).optional(),
  unless_flags: z.string().optional(),
});

const LeveledEntry = z.object({
  tag: z.string().min(1),
  pattern: z.string().min(1),
  flags: z.string().optional(),
  level: Level,
  description: z.string().default(''),
});

export const CatalogDefinitionSchema = z.object({
  version: z.string().min(1),
  ignore: z.array(IgnoreEntry).default([]),
  errors: z.array(LeveledEntry).default([]),
  warnings: z.array(LeveledEntry).default([]),
});

export type CatalogDefinition = z.input<typeof CatalogDefinitionSchema>;
export type LeveledRuleEntry = z.input<typeof LeveledEntry>;

export type ClassifyOptions = { warningsAsErrors?: boolean };

/**
 * Ordered, immutable rule set. Ignore rules run first (first match wins),
 * then every error rule; the highest level wins and ties keep catalog order.
 */
export class PatternCatalog {
  readonly version: string;
  readonly ignoreRules: readonly (IgnoreRule | ConditionalIgnoreRule)[];
  readonly errorRules: readonly ErrorRule[];
  readonly warningRules: readonly WarningRule[];

  constructor(version: string, rules: readonly PatternRule[]) {
    this.version = version;
    const ignore: (IgnoreRule | ConditionalIgnoreRule)[] = [];
    const errors: ErrorRule[] = [];
    const warnings: WarningRule[] = [];
    for (const rule of rules) {
      switch (rule.kind) {
        case 'ignore':
        case 'conditional-ignore':
          ignore.push(rule);
          break;
        case 'error':
          errors.push(rule);
          break;
        case 'warning':
          warnings.push(rule);
          break;
      }
    }
    this.ignoreRules = Object.freeze(ignore);
    this.errorRules = Object.freeze(errors);
    this.warningRules = Object.freeze(warnings);
    Object.freeze(this);
  }

  get size(): number {
    return this.ignoreRules.length + this.errorRules.length + this.warningRules.length;
  }

  classify(line: string, options: ClassifyOptions = {}): Classification {
    if (!line.trim()) return { outcome: 'none' };

    for (const rule of this.ignoreRules) {
      if (!rule.test.test(line)) continue;
      if (rule.kind === 'conditional-ignore' && rule.unless.test(line)) continue;
      return { outcome: 'ignored', tag: rule.tag };
    }

    let best: ErrorRule | WarningRule | undefined;
    for (const rule of this.errorRules) {
      if ((!best || rule.level > best.level) && rule.test.test(line)) best = rule;
    }
    if (options.warningsAsErrors) {
      for (const rule of this.warningRules) {
        if ((!best || rule.level > best.level) && rule.test.test(line)) best = rule;
      }
    }
    return best ? { outcome: 'matched', kind: best.kind, level: best.level, tag: best.tag } : { outcome: 'none' };
  }
}

function compile(pattern: string, flags: string | undefined, tag: string, source?: string): RegExp {
  // stateful flags would make classify depend on previous calls
  const safeFlags = (flags || '').replace(/[gy]/g, '');
  try {
    return new RegExp(pattern, safeFlags);
  } catch (err) {
    throw new CatalogDefinitionError(`Rule "${tag}" has an invalid pattern: ${errorMessage(err)}`, { source, cause: err });
  }
}

export function loadCatalog(definition: unknown, source?: string): PatternCatalog {
  const parsed = CatalogDefinitionSchema.safeParse(definition);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new CatalogDefinitionError(`Corrupt catalog definition: ${issues}`, { source });
  }
  const def = parsed.data;
  const rules: PatternRule[] = [];

  for (const e of def.ignore) {
    const test = compile(e.pattern, e.flags, e.tag, source);
    rules.push(e.unless
      ? { kind: 'conditional-ignore', tag: e.tag, test, unless: compile(e.unless, e.unless_flags ?? e.flags, e.tag, source) }
      : { kind: 'ignore', tag: e.tag, test });
  }
  for (const e of def.errors) {
    rules.push({ kind: 'error', tag: e.tag, level: e.level, description: e.description, test: compile(e.pattern, e.flags, e.tag, source) });
  }
  for (const e of def.warnings) {
    rules.push({ kind: 'warning', tag: e.tag, level: e.level, description: e.description, test: compile(e.pattern, e.flags, e.tag, source) });
  }
  return new PatternCatalog(def.version, rules);
}

export function catalogFromFile(file: string): PatternCatalog {
  let raw: string;
  try {
    raw = fs.readFileSync(file, 'utf-8');
  } catch (err) {
    throw new CatalogDefinitionError(`Cannot read catalog definition: ${errorMessage(err)}`, { source: file, cause: err });
  }
  let json: unknown;
  try {
    json = JSON.parse(raw.replace(/^\uFEFF/, ''));
  } catch (err) {
    throw new CatalogDefinitionError(`Catalog definition is not valid JSON: ${errorMessage(err)}`, { source: file, cause: err });
  }
  return loadCatalog(json, file);
}

// builds a fresh catalog; callers keep the instance they share
export function builtinCatalog(): PatternCatalog {
  return loadCatalog(builtinDefinition, 'catalog/builtin.json');
}

/**
 * Returns a new catalog with reviewed rules appended after the existing error rules.
 * The source catalog is left untouched.
 */
export function promoteRules(catalog: PatternCatalog, entries: LeveledRuleEntry[], version: string): PatternCatalog {
  const added: ErrorRule[] = entries.map(raw => {
    const parsed = LeveledEntry.safeParse(raw);
    if (!parsed.success) {
      throw new CatalogDefinitionError(`Invalid promoted rule: ${parsed.error.issues.map(i => i.message).join('; ')}`);
    }
    const e = parsed.data;
    return { kind: 'error', tag: e.tag, level: e.level, description: e.description, test: compile(e.pattern, e.flags, e.tag) };
  });
  return new PatternCatalog(version, [...catalog.ignoreRules, ...catalog.errorRules, ...added, ...catalog.warningRules]);
}
