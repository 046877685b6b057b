import fs from 'fs';
import type { PatternCatalog } from './catalog';
import { ConfigurationError } from './errors';
import { extractKeywords, keywordsFromTestName } from './keywords';
import { logDebug } from './logger';
import type { AnalysisOutcome, FailureSignature } from './types';

/** a line with the byte offset of its first character in the source */
export type SourceLine = { text: string; offset: number };

/**
 * Plain strings are taken as LF-separated UTF-8 and offsets are counted from
 * their encoded length; sources that know their real offsets yield SourceLine.
 */
export type LineSource = Iterable<string | SourceLine> | AsyncIterable<string | SourceLine>;

export type AnalyzeOptions = {
  /** stop after this many lines */
  maxLines?: number;
  /** scan only the first and last N lines */
  endsOnly?: number;
  suite?: string;
  test?: string;
  tool?: string;
  historySize?: number;
  maxUnmatched?: number;
};

const ACTION_LINE = /^# action: gc\(.*\)::(\w+)\/(\w+)\.(\S+)/;
const TOOL_MARKERS = [/dv: \.\.\. running tool (\S+)/, /dv: tool (\S+) failed!/];
const WARNINGS_AS_ERRORS = /cc1plus: warnings being treated as errors/;
const ERROR_INDICATOR = /error|fail|exception|fatal|critical|assert|abort|crash|segfault|panic|timeout|denied|invalid|cannot|unable/i;

type Best = {
  level: number;
  tag: string;
  text: string;
  lineNumber: number;
  offset: number;
  tool?: string;
  context: string[];
};

type ScanState = {
  suite?: string;
  test?: string;
  tool?: string;
  warningsAsErrors: boolean;
  history: string[];
  best?: Best;
  unmatched: string[];
  scanned: number;
};

type PendingLine = { text: string; lineNumber: number; offset: number };

export function textLines(text: string): SourceLine[] {
  if (!text) return [];
  const lines: SourceLine[] = [];
  let offset = 0;
  for (const raw of text.split('\n')) {
    lines.push({ text: raw.endsWith('\r') ? raw.slice(0, -1) : raw, offset });
    offset += Buffer.byteLength(raw, 'utf-8') + 1;
  }
  if (lines[lines.length - 1].text === '' && text.endsWith('\n')) lines.pop();
  return lines;
}

const LF = 0x0a;
const CR = 0x0d;

function decodeLine(bytes: Buffer): string {
  const end = bytes.length && bytes[bytes.length - 1] === CR ? bytes.length - 1 : bytes.length;
  return bytes.toString('utf-8', 0, end);
}

// Lines of a file, read lazily and split on raw bytes so offsets match the file. Read errors reject the iteration.
export async function* fileLines(file: string): AsyncGenerator<SourceLine> {
  const input = fs.createReadStream(file);
  let carry: Buffer = Buffer.alloc(0);
  let offset = 0;
  try {
    for await (const chunk of input) {
      if (!Buffer.isBuffer(chunk)) continue;
      const data = carry.length ? Buffer.concat([carry, chunk]) : chunk;
      let start = 0;
      for (let nl = data.indexOf(LF); nl !== -1; nl = data.indexOf(LF, start)) {
        yield { text: decodeLine(data.subarray(start, nl)), offset };
        offset += nl + 1 - start;
        start = nl + 1;
      }
      carry = data.subarray(start);
    }
  } finally {
    input.destroy();
  }
  if (carry.length) yield { text: decodeLine(carry), offset };
}

export type UnavailableOutcome = Extract<AnalysisOutcome, { kind: 'unavailable' }>;

export function degradedOutcome(test: string | undefined, suite: string | undefined, reason: string): UnavailableOutcome {
  return {
    kind: 'unavailable',
    signature: {
      suite: suite || 'unknown',
      test: test || 'unknown',
      keywords: keywordsFromTestName(test || ''),
      degraded: true,
      reason,
    },
  };
}

/**
 * Single forward pass over a log, keeping the highest-severity classified line.
 * Never stops at the first match: a later line may carry a higher level.
 */
export class SignatureExtractor {
  constructor(private readonly catalog: PatternCatalog) {}

  async analyze(source: LineSource | null | undefined, options: AnalyzeOptions = {}): Promise<AnalysisOutcome> {
    validateOptions(options);
    if (!source) return degradedOutcome(options.test, options.suite, 'log source unavailable');

    const historySize = options.historySize ?? 10;
    const maxUnmatched = options.maxUnmatched ?? 50;
    const state: ScanState = {
      suite: options.suite,
      test: options.test,
      tool: options.tool,
      warningsAsErrors: false,
      history: [],
      unmatched: [],
      scanned: 0,
    };
    const visit = (line: PendingLine) => this.visit(state, line, historySize, maxUnmatched);

    let lineNumber = 0;
    let offset = 0;
    let truncated = false;
    const tail: PendingLine[] = [];

    for await (const item of source) {
      lineNumber += 1;
      const line = typeof item === 'string'
        ? { text: item, lineNumber, offset }
        : { text: item.text, lineNumber, offset: item.offset };
      if (typeof item === 'string') offset += Buffer.byteLength(item, 'utf-8') + 1;

      if (options.maxLines && lineNumber > options.maxLines) {
        truncated = true;
        break;
      }
      if (options.endsOnly && lineNumber > options.endsOnly) {
        tail.push(line);
        if (tail.length > options.endsOnly) {
          tail.shift();
          truncated = true;
        }
        continue;
      }
      visit(line);
    }
    for (const line of tail) visit(line);

    logDebug('log scanned', { lines: lineNumber, scanned: state.scanned, best: state.best?.tag });

    const suite = state.suite || 'unknown';
    const test = state.test || 'unknown';
    if (!state.best) {
      return {
        kind: 'not-found',
        reason: notFoundReason(options, truncated),
        suite,
        test,
        tool_name: state.tool,
        unmatched_lines: state.unmatched,
        lines_scanned: state.scanned,
      };
    }

    const best = state.best;
    let keywords = extractKeywords(best.text);
    if (!keywords.length && state.test) keywords = keywordsFromTestName(state.test);
    const signature: FailureSignature = {
      suite,
      test,
      line_number: best.lineNumber,
      line_offset: best.offset,
      matched_text: best.text,
      error_level: best.level,
      pattern_tag: best.tag,
      tool_name: best.tool ?? state.tool,
      lines_scanned: state.scanned,
      keywords,
      context: best.context,
    };
    return { kind: 'found', signature, unmatched_lines: state.unmatched, lines_scanned: state.scanned };
  }

  private visit(state: ScanState, line: PendingLine, historySize: number, maxUnmatched: number) {
    state.scanned += 1;
    const context = state.history.slice();
    state.history.push(line.text);
    if (state.history.length > historySize) state.history.shift();

    const result = this.catalog.classify(line.text, { warningsAsErrors: state.warningsAsErrors });
    if (result.outcome === 'ignored') return;

    if (!state.suite || !state.test) {
      const action = ACTION_LINE.exec(line.text);
      if (action) {
        state.suite = state.suite || action[1];
        state.test = state.test || action[2];
        state.tool = state.tool || action[3];
        return;
      }
    }

    for (const marker of TOOL_MARKERS) {
      const m = marker.exec(line.text);
      if (m) {
        state.tool = m[1];
        return;
      }
    }

    if (WARNINGS_AS_ERRORS.test(line.text)) {
      state.warningsAsErrors = true;
      return;
    }

    if (result.outcome === 'matched') {
      // strictly greater: on equal levels the earlier line stays
      if (!state.best || result.level > state.best.level) {
        state.best = {
          level: result.level,
          tag: result.tag,
          text: line.text.trim(),
          lineNumber: line.lineNumber,
          offset: line.offset,
          tool: state.tool,
          context,
        };
      }
      return;
    }

    if (state.unmatched.length < maxUnmatched && ERROR_INDICATOR.test(line.text)) {
      state.unmatched.push(line.text.trim());
    }
  }
}

function validateOptions(options: AnalyzeOptions) {
  if (options.maxLines && options.endsOnly) {
    throw new ConfigurationError('maxLines and endsOnly are mutually exclusive');
  }
  for (const key of ['maxLines', 'endsOnly'] as const) {
    const v = options[key];
    if (v !== undefined && (!Number.isInteger(v) || v < 1)) {
      throw new ConfigurationError(`${key} must be a positive integer, got ${v}`);
    }
  }
  for (const key of ['historySize', 'maxUnmatched'] as const) {
    const v = options[key];
    if (v !== undefined && (!Number.isInteger(v) || v < 0)) {
      throw new ConfigurationError(`${key} must be a non-negative integer, got ${v}`);
    }
  }
}

function notFoundReason(options: AnalyzeOptions, truncated: boolean): string {
  if (truncated && options.maxLines) return `did not find error in first ${options.maxLines} lines`;
  if (truncated && options.endsOnly) return `did not find error in first/last ${options.endsOnly} lines`;
  return 'no error-level line found';
}

/**
 * Analyzes a log on disk. A log that cannot be opened degrades to a
 * signature built from the test name; errors while reading propagate.
 */
export async function analyzeLogFile(
  extractor: SignatureExtractor,
  file: string | null | undefined,
  options: AnalyzeOptions = {},
): Promise<AnalysisOutcome> {
  if (!file) return degradedOutcome(options.test, options.suite, 'no log path');
  try {
    await fs.promises.access(file, fs.constants.R_OK);
  } catch (err) {
    const code = err instanceof Error && 'code' in err && typeof err.code === 'string' ? err.code : 'unreadable';
    return degradedOutcome(options.test, options.suite, `log unavailable (${code}): ${file}`);
  }
  return extractor.analyze(fileLines(file), options);
}
