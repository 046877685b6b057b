export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

type LogContext = Record<string, unknown>;

type LoggerFn = (message: string, context?: LogContext) => void;

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let threshold: LogLevel = parseLevel(process.env.TRIAGE_LOG_LEVEL) ?? 'info';

function parseLevel(value: string | undefined): LogLevel | undefined {
  const v = (value || '').trim().toLowerCase();
  return v === 'debug' || v === 'info' || v === 'warn' || v === 'error' ? v : undefined;
}

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

const emit = (level: LogLevel, message: string, context?: LogContext): void => {
  if (LOG_LEVELS[level] < LOG_LEVELS[threshold]) return;
  // stdout carries report output; logs stay on stderr
  const logger = level === 'warn' ? console.warn : console.error;
  const line = `[triage] ${message}`;
  if (context && Object.keys(context).length > 0) {
    logger(line, context);
    return;
  }
  logger(line);
};

export const logDebug: LoggerFn = (message, context) => emit('debug', message, context);
export const logInfo: LoggerFn = (message, context) => emit('info', message, context);
export const logWarning: LoggerFn = (message, context) => emit('warn', message, context);
export const logError: LoggerFn = (message, context) => emit('error', message, context);
