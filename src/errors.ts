/**
 * Fatal errors. Everything data-related (missing logs, no signature,
 * malformed candidates, too little feedback) is returned as an outcome instead.
 */
export class TriageError extends Error {
  readonly code: string;

  constructor(message: string, options: { code: string; cause?: unknown }) {
    super(message);
    this.name = 'TriageError';
    this.code = options.code;
    this.cause = options.cause;
  }
}

export class ConfigurationError extends TriageError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length ? `${message}: ${issues.join('; ')}` : message, { code: 'invalid_configuration' });
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

export class CatalogDefinitionError extends TriageError {
  readonly source?: string;

  constructor(message: string, options: { source?: string; cause?: unknown } = {}) {
    super(options.source ? `${message} (${options.source})` : message, { code: 'corrupt_catalog', cause: options.cause });
    this.name = 'CatalogDefinitionError';
    this.source = options.source;
  }
}

export function isTriageError(err: unknown): err is TriageError {
  return err instanceof TriageError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
