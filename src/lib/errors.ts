/**
 * RepoPulse — Error Types
 *
 * Only ConfigurationError and ConnectionError are meant to cross the
 * pipeline boundary. Everything else is contained where it happens.
 */

export class ConfigurationError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

export type ConnectionFailureKind = 'authentication' | 'missing_database' | 'unavailable';

export class ConnectionError extends Error {
  readonly kind: ConnectionFailureKind;

  constructor(message: string, kind: ConnectionFailureKind, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConnectionError';
    this.kind = kind;
  }
}

export class StoreError extends Error {
  readonly code: string | undefined;
  readonly status: number | undefined;

  constructor(message: string, details: { code?: string; status?: number } = {}) {
    super(message);
    this.name = 'StoreError';
    this.code = details.code;
    this.status = details.status;
  }
}

export type AnalysisStage = 'pending' | 'fetching' | 'scoring' | 'persisting';

export class AnalysisError extends Error {
  readonly repoFullName: string;
  readonly stage: AnalysisStage;

  constructor(repoFullName: string, stage: AnalysisStage, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Analysis of ${repoFullName} failed while ${stage}: ${reason}`, { cause });
    this.name = 'AnalysisError';
    this.repoFullName = repoFullName;
    this.stage = stage;
  }
}

/**
 * True for errors that must abort the whole run.
 */
export function isFatalError(error: unknown): error is ConfigurationError | ConnectionError {
  return error instanceof ConfigurationError || error instanceof ConnectionError;
}
