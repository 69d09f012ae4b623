import type { WorkModeSourceField } from '../types/job.js';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * A source value that cannot be mapped to its canonical form. This is a
 * data-quality problem and must be reported, never treated as a match.
 */
export class MalformedSourceValueError extends Error {
  readonly field: WorkModeSourceField | 'is_remote';
  readonly rawValue: unknown;

  constructor(field: WorkModeSourceField | 'is_remote', rawValue: unknown) {
    super(`Unrecognized ${field} value: ${JSON.stringify(rawValue)}`);
    this.name = 'MalformedSourceValueError';
    this.field = field;
    this.rawValue = rawValue;
  }
}

export class SolrRequestError extends Error {
  readonly status: number | null;

  constructor(message: string, status: number | null = null) {
    super(message);
    this.name = 'SolrRequestError';
    this.status = status;
  }

  /** Network failures, throttling and server errors are worth another attempt. */
  get retryable(): boolean {
    return this.status === null || this.status === 429 || this.status >= 500;
  }
}

export class HistoryStoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'HistoryStoreError';
  }
}
