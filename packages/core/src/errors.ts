/**
 * Error kinds shared by every stage of the pipeline.
 *
 * Retry decisions are made on the class: RetryableError (and its
 * SearchUnavailableError subclass) may be retried by a guarded call,
 * anything else fails the stage on the spot.
 */

import type { ErrorKind, Stage } from '@pitchline/schemas';

export class PipelineError extends Error {
  readonly kind: ErrorKind;

  constructor(message: string, kind: ErrorKind, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
  }
}

/** Transient external failure: timeout, provider throttling, flaky network. */
export class RetryableError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown; kind?: ErrorKind }) {
    super(message, options?.kind ?? 'RETRYABLE', options);
  }
}

/** Provider-level outage. Retried like any RetryableError until the budget runs out. */
export class SearchUnavailableError extends RetryableError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { ...options, kind: 'SEARCH_UNAVAILABLE' });
  }
}

/** Malformed or missing input; retrying cannot help. */
export class NonRetryableError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown; kind?: ErrorKind }) {
    super(message, options?.kind ?? 'NON_RETRYABLE', options);
  }
}

export class StageFailedError extends PipelineError {
  readonly stage: Stage;
  readonly attempts: number;
  /** The failure message without the stage prefix. */
  readonly reason: string;

  constructor(
    stage: Stage,
    kind: ErrorKind,
    message: string,
    options?: { cause?: unknown; attempts?: number },
  ) {
    super(`${stage} failed: ${message}`, kind, options);
    this.stage = stage;
    this.attempts = options?.attempts ?? 0;
    this.reason = message;
  }
}

/** Raised only when a run cannot start at all (bad configuration, empty input). */
export class PipelineConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'PipelineConfigError';
    this.issues = issues;
  }
}

export function isRetryable(err: unknown): err is RetryableError {
  return err instanceof RetryableError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Map any thrown value to the kind recorded in the run manifest. */
export function errorKindOf(err: unknown): ErrorKind {
  return err instanceof PipelineError ? err.kind : 'UNEXPECTED';
}
