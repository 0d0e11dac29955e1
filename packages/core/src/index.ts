/**
 * @pitchline/core - error kinds, rate limiting, retries and the worker pool
 */

export const DEFAULT_CONCURRENCY = 4;
export const DEFAULT_SEARCH_RATE_LIMIT = 60;

export {
  PipelineError,
  RetryableError,
  SearchUnavailableError,
  NonRetryableError,
  StageFailedError,
  PipelineConfigError,
  isRetryable,
  errorMessage,
  errorKindOf,
} from './errors';
export { systemClock, type Clock } from './clock';
export { RateGate, ONE_MINUTE_MS, type RateGateOptions } from './rate-gate';
export {
  guardedCall,
  backoffDelay,
  StageCaller,
  DEFAULT_RETRY_POLICY,
  type RetryPolicy,
  type RetryEvent,
  type GuardedCallOptions,
  type StageCallerOptions,
} from './guarded-call';
export { runWithConcurrency, type WorkerPoolOptions, type PoolResult } from './worker-pool';
export { slugify, SlugRegistry } from './slugify';
