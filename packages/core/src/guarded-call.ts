/**
 * Guarded external calls: rate gate + bounded retry with exponential backoff.
 *
 * Retries are per call. A StageCaller additionally caps the total number of
 * attempts one stage of one item may spend, across all of its calls.
 */

import type { Stage } from '@pitchline/schemas';
import { systemClock, type Clock } from './clock';
import {
  StageFailedError,
  errorKindOf,
  errorMessage,
  isRetryable,
} from './errors';
import type { RateGate } from './rate-gate';

export interface RetryPolicy {
  maxRetries: number;
  backoffBaseMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 2,
  backoffBaseMs: 1000,
};

export interface RetryEvent {
  stage: Stage;
  label: string;
  attempt: number;
  delayMs: number;
  error: unknown;
}

export interface GuardedCallOptions extends RetryPolicy {
  stage: Stage;
  gate: RateGate;
  label?: string;
  clock?: Clock;
  onRetry?: (event: RetryEvent) => void;
  /** Called before every attempt; throwing aborts the call. */
  beforeAttempt?: () => void;
}

export function backoffDelay(backoffBaseMs: number, attempt: number): number {
  return backoffBaseMs * 2 ** attempt;
}

/**
 * Run `fn` under the gate. Retryable failures are retried up to `maxRetries`
 * times (sleeping `backoffBaseMs * 2^attempt` between attempts, attempt from 0);
 * everything else, and exhaustion, surfaces as StageFailedError.
 */
export async function guardedCall<T>(
  fn: () => Promise<T>,
  options: GuardedCallOptions,
): Promise<T> {
  const clock = options.clock ?? systemClock;
  const label = options.label ?? 'call';
  let attempt = 0;

  for (;;) {
    options.beforeAttempt?.();
    await options.gate.acquire();
    try {
      return await fn();
    } catch (err) {
      if (err instanceof StageFailedError) throw err;
      if (!isRetryable(err)) {
        throw new StageFailedError(options.stage, errorKindOf(err), errorMessage(err), {
          cause: err,
          attempts: attempt + 1,
        });
      }
      if (attempt >= options.maxRetries) {
        throw new StageFailedError(
          options.stage,
          err.kind,
          `${label} gave up after ${attempt + 1} attempts: ${err.message}`,
          { cause: err, attempts: attempt + 1 },
        );
      }
      const delayMs = backoffDelay(options.backoffBaseMs, attempt);
      options.onRetry?.({ stage: options.stage, label, attempt, delayMs, error: err });
      await clock.sleep(delayMs);
      attempt++;
    }
  }
}

export interface StageCallerOptions {
  stage: Stage;
  gate: RateGate;
  retry: RetryPolicy;
  /** Cap on attempts across every call this stage makes. */
  maxCalls: number;
  clock?: Clock;
  onRetry?: (event: RetryEvent) => void;
}

export class StageCaller {
  readonly stage: Stage;
  private readonly options: StageCallerOptions;
  private used = 0;

  constructor(options: StageCallerOptions) {
    this.stage = options.stage;
    this.options = options;
  }

  /** Attempts spent so far, retries included. */
  get attempts(): number {
    return this.used;
  }

  call<T>(label: string, fn: () => Promise<T>): Promise<T> {
    const { gate, retry, clock, onRetry, maxCalls } = this.options;
    return guardedCall(fn, {
      stage: this.stage,
      label,
      gate,
      clock,
      onRetry,
      maxRetries: retry.maxRetries,
      backoffBaseMs: retry.backoffBaseMs,
      beforeAttempt: () => {
        if (this.used >= maxCalls) {
          throw new StageFailedError(
            this.stage,
            'CALL_BUDGET',
            `external call budget of ${maxCalls} attempts exhausted`,
            { attempts: this.used },
          );
        }
        this.used++;
      },
    });
  }
}

