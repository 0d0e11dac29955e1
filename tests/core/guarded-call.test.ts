import { describe, it, expect, vi } from 'vitest';
import {
  NonRetryableError,
  RateGate,
  RetryableError,
  SearchUnavailableError,
  StageCaller,
  StageFailedError,
  backoffDelay,
  guardedCall,
} from '@pitchline/core';
import { ManualClock } from '../helpers/manual-clock';

function setup() {
  const clock = new ManualClock();
  const gate = RateGate.perMinute(1000, clock);
  return { clock, gate };
}

async function failure(promise: Promise<unknown>): Promise<StageFailedError> {
  const err = await promise.then(
    () => undefined,
    (e: unknown) => e,
  );
  if (!(err instanceof StageFailedError)) throw new Error(`expected StageFailedError, got ${String(err)}`);
  return err;
}

describe('backoffDelay', () => {
  it('doubles from the base', () => {
    expect([0, 1, 2, 3].map((a) => backoffDelay(100, a))).toEqual([100, 200, 400, 800]);
  });
});

describe('guardedCall', () => {
  it('retries retryable failures with exponential backoff, then succeeds', async () => {
    const { clock, gate } = setup();
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new RetryableError('flaky'))
      .mockRejectedValueOnce(new RetryableError('flaky'))
      .mockResolvedValue('ok');

    const result = await guardedCall(fn, {
      stage: 'research',
      gate,
      clock,
      maxRetries: 2,
      backoffBaseMs: 100,
    });

    expect(result).toBe('ok');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(clock.sleeps).toEqual([100, 200]);
  });

  it('gives up after 1 + maxRetries attempts', async () => {
    const { clock, gate } = setup();
    const onRetry = vi.fn();
    const fn = vi.fn(async () => {
      throw new RetryableError('still down');
    });

    const err = await failure(
      guardedCall(fn, {
        stage: 'discovery',
        gate,
        clock,
        label: 'lookup',
        maxRetries: 2,
        backoffBaseMs: 100,
        onRetry,
      }),
    );

    expect(fn).toHaveBeenCalledTimes(3);
    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(err.stage).toBe('discovery');
    expect(err.kind).toBe('RETRYABLE');
    expect(err.attempts).toBe(3);
    expect(err.reason).toBe('lookup gave up after 3 attempts: still down');
    expect(err.message).toBe('discovery failed: lookup gave up after 3 attempts: still down');
  });

  it('keeps the provider-outage kind when retries run out', async () => {
    const { clock, gate } = setup();
    const err = await failure(
      guardedCall(
        async () => {
          throw new SearchUnavailableError('503');
        },
        { stage: 'discovery', gate, clock, maxRetries: 1, backoffBaseMs: 1 },
      ),
    );
    expect(err.kind).toBe('SEARCH_UNAVAILABLE');
    expect(err.attempts).toBe(2);
  });

  it('fails non-retryable errors immediately', async () => {
    const { clock, gate } = setup();
    const fn = vi.fn(async () => {
      throw new NonRetryableError('bad request');
    });

    const err = await failure(
      guardedCall(fn, { stage: 'research', gate, clock, maxRetries: 5, backoffBaseMs: 100 }),
    );

    expect(fn).toHaveBeenCalledTimes(1);
    expect(clock.sleeps).toEqual([]);
    expect(err.kind).toBe('NON_RETRYABLE');
    expect(err.reason).toBe('bad request');
  });

  it('treats unclassified errors as unexpected and does not retry them', async () => {
    const { clock, gate } = setup();
    const fn = vi.fn(async () => {
      throw new TypeError('boom');
    });

    const err = await failure(
      guardedCall(fn, { stage: 'drafting', gate, clock, maxRetries: 3, backoffBaseMs: 1 }),
    );

    expect(fn).toHaveBeenCalledTimes(1);
    expect(err.kind).toBe('UNEXPECTED');
    expect(err.cause).toBeInstanceOf(TypeError);
  });

  it('acquires the gate before every attempt', async () => {
    const { clock, gate } = setup();
    const acquire = vi.spyOn(gate, 'acquire');
    const fn = vi
      .fn<() => Promise<number>>()
      .mockRejectedValueOnce(new RetryableError('once'))
      .mockResolvedValue(1);

    await guardedCall(fn, { stage: 'research', gate, clock, maxRetries: 2, backoffBaseMs: 1 });

    expect(acquire).toHaveBeenCalledTimes(2);
  });
});

describe('StageCaller', () => {
  it('caps attempts across all calls of a stage', async () => {
    const { clock, gate } = setup();
    const caller = new StageCaller({
      stage: 'discovery',
      gate,
      clock,
      retry: { maxRetries: 5, backoffBaseMs: 1 },
      maxCalls: 2,
    });
    const fn = vi.fn(async () => {
      throw new RetryableError('down');
    });

    const err = await failure(caller.call('lookup', fn));

    expect(fn).toHaveBeenCalledTimes(2);
    expect(err.kind).toBe('CALL_BUDGET');
    expect(caller.attempts).toBe(2);
  });

  it('counts successful calls against the same budget', async () => {
    const { clock, gate } = setup();
    const caller = new StageCaller({
      stage: 'research',
      gate,
      clock,
      retry: { maxRetries: 0, backoffBaseMs: 1 },
      maxCalls: 2,
    });

    await caller.call('first', async () => 1);
    await caller.call('second', async () => 2);
    const err = await failure(caller.call('third', async () => 3));

    expect(err.kind).toBe('CALL_BUDGET');
    expect(err.stage).toBe('research');
  });
});
