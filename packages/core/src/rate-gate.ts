/**
 * Sliding-window rate gate shared by every chain of a run.
 *
 * Calls over budget wait for the window to admit them; the gate is a
 * throughput cap and never rejects. Admissions go through a promise chain so
 * that only one caller inspects or mutates the window at a time.
 */

import { systemClock, type Clock } from './clock';

export const ONE_MINUTE_MS = 60_000;

export interface RateGateOptions {
  /** Calls admitted per window. */
  maxPerWindow: number;
  windowMs?: number;
  clock?: Clock;
}

export class RateGate {
  readonly maxPerWindow: number;
  readonly windowMs: number;
  private readonly clock: Clock;
  private admitted: number[] = [];
  private queue: Promise<void> = Promise.resolve();
  private delayedCount = 0;

  constructor(options: RateGateOptions) {
    if (!Number.isInteger(options.maxPerWindow) || options.maxPerWindow < 1) {
      throw new RangeError(`maxPerWindow must be a positive integer, got ${options.maxPerWindow}`);
    }
    this.maxPerWindow = options.maxPerWindow;
    this.windowMs = options.windowMs ?? ONE_MINUTE_MS;
    this.clock = options.clock ?? systemClock;
  }

  static perMinute(callsPerMinute: number, clock?: Clock): RateGate {
    return new RateGate({ maxPerWindow: callsPerMinute, windowMs: ONE_MINUTE_MS, clock });
  }

  /**
   * Wait for budget, then claim one call slot.
   * Resolves with how long the caller was held back (ms).
   */
  acquire(): Promise<number> {
    const requestedAt = this.clock.now();
    const turn = this.queue.then(() => this.admit(requestedAt));
    this.queue = turn.then(
      () => undefined,
      () => undefined,
    );
    return turn;
  }

  /** Number of acquisitions that had to wait so far. */
  get delayed(): number {
    return this.delayedCount;
  }

  private async admit(requestedAt: number): Promise<number> {
    for (;;) {
      const now = this.clock.now();
      this.admitted = this.admitted.filter((t) => now - t < this.windowMs);
      if (this.admitted.length < this.maxPerWindow) {
        this.admitted.push(now);
        const waited = now - requestedAt;
        if (waited > 0) this.delayedCount++;
        return waited;
      }
      const oldest = Math.min(...this.admitted);
      await this.clock.sleep(oldest + this.windowMs - now);
    }
  }
}
