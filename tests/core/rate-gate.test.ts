import { describe, it, expect } from 'vitest';
import { RateGate } from '@pitchline/core';
import { ManualClock } from '../helpers/manual-clock';

describe('RateGate', () => {
  it('admits up to the limit without waiting', async () => {
    const clock = new ManualClock();
    const gate = RateGate.perMinute(5, clock);

    const waits = await Promise.all(Array.from({ length: 5 }, () => gate.acquire()));

    expect(waits).toEqual([0, 0, 0, 0, 0]);
    expect(gate.delayed).toBe(0);
    expect(clock.sleeps).toEqual([]);
  });

  it('delays exactly k of limit + k calls issued in one window', async () => {
    const clock = new ManualClock();
    const gate = RateGate.perMinute(4, clock);

    const waits = await Promise.all(Array.from({ length: 7 }, () => gate.acquire()));

    expect(waits.filter((w) => w > 0)).toHaveLength(3);
    expect(gate.delayed).toBe(3);
    expect(waits.slice(4)).toEqual([60_000, 60_000, 60_000]);
  });

  it('frees budget as the window slides', async () => {
    const clock = new ManualClock();
    const gate = new RateGate({ maxPerWindow: 1, windowMs: 1000, clock });

    await gate.acquire();
    clock.advance(1000);
    const wait = await gate.acquire();

    expect(wait).toBe(0);
    expect(gate.delayed).toBe(0);
  });

  it('rejects a non-positive or fractional limit', () => {
    expect(() => RateGate.perMinute(0)).toThrow(RangeError);
    expect(() => new RateGate({ maxPerWindow: 1.5 })).toThrow(RangeError);
  });
});
