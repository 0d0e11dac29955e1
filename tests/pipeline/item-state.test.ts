import { describe, it, expect } from 'vitest';
import { IllegalTransitionError, ItemTracker, canTransition, isTerminal } from '@pitchline/agents';

describe('ItemTracker', () => {
  it('walks the happy path and records it', () => {
    const tracker = new ItemTracker();
    tracker.transition('DISCOVERING');
    tracker.transition('RESEARCHING');
    tracker.transition('DRAFTING');
    tracker.transition('DONE');

    expect(tracker.state).toBe('DONE');
    expect(tracker.history).toEqual(['PENDING', 'DISCOVERING', 'RESEARCHING', 'DRAFTING', 'DONE']);
  });

  it('rejects skipped stages and moves out of a terminal state', () => {
    const tracker = new ItemTracker();
    expect(() => tracker.transition('DRAFTING')).toThrow('Illegal item transition PENDING -> DRAFTING');

    tracker.transition('DISCOVERING');
    tracker.transition('FAILED');
    expect(() => tracker.transition('RESEARCHING')).toThrow(IllegalTransitionError);
    expect(tracker.history).toEqual(['PENDING', 'DISCOVERING', 'FAILED']);
  });

  it('only cancels items that never started', () => {
    expect(canTransition('PENDING', 'CANCELLED')).toBe(true);
    expect(canTransition('DISCOVERING', 'CANCELLED')).toBe(false);
  });

  it('knows the terminal states', () => {
    expect(isTerminal('DONE')).toBe(true);
    expect(isTerminal('FAILED')).toBe(true);
    expect(isTerminal('CANCELLED')).toBe(true);
    expect(isTerminal('DRAFTING')).toBe(false);
  });

  it('hands out copies of its history', () => {
    const tracker = new ItemTracker();
    tracker.history.push('DONE');
    expect(tracker.history).toEqual(['PENDING']);
  });
});
