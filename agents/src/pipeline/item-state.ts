/**
 * Per-item lifecycle. Transitions only move forward; anything else is a bug
 * in the orchestrator and throws.
 */

import { z } from 'zod';

export const itemStateEnum = z.enum([
  'PENDING',
  'DISCOVERING',
  'RESEARCHING',
  'DRAFTING',
  'DONE',
  'FAILED',
  'CANCELLED',
]);

export type ItemState = z.infer<typeof itemStateEnum>;

const TRANSITIONS: Record<ItemState, readonly ItemState[]> = {
  PENDING: ['DISCOVERING', 'CANCELLED'],
  DISCOVERING: ['RESEARCHING', 'FAILED'],
  RESEARCHING: ['DRAFTING', 'FAILED'],
  DRAFTING: ['DONE', 'FAILED'],
  DONE: [],
  FAILED: [],
  CANCELLED: [],
};

export class IllegalTransitionError extends Error {
  constructor(
    readonly from: ItemState,
    readonly to: ItemState,
  ) {
    super(`Illegal item transition ${from} -> ${to}`);
    this.name = 'IllegalTransitionError';
  }
}

export function canTransition(from: ItemState, to: ItemState): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminal(state: ItemState): boolean {
  return TRANSITIONS[state].length === 0;
}

export class ItemTracker {
  private current: ItemState = 'PENDING';
  private readonly path: ItemState[] = ['PENDING'];

  get state(): ItemState {
    return this.current;
  }

  get history(): ItemState[] {
    return [...this.path];
  }

  transition(next: ItemState): void {
    if (!canTransition(this.current, next)) {
      throw new IllegalTransitionError(this.current, next);
    }
    this.current = next;
    this.path.push(next);
  }
}
