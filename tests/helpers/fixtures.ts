import { RateGate, type RetryPolicy } from '@pitchline/core';
import type { CallGuard } from '@pitchline/agents';
import {
  UNKNOWN,
  resolved,
  type BrandVoice,
  type Prospect,
  type ResearchRecord,
} from '@pitchline/schemas';
import { ManualClock } from './manual-clock';

export const brandVoice: BrandVoice = {
  name: 'Solo & Co.',
  tone: ['warm'],
  mission: 'We help people who live alone plan for one.',
  vision: '',
  pillars: ['community', 'financial independence'],
  signature: 'Best,\nSolo & Co.',
};

export function testGuard(
  clock = new ManualClock(),
  retry: RetryPolicy = { maxRetries: 2, backoffBaseMs: 10 },
): CallGuard {
  return { gate: RateGate.perMinute(1000, clock), retry, maxCallsPerStage: 6, clock };
}

export function makeProspect(overrides: Partial<Prospect> = {}): Prospect {
  return {
    itemId: 'item-1',
    name: 'Jane Doe',
    matchedName: resolved('Jane Doe'),
    outlet: resolved('The Daily Ledger'),
    beat: resolved('housing costs'),
    profileUrl: resolved('https://dailyledger.example/author/jane-doe'),
    email: UNKNOWN,
    keywords: ['housing costs'],
    confidence: { outlet: 'HIGH', beat: 'HIGH', profileUrl: 'MEDIUM', email: 'LOW' },
    citations: [],
    ...overrides,
  };
}

export function makeResearch(overrides: Partial<ResearchRecord> = {}): ResearchRecord {
  return {
    itemId: 'item-1',
    prospectName: 'Jane Doe',
    topics: ['housing costs'],
    summary: resolved('Jane Doe has recently covered housing costs (1 recent piece reviewed).'),
    angles: ['Housing costs through the lens of community'],
    latestPiece: resolved({
      title: 'Why rent keeps rising',
      url: 'https://dailyledger.example/2025/rent',
      snippet: 'Jane Doe writes about housing costs.',
    }),
    citations: [
      {
        url: 'https://dailyledger.example/2025/rent',
        description: 'Why rent keeps rising',
        supports: ['housing costs'],
      },
    ],
    hitCount: 1,
    ...overrides,
  };
}
