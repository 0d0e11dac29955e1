import { describe, it, expect } from 'vitest';
import {
  DiscoveryAgent,
  extractBeat,
  extractEmail,
  extractOutlet,
  extractProfileUrl,
} from '@pitchline/agents';
import { NonRetryableError, SearchUnavailableError } from '@pitchline/core';
import { ScriptedSearchClient } from '../helpers/fake-search';
import { testGuard } from '../helpers/fixtures';

const profileHit = {
  title: 'Jane Doe | The Daily Ledger',
  url: 'https://dailyledger.example/author/jane-doe',
  snippet: 'Jane Doe covers housing policy for The Daily Ledger. Reach her at jane@dailyledger.example',
};

describe('discovery extraction', () => {
  it('recognises author pages by path', () => {
    const hits = [
      { title: 'Rent is up', url: 'https://x.example/2025/rent', snippet: '' },
      { title: 'Sam Rivera', url: 'https://x.example/staff/sam-rivera', snippet: '' },
    ];
    expect(extractProfileUrl(hits, 'Sam Rivera')?.value).toBe('https://x.example/staff/sam-rivera');
  });

  it('reads the outlet from the trailing title segment', () => {
    expect(extractOutlet([profileHit], 'Jane Doe')?.value).toBe('The Daily Ledger');
    const dashed = { ...profileHit, title: 'Jane Doe - Metro Weekly' };
    expect(extractOutlet([dashed], 'Jane Doe')?.value).toBe('Metro Weekly');
  });

  it('reads the beat after a coverage cue', () => {
    expect(extractBeat([profileHit])?.value).toBe('housing policy');
  });

  it('harvests a public email address', () => {
    expect(extractEmail([profileHit])?.value).toBe('jane@dailyledger.example');
  });
});

describe('DiscoveryAgent', () => {
  it('makes no lookups when outlet, beat and profile URL are supplied', async () => {
    const search = new ScriptedSearchClient(() => [profileHit]);
    const agent = new DiscoveryAgent({ search, guard: testGuard() });

    const result = await agent.execute({
      itemId: 'item-1',
      contact: {
        name: 'Jane Doe',
        outlet: 'The Daily Ledger',
        keywords: ['housing'],
        profileUrl: 'https://dailyledger.example/author/jane-doe',
        email: 'jane@dailyledger.example',
      },
    });

    expect(search.queries).toEqual([]);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.data.outlet).toEqual({ status: 'resolved', value: 'The Daily Ledger' });
    expect(result.data.beat).toEqual({ status: 'resolved', value: 'housing' });
    expect(result.data.confidence).toEqual({
      outlet: 'HIGH',
      beat: 'HIGH',
      profileUrl: 'HIGH',
      email: 'HIGH',
    });
    expect(result.data.matchedName).toEqual({ status: 'unknown' });
  });

  it('resolves missing fields from search with medium confidence and cites the source', async () => {
    const search = new ScriptedSearchClient(() => [profileHit]);
    const agent = new DiscoveryAgent({ search, guard: testGuard() });

    const result = await agent.execute({ itemId: 'item-1', contact: { name: 'Jane Doe' } });

    expect(search.queries).toEqual(['"Jane Doe" journalist']);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    const prospect = result.data;
    expect(prospect.outlet).toEqual({ status: 'resolved', value: 'The Daily Ledger' });
    expect(prospect.beat).toEqual({ status: 'resolved', value: 'housing policy' });
    expect(prospect.profileUrl).toEqual({ status: 'resolved', value: profileHit.url });
    expect(prospect.email).toEqual({ status: 'resolved', value: 'jane@dailyledger.example' });
    expect(prospect.matchedName).toEqual({ status: 'resolved', value: 'Jane Doe' });
    expect(prospect.confidence).toEqual({
      outlet: 'MEDIUM',
      beat: 'MEDIUM',
      profileUrl: 'MEDIUM',
      email: 'MEDIUM',
    });
    expect(prospect.citations).toEqual([
      {
        url: profileHit.url,
        description: profileHit.title,
        supports: ['profileUrl', 'outlet', 'beat', 'email', 'matchedName'],
      },
    ]);
  });

  it('issues the coverage query only while the beat is still missing', async () => {
    const search = new ScriptedSearchClient((query) =>
      query.endsWith('journalist')
        ? [
            {
              title: 'Sam Rivera - Metro Weekly',
              url: 'https://metroweekly.example/staff/sam-rivera',
              snippet: 'Staff page.',
            },
          ]
        : [
            {
              title: 'Sam Rivera on rent',
              url: 'https://metroweekly.example/2025/rent',
              snippet: 'Sam Rivera writes about housing costs and rent control.',
            },
          ],
    );
    const agent = new DiscoveryAgent({ search, guard: testGuard() });

    const result = await agent.execute({
      itemId: 'item-2',
      contact: { name: 'Sam Rivera', outlet: 'Metro Weekly' },
    });

    expect(search.queries).toEqual([
      '"Sam Rivera" Metro Weekly journalist',
      '"Sam Rivera" Metro Weekly covers',
    ]);
    expect(result.ok && result.data.beat).toEqual({ status: 'resolved', value: 'housing costs' });
  });

  it('marks fields unknown when search finds nothing', async () => {
    const search = new ScriptedSearchClient(() => []);
    const agent = new DiscoveryAgent({ search, guard: testGuard() });

    const result = await agent.execute({ itemId: 'item-3', contact: { name: 'Nobody Known' } });

    expect(search.queries).toHaveLength(1);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    for (const field of ['matchedName', 'outlet', 'beat', 'profileUrl', 'email'] as const) {
      expect(result.data[field]).toEqual({ status: 'unknown' });
    }
    expect(result.data.confidence.beat).toBe('LOW');
    expect(result.data.citations).toEqual([]);
  });

  it('fails invalid input without calling search', async () => {
    const search = new ScriptedSearchClient(() => []);
    const agent = new DiscoveryAgent({ search, guard: testGuard() });

    const result = await agent.execute({ itemId: 'item-4', contact: { name: '' } });

    expect(search.queries).toEqual([]);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.failure.stage).toBe('discovery');
    expect(result.failure.kind).toBe('NON_RETRYABLE');
    expect(result.failure.message).toMatch(/^Invalid input: /);
  });

  it('reports a non-retryable search error as a stage failure', async () => {
    const search = new ScriptedSearchClient(() => {
      throw new NonRetryableError('Search request rejected (400)');
    });
    const agent = new DiscoveryAgent({ search, guard: testGuard() });

    const result = await agent.execute({ itemId: 'item-5', contact: { name: 'Jane Doe' } });

    expect(search.queries).toHaveLength(1);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.failure).toEqual({
      stage: 'discovery',
      kind: 'NON_RETRYABLE',
      message: 'Search request rejected (400)',
      attempts: 1,
    });
  });

  it('retries a provider outage before failing the stage', async () => {
    const search = new ScriptedSearchClient(() => {
      throw new SearchUnavailableError('Search provider unavailable (503)');
    });
    const agent = new DiscoveryAgent({ search, guard: testGuard() });

    const result = await agent.execute({ itemId: 'item-6', contact: { name: 'Jane Doe' } });

    expect(search.queries).toHaveLength(3);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.failure.kind).toBe('SEARCH_UNAVAILABLE');
    expect(result.failure.attempts).toBe(3);
  });
});
