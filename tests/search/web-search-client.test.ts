import { describe, it, expect, vi, afterEach } from 'vitest';
import { WebSearchClient } from '@pitchline/agents';
import {
  NonRetryableError,
  RetryableError,
  SearchUnavailableError,
} from '@pitchline/core';

function stubFetch(impl: typeof fetch) {
  const fetchMock = vi.fn<typeof fetch>(impl);
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status });
}

const client = () => new WebSearchClient({ apiKey: 'test-secret', baseUrl: 'https://search.test/search' });

describe('WebSearchClient', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('refuses to start without a key', () => {
    expect(() => new WebSearchClient({ apiKey: ' ' })).toThrow(NonRetryableError);
  });

  it('queries the Google engine and maps organic results', async () => {
    const fetchMock = stubFetch(async () =>
      json({
        organic_results: [
          { link: 'https://a.example/1', title: ' First ', snippet: 'one' },
          { link: 'https://a.example/1', title: 'Duplicate', snippet: 'dup' },
          { link: 'ftp://a.example/file', title: 'FTP', snippet: '' },
          { title: 'No link' },
          { link: 'https://b.example/2', title: 'Second' },
          { link: 'https://c.example/3', title: 'Third' },
        ],
      }),
    );

    const hits = await client().lookup('"Jane Doe" journalist', 2);

    expect(hits).toEqual([
      { url: 'https://a.example/1', title: 'First', snippet: 'one' },
      { url: 'https://b.example/2', title: 'Second', snippet: '' },
    ]);
    const url = new URL(String(fetchMock.mock.calls[0]?.[0]));
    expect(url.searchParams.get('engine')).toBe('google');
    expect(url.searchParams.get('q')).toBe('"Jane Doe" journalist');
  });

  it('treats throttling as retryable', async () => {
    stubFetch(async () => new Response('slow down', { status: 429 }));
    const err = await client()
      .lookup('q', 5)
      .catch((e: unknown) => e);
    expect(err).toBeInstanceOf(RetryableError);
    expect(err).not.toBeInstanceOf(SearchUnavailableError);
  });

  it('treats server errors and network failures as provider outages', async () => {
    stubFetch(async () => new Response('down', { status: 503 }));
    await expect(client().lookup('q', 5)).rejects.toBeInstanceOf(SearchUnavailableError);

    stubFetch(async () => {
      throw new TypeError('fetch failed');
    });
    await expect(client().lookup('q', 5)).rejects.toBeInstanceOf(SearchUnavailableError);
  });

  it('maps the provider no-results error to an empty list', async () => {
    stubFetch(async () => json({ error: "Google hasn't returned any results for this query." }));
    expect(await client().lookup('q', 5)).toEqual([]);
  });

  it('fails other provider errors without retry', async () => {
    stubFetch(async () => json({ error: 'Invalid API key.' }));
    await expect(client().lookup('q', 5)).rejects.toBeInstanceOf(NonRetryableError);

    stubFetch(async () => new Response('bad', { status: 400 }));
    await expect(client().lookup('q', 5)).rejects.toBeInstanceOf(NonRetryableError);
  });
});
