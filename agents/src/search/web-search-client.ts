/**
 * Live web search via SerpAPI (Google engine).
 *
 * Failures are classified so a guarded call can decide what to retry:
 * - network error / timeout / 5xx  -> SearchUnavailableError (retryable)
 * - 429                            -> RetryableError (provider throttling)
 * - other 4xx / provider error body -> NonRetryableError
 * Callers use returned URLs as citations; nothing is fetched here.
 */

import { z } from 'zod';
import { NonRetryableError, RetryableError, SearchUnavailableError } from '@pitchline/core';
import type { SearchClient, SearchHit } from './types.js';

const SERPAPI_BASE = 'https://serpapi.com/search';
const DEFAULT_NUM = 10;
const REQUEST_TIMEOUT_MS = 15_000;

/** SerpAPI answers an empty result page with an error string like this one. */
const NO_RESULTS_ERROR = /hasn't returned any results/i;

function isHttpLink(link: string): boolean {
  if (!URL.canParse(link)) return false;
  const { protocol } = new URL(link);
  return protocol === 'http:' || protocol === 'https:';
}

export interface WebSearchClientOptions {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
}

const SerpApiResponseSchema = z.object({
  organic_results: z
    .array(
      z.object({
        link: z.string().optional(),
        title: z.string().optional(),
        snippet: z.string().optional(),
      }),
    )
    .optional(),
  error: z.string().optional(),
});

type SerpApiResponse = z.infer<typeof SerpApiResponseSchema>;

export class WebSearchClient implements SearchClient {
  readonly provider = 'live';
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(options: WebSearchClientOptions) {
    const apiKey = options.apiKey?.trim();
    if (!apiKey) {
      throw new NonRetryableError('Live search requires a SerpAPI key (SERPAPI_KEY)');
    }
    this.apiKey = apiKey;
    this.baseUrl = options.baseUrl ?? SERPAPI_BASE;
    this.timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;
  }

  /**
   * Run a single Google search via SerpAPI and return organic result links.
   */
  async lookup(query: string, limit: number = DEFAULT_NUM): Promise<SearchHit[]> {
    const q = query.trim();
    if (!q || limit < 1) return [];

    const params = new URLSearchParams({
      engine: 'google',
      q,
      api_key: this.apiKey,
      num: String(Math.min(limit, 100)),
    });

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    let res: Response;
    try {
      res = await fetch(`${this.baseUrl}?${params.toString()}`, {
        method: 'GET',
        signal: controller.signal,
        headers: { Accept: 'application/json' },
      });
    } catch (err) {
      const reason = controller.signal.aborted
        ? `timed out after ${this.timeoutMs}ms`
        : err instanceof Error
          ? err.message
          : String(err);
      throw new SearchUnavailableError(`Search request failed: ${reason}`, { cause: err });
    } finally {
      clearTimeout(timeout);
    }

    if (res.status === 429) {
      throw new RetryableError('Search provider is throttling requests (429)');
    }
    if (res.status >= 500) {
      throw new SearchUnavailableError(`Search provider unavailable (${res.status})`);
    }
    if (!res.ok) {
      throw new NonRetryableError(`Search request rejected (${res.status})`);
    }

    let body: unknown;
    try {
      body = await res.json();
    } catch (err) {
      throw new SearchUnavailableError('Search provider returned malformed JSON', { cause: err });
    }
    const parsed = SerpApiResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new SearchUnavailableError('Search provider returned an unexpected payload');
    }
    const data: SerpApiResponse = parsed.data;

    if (data.error) {
      if (NO_RESULTS_ERROR.test(data.error)) return [];
      throw new NonRetryableError(`Search provider error: ${data.error}`);
    }
    const organic = data.organic_results;
    if (!Array.isArray(organic)) return [];

    const results: SearchHit[] = [];
    const seen = new Set<string>();

    for (const item of organic) {
      const link = item.link?.trim();
      if (!link || seen.has(link)) continue;
      if (!isHttpLink(link)) continue;
      seen.add(link);
      results.push({
        url: link,
        title: item.title?.trim() ?? '',
        snippet: item.snippet?.trim() ?? '',
      });
      if (results.length >= limit) break;
    }
    return results;
  }
}
