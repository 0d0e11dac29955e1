/**
 * Search providers
 *
 * - OfflineSearchClient: deterministic, seedable stub (no network)
 * - WebSearchClient: SerpAPI-backed live search
 */

import { NonRetryableError } from '@pitchline/core';
import type { SearchProvider } from '@pitchline/schemas';
import { OfflineSearchClient } from './offline-search-client.js';
import { WebSearchClient } from './web-search-client.js';
import type { SearchClient } from './types.js';

export * from './types.js';
export * from './offline-search-client.js';
export * from './web-search-client.js';

export interface CreateSearchClientOptions {
  apiKey?: string;
  seed?: number | string;
}

export function createSearchClient(
  provider: SearchProvider,
  options: CreateSearchClientOptions = {},
): SearchClient {
  switch (provider) {
    case 'offline':
      return new OfflineSearchClient({ seed: options.seed });
    case 'live':
      if (!options.apiKey) {
        throw new NonRetryableError('search provider "live" needs an API key');
      }
      return new WebSearchClient({ apiKey: options.apiKey });
  }
}
