/**
 * Search abstraction shared by discovery and research.
 */

import { z } from 'zod';

export const SearchHitSchema = z.object({
  title: z.string(),
  url: z.string(),
  snippet: z.string(),
});

export type SearchHit = z.infer<typeof SearchHitSchema>;

/**
 * Capability every search provider offers. Implementations keep no cache that
 * a caller could observe; transport problems are thrown as SearchUnavailableError.
 */
export interface SearchClient {
  readonly provider: string;
  lookup(query: string, limit: number): Promise<SearchHit[]>;
}
