/**
 * Deterministic offline search stub.
 *
 * No network. The same seed and query always produce the same hits, within a
 * run and across runs, so pipelines can be exercised and tested offline.
 * Hit 0 is an author profile page; the remaining hits are articles.
 */

import { z } from 'zod';
import { slugify } from '@pitchline/core';
import corpusJson from './offline-corpus.json';
import type { SearchClient, SearchHit } from './types.js';

const OfflineCorpusSchema = z.object({
  outlets: z.array(z.string().min(1)).min(1),
  topics: z.array(z.string().min(1)).min(3),
  headlines: z.array(z.string().includes('{topic}')).min(1),
});

export type OfflineCorpus = z.infer<typeof OfflineCorpusSchema>;

const defaultCorpus = OfflineCorpusSchema.parse(corpusJson);

/** Upper bound on hits per query, whatever the requested limit. */
export const MAX_OFFLINE_HITS = 8;
const TOPICS_PER_QUERY = 3;
const FILLER_WORDS = new Set(['journalist', 'reporter', 'writer', 'covers', 'author', 'profile']);

export interface OfflineSearchOptions {
  seed?: number | string;
  corpus?: OfflineCorpus;
}

/** 32-bit FNV-1a hash. */
function hashString(input: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

/** mulberry32 PRNG: small, fast and reproducible. */
function createRng(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function pick<T>(items: readonly T[], rng: () => number): T {
  return items[Math.floor(rng() * items.length) % items.length];
}

function pickDistinct<T>(items: readonly T[], count: number, rng: () => number): T[] {
  const pool = [...items];
  const out: T[] = [];
  while (out.length < count && pool.length > 0) {
    const [item] = pool.splice(Math.floor(rng() * pool.length) % pool.length, 1);
    out.push(item);
  }
  return out;
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

/** Split a query into the quoted subject (a person) and the remaining free text. */
function parseQuery(query: string): { subject: string; rest: string } {
  const quoted = query.match(/"([^"]+)"/);
  if (quoted?.[1]) {
    const rest = query.replace(quoted[0], ' ');
    return { subject: quoted[1].trim(), rest: rest.replace(/\s+/g, ' ').trim() };
  }
  const words = query.split(' ');
  return { subject: words.slice(0, 2).join(' '), rest: words.slice(2).join(' ') };
}

export class OfflineSearchClient implements SearchClient {
  readonly provider = 'offline';
  private readonly seed: string;
  private readonly corpus: OfflineCorpus;

  constructor(options: OfflineSearchOptions = {}) {
    this.seed = String(options.seed ?? 0);
    this.corpus = options.corpus ? OfflineCorpusSchema.parse(options.corpus) : defaultCorpus;
  }

  async lookup(query: string, limit: number): Promise<SearchHit[]> {
    const normalized = query.replace(/\s+/g, ' ').trim();
    const count = Math.min(Math.max(0, Math.floor(limit)), MAX_OFFLINE_HITS);
    if (!normalized || count === 0) return [];

    const rng = createRng(hashString(`${this.seed}\u0000${normalized.toLowerCase()}`));
    const { subject, rest } = parseQuery(normalized);
    const outletText = rest
      .split(' ')
      .filter((w) => !FILLER_WORDS.has(w.toLowerCase()))
      .join(' ');
    const outlet = outletText || pick(this.corpus.outlets, rng);
    const domain = `${slugify(outlet).replace(/-/g, '') || 'news'}.example`;
    const topics = pickDistinct(this.corpus.topics, TOPICS_PER_QUERY, rng);
    const primaryTopic = topics[0] ?? 'current affairs';

    const hits: SearchHit[] = [
      {
        title: `${subject} | ${outlet}`,
        url: `https://${domain}/author/${slugify(subject) || 'staff'}`,
        snippet: `${subject} covers ${primaryTopic} for ${outlet}.`,
      },
    ];

    for (let i = 1; i < count; i++) {
      const topic = topics[(i - 1) % topics.length] ?? primaryTopic;
      const title = capitalize(pick(this.corpus.headlines, rng).replace('{topic}', topic));
      const year = 2020 + Math.floor(rng() * 6);
      hits.push({
        title,
        url: `https://${domain}/${year}/${slugify(title)}`,
        snippet: `${subject} looks at ${topic} and what it means for readers.`,
      });
    }

    return hits;
  }
}
