/**
 * Pure helpers that pull identity fields out of search hits.
 * Each returns the value plus the hit it came from, so callers can cite it.
 */

import { httpUrlSchema } from '@pitchline/schemas';
import type { SearchHit } from '../search/types.js';

export interface Extracted<T> {
  value: T;
  hit: SearchHit;
}

const PROFILE_PATH = /\/(author|authors|profile|profiles|people|staff|contributor|contributors|writers?)\//i;
const BEAT_CUE =
  /\b(?:covers|covering|reports on|reporting on|writes about|writing about)\s+(.+?)(?=\s+(?:for|at|and)\s|[.;|]|$)/i;
const EMAIL = /[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/;
const TITLE_SEPARATOR = /\s+[|–—-]\s+/;

export function isHttpUrl(url: string): boolean {
  return httpUrlSchema.safeParse(url).success;
}

function mentions(text: string, name: string): boolean {
  return text.toLowerCase().includes(name.toLowerCase());
}

/** Author / staff page rather than a piece of work. */
export function isProfileHit(hit: SearchHit, name: string): boolean {
  if (!isHttpUrl(hit.url)) return false;
  if (PROFILE_PATH.test(new URL(hit.url).pathname + '/')) return true;
  return mentions(hit.title, name) && /\bprofile\b/i.test(hit.title);
}

export function findProfileHit(hits: SearchHit[], name: string): SearchHit | undefined {
  return hits.find((hit) => isProfileHit(hit, name));
}

export function extractProfileUrl(hits: SearchHit[], name: string): Extracted<string> | undefined {
  const hit = findProfileHit(hits, name);
  return hit ? { value: hit.url, hit } : undefined;
}

/**
 * Outlet from a profile title such as "Jane Doe | The Daily Ledger".
 * Only trusted when the title names the person.
 */
export function extractOutlet(hits: SearchHit[], name: string): Extracted<string> | undefined {
  const hit = findProfileHit(hits, name);
  if (!hit || !mentions(hit.title, name)) return undefined;
  const parts = hit.title.split(TITLE_SEPARATOR).map((p) => p.trim()).filter(Boolean);
  const outlet = parts.length > 1 ? parts[parts.length - 1] : undefined;
  if (!outlet || mentions(outlet, name) || /\bprofile\b/i.test(outlet)) return undefined;
  return { value: outlet, hit };
}

export function extractBeat(hits: SearchHit[]): Extracted<string> | undefined {
  for (const hit of hits) {
    const match = hit.snippet.match(BEAT_CUE);
    const beat = match?.[1]?.trim().toLowerCase();
    if (beat && beat.length <= 60) return { value: beat, hit };
  }
  return undefined;
}

export function extractEmail(hits: SearchHit[]): Extracted<string> | undefined {
  for (const hit of hits) {
    const match = `${hit.title} ${hit.snippet}`.match(EMAIL);
    if (match) return { value: match[0], hit };
  }
  return undefined;
}

/** Spelling of the name as it appears in the profile title ("JANE DOE" stays "JANE DOE"). */
export function extractMatchedName(hits: SearchHit[], name: string): Extracted<string> | undefined {
  const lower = name.toLowerCase();
  for (const hit of hits) {
    const idx = hit.title.toLowerCase().indexOf(lower);
    if (idx >= 0) return { value: hit.title.slice(idx, idx + name.length), hit };
  }
  return undefined;
}
