/**
 * Topic extraction over article hits.
 *
 * Phrases come first: the prospect's own beat and keywords when the articles
 * mention them, then phrases introduced by cues like "writes about". Single
 * terms ranked by frequency are used only when no phrase is found.
 */

import { z } from 'zod';
import { MAX_TOPICS } from '@pitchline/schemas';
import stopwordsJson from './stopwords.json';
import type { SearchHit } from '../search/types.js';

const STOPWORDS: ReadonlySet<string> = new Set(z.array(z.string()).parse(stopwordsJson));

const CUE_PHRASE =
  /\b(?:covers|covering|reports on|reporting on|writes about|writing about|looks at)\s+(.+?)(?=\s+(?:for|and|in|at|with)\s|[.;,:!?|]|$)/gi;
const MAX_PHRASE_WORDS = 4;
const MIN_TERM_LENGTH = 4;

export interface TopicOptions {
  /** Phrases the prospect is already known for (beat, keywords). */
  seeds?: string[];
  /** Text whose words must never become a topic (name, outlet). */
  exclude?: string[];
  max?: number;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function normalize(value: string): string {
  return value.toLowerCase().replace(/\s+/g, ' ').trim();
}

export function hitText(hit: SearchHit): string {
  return normalize(`${hit.title} ${hit.snippet}`);
}

/** Whole-word, case-insensitive containment. */
export function mentionsTopic(text: string, topic: string): boolean {
  const pattern = new RegExp(`(^|[^a-z0-9])${escapeRegExp(normalize(topic))}($|[^a-z0-9])`);
  return pattern.test(normalize(text));
}

/** Word runs over the same [a-z0-9] boundaries mentionsTopic uses; bare numbers are dropped. */
export function tokenize(text: string): string[] {
  const tokens = normalize(text).match(/[a-z0-9][a-z0-9'-]*[a-z0-9]/g) ?? [];
  return tokens.filter((token) => /[a-z]/.test(token));
}

function cuePhrases(text: string): string[] {
  const phrases: string[] = [];
  for (const match of text.matchAll(CUE_PHRASE)) {
    const phrase = normalize(match[1] ?? '').replace(/^(?:the|a|an)\s+/, '');
    const words = phrase.split(' ');
    if (phrase.length < 3 || words.length > MAX_PHRASE_WORDS) continue;
    if (words.every((w) => STOPWORDS.has(w))) continue;
    phrases.push(phrase);
  }
  return phrases;
}

/** Rank candidates by how many texts mention them; ties keep first appearance. */
function rankByCoverage(candidates: string[], texts: string[]): string[] {
  const counts = new Map<string, number>();
  for (const candidate of candidates) {
    if (counts.has(candidate)) continue;
    const count = texts.filter((t) => mentionsTopic(t, candidate)).length;
    if (count > 0) counts.set(candidate, count);
  }
  return [...counts.entries()]
    .map(([topic, count], order) => ({ topic, count, order }))
    .sort((a, b) => b.count - a.count || a.order - b.order)
    .map((entry) => entry.topic);
}

function rankTerms(texts: string[], excluded: ReadonlySet<string>): string[] {
  const counts = new Map<string, number>();
  for (const token of texts.flatMap(tokenize)) {
    if (token.length < MIN_TERM_LENGTH || STOPWORDS.has(token) || excluded.has(token)) continue;
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }
  return [...counts.entries()]
    .map(([topic, count], order) => ({ topic, count, order }))
    .sort((a, b) => b.count - a.count || a.order - b.order)
    .map((entry) => entry.topic);
}

export function extractTopics(articles: SearchHit[], options: TopicOptions = {}): string[] {
  const max = options.max ?? MAX_TOPICS;
  const texts = articles.map(hitText);
  const excludedText = (options.exclude ?? []).map(normalize).filter(Boolean);
  const excludedTokens = new Set(excludedText.flatMap(tokenize));

  const candidates = [
    ...(options.seeds ?? []).map(normalize).filter(Boolean),
    ...articles.flatMap((hit) => cuePhrases(`${hit.title}. ${hit.snippet}`)),
  ].filter((phrase) => !excludedText.includes(phrase));

  const phrases = rankByCoverage(candidates, texts);
  if (phrases.length > 0) return phrases.slice(0, max);
  return rankTerms(texts, excludedTokens).slice(0, max);
}
