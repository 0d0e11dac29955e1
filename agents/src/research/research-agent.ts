/**
 * Research Agent - Builds a cited research record for one prospect
 *
 * Responsibilities:
 * - One guarded search for the prospect's recent work
 * - Drop unverifiable hits (bad URLs), duplicates and profile pages
 * - Extract topics, identify the latest piece, compose summary and angles
 * - Cite only articles that back a recorded topic
 *
 * Zero usable hits is a valid outcome: empty lists, unknown summary.
 *
 * LLM Usage: None
 */

import { z } from 'zod';
import {
  brandVoiceSchema,
  fieldValue,
  prospectSchema,
  researchRecordSchema,
  toField,
  type Citation,
  type LatestPiece,
  type Prospect,
  type ResearchRecord,
} from '@pitchline/schemas';
import { BaseAgent } from '../shared/base-agent.js';
import type { AgentConfig, AgentContext, CallGuard } from '../shared/types.js';
import type { SearchClient, SearchHit } from '../search/types.js';
import { isHttpUrl, isProfileHit } from '../discovery/extract.js';
import { extractTopics, hitText, mentionsTopic } from './topics.js';
import { buildAngles } from './angle-builder.js';
import { joinList } from '../shared/text.js';

export const RESEARCH_RESULT_LIMIT = 8;
export const MAX_QUERY_KEYWORDS = 6;

export const ResearchInputSchema = z.object({
  prospect: prospectSchema,
  brandVoice: brandVoiceSchema,
});

export type ResearchInput = z.infer<typeof ResearchInputSchema>;

export interface ResearchAgentDeps {
  search: SearchClient;
  guard: CallGuard;
}

export function researchQuery(prospect: Prospect): string {
  const keywords = prospect.keywords.length > 0 ? prospect.keywords : [fieldValue(prospect.beat)];
  return [
    `"${prospect.name}"`,
    fieldValue(prospect.outlet),
    ...keywords.slice(0, MAX_QUERY_KEYWORDS),
  ]
    .filter((part): part is string => Boolean(part))
    .join(' ');
}

/** Hits that count as the prospect's work: valid, unique, not profile pages. */
export function usableArticles(hits: SearchHit[], name: string): SearchHit[] {
  const seen = new Set<string>();
  return hits.filter((hit) => {
    if (!hit.title.trim() || !isHttpUrl(hit.url)) return false;
    if (isProfileHit(hit, name)) return false;
    if (seen.has(hit.url)) return false;
    seen.add(hit.url);
    return true;
  });
}

export function composeSummary(
  name: string,
  topics: string[],
  articleCount: number,
  latest: LatestPiece | undefined,
): string | undefined {
  if (articleCount === 0) return undefined;
  const pieces = `${articleCount} recent piece${articleCount === 1 ? '' : 's'} reviewed`;
  const lead =
    topics.length > 0
      ? `${name} has recently covered ${joinList(topics)} (${pieces}).`
      : `${name} has recent work on record (${pieces}).`;
  return latest ? `${lead} Latest: "${latest.title}".` : lead;
}

export class ResearchAgent extends BaseAgent<ResearchInput, ResearchRecord> {
  config: AgentConfig = {
    name: 'ResearchAgent',
    description: "Researches a journalist's recent work into a cited record",
    version: '1.0.0',
    stage: 'research',
  };

  inputSchema = ResearchInputSchema;
  outputSchema = researchRecordSchema;

  constructor(private readonly deps: ResearchAgentDeps) {
    super();
  }

  protected async run(input: ResearchInput, _context: AgentContext): Promise<ResearchRecord> {
    const { prospect, brandVoice } = input;
    const calls = this.stageCaller(this.deps.guard);

    const query = researchQuery(prospect);
    this.info(`Search: ${query}`);
    const hits = await calls.call('research lookup', () =>
      this.deps.search.lookup(query, RESEARCH_RESULT_LIMIT),
    );

    const articles = usableArticles(hits, prospect.name);
    this.debug(`Kept ${articles.length} of ${hits.length} hit(s) as articles`);

    const topics = extractTopics(articles, {
      seeds: [fieldValue(prospect.beat) ?? '', ...prospect.keywords],
      exclude: [prospect.name, fieldValue(prospect.outlet) ?? ''],
    });

    const citations: Citation[] = [];
    for (const hit of articles) {
      const text = hitText(hit);
      const supports = topics.filter((topic) => mentionsTopic(text, topic));
      if (supports.length === 0) continue;
      citations.push({ url: hit.url, description: hit.title, supports });
    }

    const first = articles[0];
    const latest: LatestPiece | undefined = first
      ? { title: first.title.trim(), url: first.url, snippet: first.snippet }
      : undefined;

    const angles = buildAngles({ topics, latestPiece: latest, pillars: brandVoice.pillars });

    if (articles.length === 0) {
      this.info('No usable hits; research left unknown');
    }

    return {
      itemId: prospect.itemId,
      prospectName: prospect.name,
      topics,
      summary: toField(composeSummary(prospect.name, topics, articles.length, latest)),
      angles,
      latestPiece: toField(latest),
      citations,
      hitCount: articles.length,
    };
  }
}
