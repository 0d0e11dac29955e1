/**
 * Discovery Agent - Resolves a raw contact into a validated Prospect
 *
 * Responsibilities:
 * - Keep whatever the input already provides (HIGH confidence)
 * - Look up outlet / beat / profile URL when missing (MEDIUM confidence)
 * - Mark anything still unresolved as unknown (LOW confidence); never guess
 *
 * LLM Usage: None (search + pattern extraction)
 */

import { z } from 'zod';
import {
  prospectSchema,
  rawContactSchema,
  toField,
  type Citation,
  type Confidence,
  type Prospect,
  type RawContact,
} from '@pitchline/schemas';
import { BaseAgent } from '../shared/base-agent.js';
import type { AgentConfig, AgentContext, CallGuard } from '../shared/types.js';
import type { SearchClient, SearchHit } from '../search/types.js';
import {
  extractBeat,
  extractEmail,
  extractMatchedName,
  extractOutlet,
  extractProfileUrl,
  isHttpUrl,
  type Extracted,
} from './extract.js';

export const DISCOVERY_RESULT_LIMIT = 5;

export const DiscoveryInputSchema = z.object({
  itemId: z.string().min(1),
  contact: rawContactSchema,
});

export type DiscoveryInput = z.infer<typeof DiscoveryInputSchema>;

export interface DiscoveryAgentDeps {
  search: SearchClient;
  guard: CallGuard;
}

interface Draft {
  matchedName?: string;
  outlet?: string;
  beat?: string;
  profileUrl?: string;
  email?: string;
}

type DraftKey = keyof Draft;

export function discoveryQueries(contact: RawContact, outlet?: string): string[] {
  const base = [`"${contact.name}"`, outlet].filter(Boolean).join(' ');
  return [`${base} journalist`, `${base} covers`];
}

export class DiscoveryAgent extends BaseAgent<DiscoveryInput, Prospect> {
  config: AgentConfig = {
    name: 'DiscoveryAgent',
    description: 'Resolves journalist identity fields via guarded search lookups',
    version: '1.0.0',
    stage: 'discovery',
  };

  inputSchema = DiscoveryInputSchema;
  outputSchema = prospectSchema;

  constructor(private readonly deps: DiscoveryAgentDeps) {
    super();
  }

  protected async run(input: DiscoveryInput, _context: AgentContext): Promise<Prospect> {
    const { contact, itemId } = input;
    const calls = this.stageCaller(this.deps.guard);

    const draft: Draft = {
      outlet: contact.outlet,
      beat: contact.keywords[0],
      profileUrl: contact.profileUrl,
      email: contact.email,
    };
    const confidence: Record<'outlet' | 'beat' | 'profileUrl' | 'email', Confidence> = {
      outlet: draft.outlet ? 'HIGH' : 'LOW',
      beat: draft.beat ? 'HIGH' : 'LOW',
      profileUrl: draft.profileUrl ? 'HIGH' : 'LOW',
      email: draft.email ? 'HIGH' : 'LOW',
    };
    const citations = new Map<string, Citation>();

    const adopt = (key: DraftKey, found: Extracted<string> | undefined): void => {
      if (draft[key] !== undefined || !found) return;
      draft[key] = found.value;
      if (key !== 'matchedName') confidence[key] = 'MEDIUM';
      const existing = citations.get(found.hit.url);
      if (existing) {
        existing.supports.push(key);
      } else if (isHttpUrl(found.hit.url)) {
        citations.set(found.hit.url, {
          url: found.hit.url,
          description: found.hit.title || found.hit.url,
          supports: [key],
        });
      }
    };

    const needsLookup = () => !draft.outlet || !draft.beat || !draft.profileUrl;

    if (needsLookup()) {
      const queries = discoveryQueries(contact, draft.outlet);
      for (const [i, query] of queries.entries()) {
        // second query only helps the beat; skip it otherwise
        if (i > 0 && draft.beat) break;

        this.info(`Search: ${query}`);
        const hits: SearchHit[] = await calls.call(`lookup #${i + 1}`, () =>
          this.deps.search.lookup(query, DISCOVERY_RESULT_LIMIT),
        );
        this.debug(`Search returned ${hits.length} hit(s)`);
        if (hits.length === 0) break;

        adopt('profileUrl', extractProfileUrl(hits, contact.name));
        adopt('outlet', extractOutlet(hits, contact.name));
        adopt('beat', extractBeat(hits));
        adopt('email', extractEmail(hits));
        adopt('matchedName', extractMatchedName(hits, contact.name));

        if (!needsLookup()) break;
      }
    }

    const prospect: Prospect = {
      itemId,
      name: contact.name,
      matchedName: toField(draft.matchedName),
      outlet: toField(draft.outlet),
      beat: toField(draft.beat),
      profileUrl: toField(draft.profileUrl),
      email: toField(draft.email),
      keywords: contact.keywords,
      confidence,
      citations: [...citations.values()],
    };

    const unresolved = (['outlet', 'beat', 'profileUrl', 'email'] as const).filter(
      (key) => prospect[key].status === 'unknown',
    );
    if (unresolved.length > 0) {
      this.info(`Unresolved after ${calls.attempts} call(s): ${unresolved.join(', ')}`);
    }
    return prospect;
  }
}
