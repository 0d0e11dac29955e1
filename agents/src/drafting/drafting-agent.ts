/**
 * Drafting Agent - Turns a prospect and its research into a pitch record
 *
 * Responsibilities:
 * - Run the configured draft strategy (template or generative)
 * - Attach the research citations and the run-unique slug
 * - Leave the review label empty for a human reviewer
 *
 * LLM Usage: Only through GenerativeDraftStrategy
 */

import { z } from 'zod';
import {
  brandVoiceSchema,
  pitchRecordSchema,
  prospectSchema,
  researchRecordSchema,
  type Citation,
  type PitchRecord,
} from '@pitchline/schemas';
import { BaseAgent } from '../shared/base-agent.js';
import type { AgentConfig, AgentContext } from '../shared/types.js';
import type { DraftStrategy } from './types.js';

export const DraftingInputSchema = z.object({
  prospect: prospectSchema,
  research: researchRecordSchema,
  brandVoice: brandVoiceSchema,
  slug: z.string().min(1),
  /** Set when this draft replaces a failed generative attempt. */
  fallbackReason: z.string().nullable().default(null),
});

export type DraftingInput = z.infer<typeof DraftingInputSchema>;

export interface DraftingAgentDeps {
  strategy: DraftStrategy;
  now?: () => Date;
}

/** Research citations first, then discovery citations, one entry per URL. */
export function mergeCitations(...groups: Citation[][]): Citation[] {
  const byUrl = new Map<string, Citation>();
  for (const citation of groups.flat()) {
    const existing = byUrl.get(citation.url);
    if (!existing) {
      byUrl.set(citation.url, { ...citation, supports: [...citation.supports] });
      continue;
    }
    for (const claim of citation.supports) {
      if (!existing.supports.includes(claim)) existing.supports.push(claim);
    }
  }
  return [...byUrl.values()];
}

export class DraftingAgent extends BaseAgent<DraftingInput, PitchRecord> {
  config: AgentConfig = {
    name: 'DraftingAgent',
    description: 'Drafts a personalized Markdown pitch',
    version: '1.0.0',
    stage: 'drafting',
  };

  inputSchema = DraftingInputSchema;
  outputSchema = pitchRecordSchema;

  constructor(private readonly deps: DraftingAgentDeps) {
    super();
  }

  get strategy(): DraftStrategy {
    return this.deps.strategy;
  }

  protected async run(input: DraftingInput, _context: AgentContext): Promise<PitchRecord> {
    const { prospect, research, brandVoice, slug, fallbackReason } = input;
    const { strategy } = this.deps;

    this.info(`Drafting with ${strategy.kind.toLowerCase()} strategy`);
    const draft = await strategy.generate({ prospect, research, brandVoice });

    return {
      itemId: prospect.itemId,
      prospectName: prospect.name,
      slug,
      subject: draft.subject,
      body: draft.body,
      strategy: strategy.kind,
      fallbackReason,
      citations: mergeCitations(research.citations, prospect.citations),
      reviewLabel: null,
      createdAt: (this.deps.now ?? (() => new Date()))().toISOString(),
    };
  }
}
