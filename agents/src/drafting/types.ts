/**
 * Drafting types
 */

import type { BrandVoice, DraftStrategyKind, PitchDraft, Prospect, ResearchRecord } from '@pitchline/schemas';

export interface DraftInput {
  prospect: Prospect;
  research: ResearchRecord;
  brandVoice: BrandVoice;
}

/** Produces subject + body for one prospect. Selected once per run. */
export interface DraftStrategy {
  readonly kind: DraftStrategyKind;
  generate(input: DraftInput): Promise<PitchDraft>;
}

/** Anything that turns a prompt into text; the Ollama client in production. */
export interface TextGenerator {
  generate(prompt: string, options?: { system?: string }): Promise<string>;
}
