/**
 * Deterministic pitch template.
 *
 * Used when no generation credential is configured, and as the fallback when
 * generation fails. Unknown fields are left out of the copy, never printed.
 */

import { fieldValue, type PitchDraft } from '@pitchline/schemas';
import type { DraftInput, DraftStrategy } from './types.js';
import { capitalize, clampSubject, firstName, joinList } from '../shared/text.js';

const MAX_PROOF_POINTS = 3;

export function pitchSubject({ research, brandVoice }: DraftInput): string {
  const angle = research.angles[0];
  if (angle) return clampSubject(`Story idea: ${capitalize(angle)}`);
  return clampSubject(`Story idea from ${brandVoice.name}`);
}

export function pitchBody({ prospect, research, brandVoice }: DraftInput): string {
  const paragraphs: string[] = [`Hi ${firstName(prospect.name)},`];

  const latest = fieldValue(research.latestPiece);
  const outlet = fieldValue(prospect.outlet);
  if (latest) {
    paragraphs.push(
      `I read your recent piece "${latest.title}"${outlet ? ` for ${outlet}` : ''} and it stayed with me.`,
    );
  }

  const beat = fieldValue(prospect.beat);
  if (research.topics.length > 0) {
    paragraphs.push(`Your coverage of ${joinList(research.topics)} is why I'm writing.`);
  } else if (beat) {
    paragraphs.push(`Your coverage of ${beat} is why I'm writing.`);
  }

  const angle = research.angles[0];
  paragraphs.push(
    angle
      ? `I'm reaching out on behalf of ${brandVoice.name} with a story idea: ${angle}.`
      : `I'm reaching out on behalf of ${brandVoice.name} with a story idea your readers may enjoy.`,
  );

  if (brandVoice.mission) paragraphs.push(brandVoice.mission);

  const proof = brandVoice.pillars.slice(0, MAX_PROOF_POINTS);
  if (proof.length > 0) {
    paragraphs.push(
      ['What we can bring to the story:', ...proof.map((pillar) => `- ${capitalize(pillar)}`)].join('\n'),
    );
  }

  paragraphs.push(
    'Would a short call or a few written answers be useful? Happy to share data, examples or people to speak with.',
  );
  paragraphs.push(brandVoice.signature ?? `Best regards,\n${brandVoice.name}`);

  return paragraphs.join('\n\n');
}

export class TemplateDraftStrategy implements DraftStrategy {
  readonly kind = 'TEMPLATE' as const;

  async generate(input: DraftInput): Promise<PitchDraft> {
    return { subject: pitchSubject(input), body: pitchBody(input) };
  }
}
