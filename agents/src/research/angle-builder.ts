/**
 * Angle Builder - turns research findings into pitchable story angles
 *
 * Deterministic: a follow-up on the latest piece when one is known, then each
 * topic crossed with the brand's pillars. Never invents facts beyond the
 * topics and titles it is given.
 */

import { MAX_ANGLES, type LatestPiece } from '@pitchline/schemas';
import { capitalize } from '../shared/text.js';

export interface AngleInput {
  topics: string[];
  latestPiece?: LatestPiece;
  pillars: string[];
  max?: number;
}

export function buildAngles(input: AngleInput): string[] {
  const max = input.max ?? MAX_ANGLES;
  const candidates: string[] = [];

  if (input.latestPiece) {
    candidates.push(`Follow-up on "${input.latestPiece.title}"`);
  }

  const { topics, pillars } = input;
  if (pillars.length === 0) {
    for (const topic of topics) candidates.push(`${capitalize(topic)}: what is changing now`);
  }
  // rotate pillars so each topic gets a different one first
  for (let round = 0; round < pillars.length; round++) {
    topics.forEach((topic, i) => {
      const pillar = pillars[(i + round) % pillars.length];
      candidates.push(`${capitalize(topic)} through the lens of ${pillar.toLowerCase()}`);
    });
  }

  const seen = new Set<string>();
  const angles: string[] = [];
  for (const angle of candidates) {
    const key = angle.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    angles.push(angle);
    if (angles.length >= max) break;
  }
  return angles;
}
