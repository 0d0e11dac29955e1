import { z } from 'zod';
import { citationSchema } from './contact';
import { draftStrategyEnum } from './enums';

export const MAX_SUBJECT_LENGTH = 180;

export const pitchRecordSchema = z.object({
  itemId: z.string().min(1),
  prospectName: z.string().min(1),
  slug: z.string().min(1),
  subject: z.string().trim().min(1).max(MAX_SUBJECT_LENGTH),
  body: z.string().trim().min(1),
  strategy: draftStrategyEnum,
  fallbackReason: z.string().nullable(),
  citations: z.array(citationSchema),
  /** Filled in by a human reviewer after the run, never by the pipeline. */
  reviewLabel: z.null(),
  createdAt: z.string().datetime(),
});

export type PitchRecord = z.infer<typeof pitchRecordSchema>;

export const pitchDraftSchema = z.object({
  subject: z.string().trim().min(1),
  body: z.string().trim().min(1),
});

export type PitchDraft = z.infer<typeof pitchDraftSchema>;
