import { z } from 'zod';
import { citationSchema, httpUrlSchema } from './contact';
import { fieldSchema } from './field';

export const MAX_TOPICS = 5;
export const MAX_ANGLES = 5;

export const latestPieceSchema = z.object({
  title: z.string().min(1),
  url: httpUrlSchema,
  snippet: z.string(),
});

export type LatestPiece = z.infer<typeof latestPieceSchema>;

export const researchRecordSchema = z
  .object({
    itemId: z.string().min(1),
    prospectName: z.string().min(1),
    topics: z.array(z.string().min(1)).max(MAX_TOPICS),
    summary: fieldSchema(z.string().min(1)),
    angles: z.array(z.string().min(1)).max(MAX_ANGLES),
    latestPiece: fieldSchema(latestPieceSchema),
    citations: z.array(citationSchema),
    hitCount: z.number().int().min(0),
  })
  .superRefine((record, ctx) => {
    const supported = new Set(record.citations.flatMap((c) => c.supports));
    for (const topic of record.topics) {
      if (!supported.has(topic)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['topics'],
          message: `Topic "${topic}" has no supporting citation`,
        });
      }
    }
    const topics = new Set(record.topics);
    record.citations.forEach((citation, i) => {
      if (!citation.supports.some((claim) => topics.has(claim))) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['citations', i],
          message: `Citation ${citation.url} supports no recorded topic`,
        });
      }
    });
    if (record.hitCount === 0 && record.summary.status !== 'unknown') {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['summary'],
        message: 'Summary must be unknown when no hits were found',
      });
    }
  });

export type ResearchRecord = z.infer<typeof researchRecordSchema>;
