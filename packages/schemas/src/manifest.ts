import { z } from 'zod';
import { errorKindEnum, manifestStatusEnum, stageEnum } from './enums';

export const stageFailureSchema = z.object({
  itemId: z.string(),
  stage: stageEnum,
  errorKind: errorKindEnum,
  message: z.string(),
});

export type StageFailure = z.infer<typeof stageFailureSchema>;

export const runManifestSchema = z
  .object({
    runId: z.string().min(1),
    status: manifestStatusEnum,
    startedAt: z.string().datetime(),
    finishedAt: z.string().datetime().nullable(),
    totalItems: z.number().int().min(0),
    successCount: z.number().int().min(0),
    failureCount: z.number().int().min(0),
    failures: z.array(stageFailureSchema),
  })
  .refine((m) => m.failureCount === m.failures.length, {
    message: 'failureCount must equal the number of failure entries',
    path: ['failureCount'],
  })
  .refine((m) => m.status === 'OPEN' || m.successCount + m.failureCount === m.totalItems, {
    message: 'A closed manifest must account for every item exactly once',
    path: ['successCount'],
  });

export type RunManifest = z.infer<typeof runManifestSchema>;
