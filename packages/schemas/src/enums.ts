import { z } from 'zod';

export const searchProviderEnum = z.enum(['offline', 'live']);
export type SearchProvider = z.infer<typeof searchProviderEnum>;

/** How a Prospect field was obtained. */
export const confidenceEnum = z.enum(['HIGH', 'MEDIUM', 'LOW']);
export type Confidence = z.infer<typeof confidenceEnum>;

export const stageEnum = z.enum(['pending', 'discovery', 'research', 'drafting']);
export type Stage = z.infer<typeof stageEnum>;

export const errorKindEnum = z.enum([
  'RETRYABLE',
  'SEARCH_UNAVAILABLE',
  'NON_RETRYABLE',
  'CALL_BUDGET',
  'INVALID_OUTPUT',
  'UNEXPECTED',
  'CANCELLED',
]);
export type ErrorKind = z.infer<typeof errorKindEnum>;

export const draftStrategyEnum = z.enum(['TEMPLATE', 'GENERATIVE']);
export type DraftStrategyKind = z.infer<typeof draftStrategyEnum>;

export const manifestStatusEnum = z.enum(['OPEN', 'CLOSED']);
export type ManifestStatus = z.infer<typeof manifestStatusEnum>;
