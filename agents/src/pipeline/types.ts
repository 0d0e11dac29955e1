/**
 * Types for the pipeline orchestrator
 */

import type { Clock, RetryEvent } from '@pitchline/core';
import type {
  BrandVoiceInput,
  PitchRecord,
  Prospect,
  RawContactInput,
  ResearchRecord,
  RunManifest,
  SearchProvider,
  StageFailure,
} from '@pitchline/schemas';
import type { LogSink } from '../shared/types.js';
import type { SearchClient } from '../search/types.js';
import type { TextGenerator } from '../drafting/types.js';
import type { ItemState } from './item-state.js';

export interface PipelineOptions {
  searchProvider: SearchProvider;
  /** Calls per minute across every chain. */
  searchRateLimit: number;
  concurrency: number;
  /** Opaque; enables generative drafting. Never logged or persisted. */
  generationCredential?: string;
  brandVoice: BrandVoiceInput;

  maxRetries?: number;
  backoffBaseMs?: number;
  maxCallsPerStage?: number;
  /** Generation calls per minute. */
  generationRateLimit?: number;
  offlineSeed?: number | string;
  /** Needed for the live provider. */
  searchApiKey?: string;
  ollama?: { baseUrl?: string; model?: string };

  /** Overrides for tests and embedding callers. */
  searchClient?: SearchClient;
  generator?: TextGenerator;
  clock?: Clock;
  now?: () => Date;
  runId?: string;
  signal?: AbortSignal;
  log?: LogSink;
  onRetry?: (event: RetryEvent) => void;
}

export interface ItemOutcome {
  itemId: string;
  contact: RawContactInput;
  state: ItemState;
  prospect: Prospect | null;
  research: ResearchRecord | null;
  pitch: PitchRecord | null;
  failure: StageFailure | null;
  history: ItemState[];
}

export interface PipelineRunResult {
  manifest: RunManifest;
  outcomes: ItemOutcome[];
}
