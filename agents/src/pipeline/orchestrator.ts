/**
 * Pipeline Orchestrator - Drives every contact through discovery, research
 * and drafting
 *
 * Responsibilities:
 * - Validate run-level configuration; the only place a run may refuse to start
 * - Build the rate gates once and share them between all chains
 * - Run chains in a bounded worker pool, one agent set per chain
 * - Fall back to the template when generative drafting fails
 * - Record exactly one manifest outcome per item
 *
 * Stage results are values; a failed item never stops the run.
 */

import {
  DEFAULT_RETRY_POLICY,
  PipelineConfigError,
  RateGate,
  SlugRegistry,
  errorMessage,
  runWithConcurrency,
  systemClock,
  type RetryPolicy,
} from '@pitchline/core';
import {
  brandVoiceSchema,
  type BrandVoice,
  type PitchRecord,
  type RawContactInput,
  type Stage,
  type StageFailure,
} from '@pitchline/schemas';
import { formatZodIssues } from '@pitchline/llm';
import { createSearchClient } from '../search/index.js';
import type { SearchClient } from '../search/types.js';
import { DiscoveryAgent } from '../discovery/discovery-agent.js';
import { ResearchAgent } from '../research/research-agent.js';
import { DraftingAgent } from '../drafting/drafting-agent.js';
import { TemplateDraftStrategy } from '../drafting/template-strategy.js';
import { GenerativeDraftStrategy, OllamaTextGenerator } from '../drafting/generative-strategy.js';
import type { DraftStrategy } from '../drafting/types.js';
import type { CallGuard, LogEvent, LogSink, StageFailureDetail, StageResult } from '../shared/types.js';
import { ItemTracker, isTerminal, type ItemState } from './item-state.js';
import { RunManifestRecorder } from './run-manifest.js';
import type { ItemOutcome, PipelineOptions, PipelineRunResult } from './types.js';

export const DEFAULT_MAX_CALLS_PER_STAGE = 6;
export const DEFAULT_GENERATION_RATE_LIMIT = 30;

const STAGE_OF_STATE: Partial<Record<ItemState, Stage>> = {
  PENDING: 'pending',
  DISCOVERING: 'discovery',
  RESEARCHING: 'research',
  DRAFTING: 'drafting',
};

interface RunSettings {
  brandVoice: BrandVoice;
  retry: RetryPolicy;
  maxCallsPerStage: number;
  generationRateLimit: number;
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

function isNonNegativeInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

/**
 * Everything that would make the run unable to start. Throws
 * PipelineConfigError listing every problem at once.
 */
export function validateRun(
  contacts: readonly RawContactInput[],
  options: PipelineOptions,
): RunSettings {
  const issues: string[] = [];
  if (contacts.length === 0) issues.push('input: no contacts to process');
  if (!isPositiveInteger(options.concurrency)) {
    issues.push(`concurrency: must be a positive integer, got ${options.concurrency}`);
  }
  if (!isPositiveInteger(options.searchRateLimit)) {
    issues.push(`searchRateLimit: must be a positive integer, got ${options.searchRateLimit}`);
  }

  const generationRateLimit = options.generationRateLimit ?? DEFAULT_GENERATION_RATE_LIMIT;
  if (!isPositiveInteger(generationRateLimit)) {
    issues.push(`generationRateLimit: must be a positive integer, got ${generationRateLimit}`);
  }
  const maxCallsPerStage = options.maxCallsPerStage ?? DEFAULT_MAX_CALLS_PER_STAGE;
  if (!isPositiveInteger(maxCallsPerStage)) {
    issues.push(`maxCallsPerStage: must be a positive integer, got ${maxCallsPerStage}`);
  }
  const retry: RetryPolicy = {
    maxRetries: options.maxRetries ?? DEFAULT_RETRY_POLICY.maxRetries,
    backoffBaseMs: options.backoffBaseMs ?? DEFAULT_RETRY_POLICY.backoffBaseMs,
  };
  if (!isNonNegativeInteger(retry.maxRetries)) {
    issues.push(`maxRetries: must be a non-negative integer, got ${retry.maxRetries}`);
  }
  if (!isNonNegativeInteger(retry.backoffBaseMs)) {
    issues.push(`backoffBaseMs: must be a non-negative integer, got ${retry.backoffBaseMs}`);
  }
  if (options.searchProvider === 'live' && !options.searchClient && !options.searchApiKey?.trim()) {
    issues.push('searchApiKey: required for the live search provider');
  }

  const brandVoice = brandVoiceSchema.safeParse(options.brandVoice);
  if (!brandVoice.success) {
    issues.push(`brandVoice: ${formatZodIssues(brandVoice.error)}`);
  }

  if (issues.length > 0 || !brandVoice.success) {
    throw new PipelineConfigError('Pipeline cannot start', issues);
  }
  return { brandVoice: brandVoice.data, retry, maxCallsPerStage, generationRateLimit };
}

/**
 * Stable, unique ids in input order: the contact's own id when it has one.
 * A taken id gets the first free "-2", "-3", ... suffix.
 */
export function assignItemIds(contacts: readonly RawContactInput[]): string[] {
  const issued = new Set<string>();
  const width = String(contacts.length).length;
  return contacts.map((contact, index) => {
    const base = contact.id?.trim() || `item-${String(index + 1).padStart(width, '0')}`;
    let id = base;
    for (let n = 2; issued.has(id); n++) id = `${base}-${n}`;
    issued.add(id);
    return id;
  });
}

function toStageFailure(itemId: string, failure: StageFailureDetail): StageFailure {
  return { itemId, stage: failure.stage, errorKind: failure.kind, message: failure.message };
}

/** A sink that throws is reported on the console and never reaches a chain. */
function guardSink(log: LogSink | undefined): LogSink | undefined {
  if (!log) return undefined;
  return (event) => {
    try {
      log(event);
    } catch (err) {
      console.error(`[Pipeline] [ERROR] Log sink failed: ${errorMessage(err)}`);
    }
  };
}

function logIf(log: LogSink | undefined, event: LogEvent): void {
  log?.(event);
}

export async function runPipeline(
  contacts: readonly RawContactInput[],
  options: PipelineOptions,
): Promise<PipelineRunResult> {
  const settings = validateRun(contacts, options);
  const { brandVoice, retry, maxCallsPerStage } = settings;
  const clock = options.clock ?? systemClock;
  const now = options.now ?? (() => new Date());
  const log = guardSink(options.log);
  const runId = options.runId ?? `run-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`;

  const search: SearchClient =
    options.searchClient ??
    createSearchClient(options.searchProvider, {
      apiKey: options.searchApiKey,
      seed: options.offlineSeed,
    });

  // one gate per external service for the whole run
  const searchGuard: CallGuard = {
    gate: RateGate.perMinute(options.searchRateLimit, clock),
    retry,
    maxCallsPerStage,
    clock,
    onRetry: options.onRetry,
  };
  const generationGuard: CallGuard = {
    gate: RateGate.perMinute(settings.generationRateLimit, clock),
    retry,
    maxCallsPerStage,
    clock,
    onRetry: options.onRetry,
  };

  const template = new TemplateDraftStrategy();
  const credential = options.generationCredential?.trim();
  const primary: DraftStrategy = credential
    ? new GenerativeDraftStrategy({
        generator:
          options.generator ??
          new OllamaTextGenerator({
            apiKey: credential,
            baseUrl: options.ollama?.baseUrl,
            model: options.ollama?.model,
          }),
        guard: generationGuard,
      })
    : template;

  const itemIds = assignItemIds(contacts);
  const slugs = new SlugRegistry();
  const itemSlugs = contacts.map((contact) => slugs.claim(contact.name));
  const manifest = new RunManifestRecorder({ runId, itemIds, now });

  logIf(log, {
    level: 'info',
    message: `Run ${runId}: ${contacts.length} item(s), search=${search.provider}, concurrency=${options.concurrency}, drafting=${primary.kind.toLowerCase()}`,
  });

  async function runItem(index: number): Promise<ItemOutcome> {
    const contact = contacts[index];
    const itemId = itemIds[index];
    const tracker = new ItemTracker();
    const context = { runId, itemId, log };
    const outcome: ItemOutcome = {
      itemId,
      contact,
      state: 'PENDING',
      prospect: null,
      research: null,
      pitch: null,
      failure: null,
      history: [],
    };

    const fail = (failure: StageFailureDetail): ItemOutcome => {
      tracker.transition('FAILED');
      outcome.failure = toStageFailure(itemId, failure);
      manifest.recordFailure(outcome.failure);
      logIf(log, {
        level: 'error',
        itemId,
        message: `${failure.stage} failed (${failure.kind}): ${failure.message}`,
      });
      return outcome;
    };

    const step = async <T>(
      state: ItemState,
      execute: () => Promise<StageResult<T>>,
    ): Promise<StageResult<T>> => {
      tracker.transition(state);
      return execute();
    };

    try {
      const discovery = new DiscoveryAgent({ search, guard: searchGuard });
      const discovered = await step('DISCOVERING', () =>
        discovery.execute({ itemId, contact }, context),
      );
      if (!discovered.ok) return fail(discovered.failure);
      outcome.prospect = discovered.data;

      const research = new ResearchAgent({ search, guard: searchGuard });
      const researched = await step('RESEARCHING', () =>
        research.execute({ prospect: discovered.data, brandVoice }, context),
      );
      if (!researched.ok) return fail(researched.failure);
      outcome.research = researched.data;

      const draftInput = {
        prospect: discovered.data,
        research: researched.data,
        brandVoice,
        slug: itemSlugs[index],
      };
      let drafted = await step('DRAFTING', () =>
        new DraftingAgent({ strategy: primary, now }).execute(draftInput, context),
      );
      if (!drafted.ok && primary.kind === 'GENERATIVE') {
        const reason = drafted.failure.message;
        logIf(log, {
          level: 'warn',
          itemId,
          message: `Generative drafting failed (${drafted.failure.kind}), using template: ${reason}`,
        });
        drafted = await new DraftingAgent({ strategy: template, now }).execute(
          { ...draftInput, fallbackReason: reason },
          context,
        );
      }
      if (!drafted.ok) return fail(drafted.failure);

      const pitch: PitchRecord = drafted.data;
      tracker.transition('DONE');
      outcome.pitch = pitch;
      manifest.recordSuccess(itemId);
      logIf(log, { level: 'info', itemId, message: `Pitch drafted: ${pitch.slug}` });
      return outcome;
    } catch (err) {
      // agents report failures as values; reaching here means a bug in a chain
      if (isTerminal(tracker.state)) return outcome;
      return fail({
        stage: STAGE_OF_STATE[tracker.state] ?? 'pending',
        kind: 'UNEXPECTED',
        message: errorMessage(err),
        attempts: 0,
      });
    } finally {
      outcome.state = tracker.state;
      outcome.history = tracker.history;
    }
  }

  const results = await runWithConcurrency(contacts, (_contact, index) => runItem(index), {
    concurrency: options.concurrency,
    signal: options.signal,
  });

  const outcomes = results.map((result, index): ItemOutcome => {
    if (result.started) return result.value;
    const tracker = new ItemTracker();
    tracker.transition('CANCELLED');
    const failure: StageFailure = {
      itemId: itemIds[index],
      stage: 'pending',
      errorKind: 'CANCELLED',
      message: 'Run aborted before the item started',
    };
    manifest.recordFailure(failure);
    return {
      itemId: itemIds[index],
      contact: contacts[index],
      state: tracker.state,
      prospect: null,
      research: null,
      pitch: null,
      failure,
      history: tracker.history,
    };
  });

  const closed = manifest.finish();
  logIf(log, {
    level: closed.failureCount > 0 ? 'warn' : 'info',
    message: `Run ${runId} finished: ${closed.successCount} succeeded, ${closed.failureCount} failed`,
  });
  return { manifest: closed, outcomes };
}
