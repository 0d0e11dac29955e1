/**
 * LLM-backed pitch drafting.
 *
 * Every generation goes through a guarded call on the run's generation gate.
 * The reply is either JSON ({ subject, body }) or plain text whose first
 * "Subject:" line is the subject and whose remaining lines are the body.
 */

import { NonRetryableError, StageCaller } from '@pitchline/core';
import {
  OllamaClient,
  complete,
  createPromptTemplate,
  defaultFixers,
  executeTemplate,
  parseWithRetry,
  stripCodeFences,
} from '@pitchline/llm';
import { fieldValue, pitchDraftSchema, type PitchDraft } from '@pitchline/schemas';
import type { CallGuard } from '../shared/types.js';
import { clampSubject, firstName } from '../shared/text.js';
import type { DraftInput, DraftStrategy, TextGenerator } from './types.js';

const PITCH_SYSTEM = `You write short, journalist-first story pitches for a brand.
Never invent statistics, quotes or facts that are not in the brief.
No hype, no hard sell.`;

const PITCH_TEMPLATE = createPromptTemplate(
  `Write a pitch email to a journalist.

BRAND:
- Name: {brandName}
- Tone: {tone}
- Mission: {mission}
- Pillars: {pillars}

JOURNALIST:
- Name: {name}
- Outlet: {outlet}
- Beat: {beat}

RESEARCH:
- Topics they cover: {topics}
- Latest piece: {latestPiece}
- Summary: {summary}

ANGLE: {angle}

Write an email with:
1. Subject line (on first line, prefixed with "Subject: ")
2. Greeting using the first name ({firstName})
3. An opening that references the latest piece when one is given
4. The angle and why it fits their readers
5. A soft ask and a sign-off from {brandName}

Return ONLY the email in Markdown.`,
  { system: PITCH_SYSTEM },
);

const NOT_GIVEN = 'not given';

export function buildPitchPrompt({ prospect, research, brandVoice }: DraftInput): {
  prompt: string;
  system?: string;
} {
  const latest = fieldValue(research.latestPiece);
  return executeTemplate(PITCH_TEMPLATE, {
    brandName: brandVoice.name,
    tone: brandVoice.tone.join(', ') || NOT_GIVEN,
    mission: brandVoice.mission || NOT_GIVEN,
    pillars: brandVoice.pillars.join('; ') || NOT_GIVEN,
    name: prospect.name,
    firstName: firstName(prospect.name),
    outlet: fieldValue(prospect.outlet) ?? NOT_GIVEN,
    beat: fieldValue(prospect.beat) ?? NOT_GIVEN,
    topics: research.topics.join(', ') || NOT_GIVEN,
    latestPiece: latest ? `"${latest.title}" (${latest.url})` : NOT_GIVEN,
    summary: fieldValue(research.summary) ?? NOT_GIVEN,
    angle: research.angles[0] ?? NOT_GIVEN,
  });
}

/** Split a model reply into subject and body. Throws when nothing usable came back. */
export function parsePitchReply(reply: string): PitchDraft {
  const text = stripCodeFences(reply);
  if (!text) {
    throw new NonRetryableError('Generation returned empty output', { kind: 'INVALID_OUTPUT' });
  }

  if (text.startsWith('{')) {
    const parsed = parseWithRetry(text, pitchDraftSchema, defaultFixers);
    if (parsed.success && parsed.data) {
      return { subject: clampSubject(parsed.data.subject), body: parsed.data.body };
    }
  }

  const lines = text.split('\n');
  const at = lines.findIndex((line) => /^\s*(?:\*\*)?subject:/i.test(line));
  if (at < 0) {
    throw new NonRetryableError('Generation reply has no "Subject:" line', {
      kind: 'INVALID_OUTPUT',
    });
  }
  const subject = (lines[at] ?? '').replace(/^\s*(?:\*\*)?subject:\s*(?:\*\*)?/i, '').replace(/\*\*$/, '');
  const body = lines.slice(at + 1).join('\n').trim();
  if (!subject.trim() || !body) {
    throw new NonRetryableError('Generation reply is missing a subject or a body', {
      kind: 'INVALID_OUTPUT',
    });
  }
  return { subject: clampSubject(subject), body };
}

export interface OllamaTextGeneratorOptions {
  apiKey: string;
  baseUrl?: string;
  model?: string;
}

export class OllamaTextGenerator implements TextGenerator {
  private readonly client: OllamaClient;
  private readonly model?: string;

  constructor(options: OllamaTextGeneratorOptions) {
    this.client = new OllamaClient({ baseUrl: options.baseUrl, apiKey: options.apiKey });
    this.model = options.model;
  }

  generate(prompt: string, options?: { system?: string }): Promise<string> {
    return complete(prompt, 'GENERAL', {
      client: this.client,
      system: options?.system,
      ...(this.model ? { model: this.model } : {}),
    });
  }
}

export interface GenerativeDraftStrategyDeps {
  generator: TextGenerator;
  guard: CallGuard;
}

export class GenerativeDraftStrategy implements DraftStrategy {
  readonly kind = 'GENERATIVE' as const;

  constructor(private readonly deps: GenerativeDraftStrategyDeps) {}

  async generate(input: DraftInput): Promise<PitchDraft> {
    const { guard, generator } = this.deps;
    const calls = new StageCaller({
      stage: 'drafting',
      gate: guard.gate,
      retry: guard.retry,
      maxCalls: guard.maxCallsPerStage,
      clock: guard.clock,
      onRetry: guard.onRetry,
    });
    const { prompt, system } = buildPitchPrompt(input);
    const reply = await calls.call('pitch generation', () => generator.generate(prompt, { system }));
    return parsePitchReply(reply);
  }
}
