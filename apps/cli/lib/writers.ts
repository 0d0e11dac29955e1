/**
 * Persist a finished run:
 *   <out>/pitches/<slug>.md
 *   <out>/research/journalist_research.csv
 *   <out>/pitch_summary.csv
 *   <out>/run_manifest.json
 *   <out>/pitchline.log
 */

import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import { displayField, type PitchRecord } from '@pitchline/schemas';
import type { ItemOutcome, PipelineRunResult } from '@pitchline/agents';
import { toCsv } from './csv';
import { formatRunLog, type RunLogEntry } from './run-logs';

export const RESEARCH_HEADERS = [
  'prospect_name',
  'matched_name',
  'email',
  'publication',
  'profile_url',
  'topics',
  'summary',
  'angles',
  'citations',
] as const;

export const PITCH_SUMMARY_HEADERS = [
  'prospect_name',
  'slug',
  'subject_line',
  'pitch_excerpt',
  'manual_label',
  'strategy',
] as const;

const EXCERPT_LENGTH = 200;

export function renderPitchMarkdown(pitch: PitchRecord): string {
  return `# ${pitch.subject}\n\n${pitch.body.trim()}\n`;
}

export function pitchExcerpt(body: string, max = EXCERPT_LENGTH): string {
  const flat = body.replace(/\s+/g, ' ').trim();
  return flat.length <= max ? flat : `${flat.slice(0, max - 1).trimEnd()}…`;
}

/** One row per item that got past discovery. */
export function researchRows(outcomes: readonly ItemOutcome[]): string[][] {
  return outcomes.flatMap((outcome) => {
    const { prospect, research } = outcome;
    if (!prospect) return [];
    return [
      [
        prospect.name,
        displayField(prospect.matchedName),
        displayField(prospect.email),
        displayField(prospect.outlet),
        displayField(prospect.profileUrl),
        research?.topics.join('; ') ?? '',
        research ? displayField(research.summary) : 'N/A',
        research?.angles.join(' | ') ?? '',
        (research?.citations ?? prospect.citations).map((c) => c.url).join('; '),
      ],
    ];
  });
}

/** One row per item; failures carry the reason in place of an excerpt. */
export function pitchSummaryRows(outcomes: readonly ItemOutcome[]): string[][] {
  return outcomes.map((outcome) => {
    const name = outcome.prospect?.name ?? outcome.contact.name;
    if (outcome.pitch) {
      const { pitch } = outcome;
      return [name, pitch.slug, pitch.subject, pitchExcerpt(pitch.body), '', pitch.strategy];
    }
    const failure = outcome.failure;
    const reason = failure
      ? `FAILED at ${failure.stage} (${failure.errorKind}): ${failure.message}`
      : 'FAILED';
    return [name, '', '', reason, '', ''];
  });
}

export interface WriteRunOptions {
  logs?: readonly RunLogEntry[];
}

/** Write every artifact of a run; returns the paths written. */
export async function writeRunOutputs(
  outDir: string,
  result: PipelineRunResult,
  options: WriteRunOptions = {},
): Promise<string[]> {
  const written: string[] = [];
  const write = async (relative: string, content: string) => {
    const target = path.join(outDir, relative);
    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, content, 'utf-8');
    written.push(target);
  };

  for (const outcome of result.outcomes) {
    if (outcome.pitch) {
      await write(path.join('pitches', `${outcome.pitch.slug}.md`), renderPitchMarkdown(outcome.pitch));
    }
  }
  await write(
    path.join('research', 'journalist_research.csv'),
    toCsv(RESEARCH_HEADERS, researchRows(result.outcomes)),
  );
  await write('pitch_summary.csv', toCsv(PITCH_SUMMARY_HEADERS, pitchSummaryRows(result.outcomes)));
  await write('run_manifest.json', `${JSON.stringify(result.manifest, null, 2)}\n`);
  if (options.logs) {
    await write('pitchline.log', options.logs.map(formatRunLog).join('\n') + '\n');
  }
  return written;
}
