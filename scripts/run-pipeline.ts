/**
 * Run the pitch pipeline over a contacts CSV and write every artifact.
 *
 * Run: npm run pipeline -- --prospects data/contacts.csv [--config config/pipeline.json] [--out outputs] [--limit 10]
 *
 * Ctrl-C stops new items from starting; chains already running finish and the
 * manifest still accounts for every contact.
 */
import './load-env';

import path from 'path';
import { parseArgs } from 'util';
import { PipelineConfigError, errorMessage } from '@pitchline/core';
import { runPipeline } from '@pitchline/agents';
import {
  createRunLogSink,
  getRunLogs,
  loadContacts,
  loadPipelineConfig,
  redactConfig,
  runLog,
  writeRunOutputs,
} from '@pitchline/cli';

const USAGE =
  'Usage: run-pipeline --prospects <csv> [--config <json>] [--out <dir>] [--limit <n>]';

function parseLimit(value: string | undefined): number {
  if (value === undefined) return 0;
  const limit = Number(value);
  if (!Number.isInteger(limit) || limit < 0) {
    throw new PipelineConfigError(`--limit must be a non-negative integer, got "${value}"`);
  }
  return limit;
}

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      prospects: { type: 'string' },
      config: { type: 'string' },
      out: { type: 'string', default: 'outputs' },
      limit: { type: 'string' },
    },
  });
  if (!values.prospects) {
    throw new PipelineConfigError(USAGE);
  }

  const config = await loadPipelineConfig({ path: values.config });
  const log = createRunLogSink();
  runLog('cli', `Configuration: ${JSON.stringify(redactConfig(config))}`, { level: 'debug' });

  const { contacts, warnings } = await loadContacts(path.resolve(values.prospects), {
    limit: parseLimit(values.limit),
  });
  for (const warning of warnings) {
    log({ level: 'warn', agent: 'cli', message: `${values.prospects}:${warning.row} ${warning.message}` });
  }

  const controller = new AbortController();
  process.once('SIGINT', () => {
    log({ level: 'warn', agent: 'cli', message: 'Interrupted: finishing running items, skipping the rest' });
    controller.abort();
  });

  const result = await runPipeline(contacts, {
    searchProvider: config.searchProvider,
    searchRateLimit: config.searchRateLimit,
    concurrency: config.concurrency,
    generationCredential: config.generationCredential,
    brandVoice: config.brandVoice,
    maxRetries: config.maxRetries,
    backoffBaseMs: config.backoffBaseMs,
    maxCallsPerStage: config.maxCallsPerStage,
    generationRateLimit: config.generationRateLimit,
    offlineSeed: config.offlineSeed,
    searchApiKey: config.serpApiKey,
    ollama: config.ollama,
    signal: controller.signal,
    log,
  });

  const outDir = path.resolve(values.out);
  const written = await writeRunOutputs(outDir, result, { logs: getRunLogs() });
  const { manifest } = result;
  console.log(
    `Done. ${manifest.successCount}/${manifest.totalItems} pitched, ${manifest.failureCount} failed. ${written.length} file(s) in ${outDir}`,
  );
}

main().catch((err) => {
  console.error(err instanceof PipelineConfigError ? err.message : errorMessage(err));
  process.exit(1);
});
