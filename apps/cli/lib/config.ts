/**
 * Pipeline configuration: optional JSON file, ${VAR:default} placeholders,
 * environment overlay, zod validation.
 *
 * Secrets (generation credential, search API key) are only ever read from
 * here and handed to the pipeline; use redactConfig before logging.
 */

import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { DEFAULT_CONCURRENCY, DEFAULT_SEARCH_RATE_LIMIT, PipelineConfigError } from '@pitchline/core';
import { formatZodIssues } from '@pitchline/llm';
import { brandVoiceSchema, searchProviderEnum } from '@pitchline/schemas';

export const DEFAULT_CONFIG_PATH = 'config/pipeline.json';

const PLACEHOLDER = /\$\{([^:}]+)(?::([^}]*))?\}/g;

const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const optionalSecret = z.preprocess(blankToUndefined, z.string().trim().min(1).optional());
const positiveInt = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(fallback));
const nonNegativeInt = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().min(0).default(fallback));

export const pipelineConfigSchema = z.object({
  searchProvider: z.preprocess(blankToUndefined, searchProviderEnum.default('offline')),
  searchRateLimit: positiveInt(DEFAULT_SEARCH_RATE_LIMIT),
  concurrency: positiveInt(DEFAULT_CONCURRENCY),
  generationCredential: optionalSecret,
  serpApiKey: optionalSecret,
  maxRetries: nonNegativeInt(2),
  backoffBaseMs: nonNegativeInt(1000),
  maxCallsPerStage: positiveInt(6),
  generationRateLimit: positiveInt(30),
  offlineSeed: z.union([z.number(), z.string()]).default(0),
  ollama: z
    .object({
      baseUrl: z.preprocess(blankToUndefined, z.string().url().optional()),
      model: z.preprocess(blankToUndefined, z.string().optional()),
    })
    .default({}),
  brandVoice: brandVoiceSchema,
});

export type PipelineConfig = z.infer<typeof pipelineConfigSchema>;

type Env = Record<string, string | undefined>;

/** Replace ${VAR} / ${VAR:default} in every string, recursively. */
export function resolvePlaceholders(value: unknown, env: Env): unknown {
  if (typeof value === 'string') {
    return value.replace(PLACEHOLDER, (_match, name: string, fallback?: string) => {
      return env[name.trim()] ?? fallback ?? '';
    });
  }
  if (Array.isArray(value)) return value.map((item) => resolvePlaceholders(item, env));
  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]) => [key, resolvePlaceholders(item, env)]),
    );
  }
  return value;
}

const ENV_OVERLAY: Array<[string, keyof PipelineConfig]> = [
  ['SEARCH_PROVIDER', 'searchProvider'],
  ['SEARCH_RATE_LIMIT', 'searchRateLimit'],
  ['CONCURRENCY', 'concurrency'],
  ['SERPAPI_KEY', 'serpApiKey'],
  ['GENERATION_API_KEY', 'generationCredential'],
  ['MAX_RETRIES', 'maxRetries'],
  ['BACKOFF_BASE_MS', 'backoffBaseMs'],
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/** Environment variables win over file values when set and non-empty. */
export function applyEnvOverlay(raw: Record<string, unknown>, env: Env): Record<string, unknown> {
  const out: Record<string, unknown> = { ...raw };
  for (const [variable, key] of ENV_OVERLAY) {
    const value = env[variable]?.trim();
    if (value) out[key] = value;
  }
  const ollama = isRecord(out.ollama) ? { ...out.ollama } : {};
  if (env.OLLAMA_BASE_URL?.trim()) ollama.baseUrl = env.OLLAMA_BASE_URL.trim();
  if (env.OLLAMA_MODEL_GENERAL?.trim()) ollama.model = env.OLLAMA_MODEL_GENERAL.trim();
  out.ollama = ollama;
  return out;
}

export function parsePipelineConfig(raw: unknown, env: Env = process.env): PipelineConfig {
  const resolved = resolvePlaceholders(raw ?? {}, env);
  if (!isRecord(resolved)) {
    throw new PipelineConfigError('Configuration must be a JSON object');
  }
  const result = pipelineConfigSchema.safeParse(applyEnvOverlay(resolved, env));
  if (!result.success) {
    throw new PipelineConfigError(
      'Invalid configuration',
      formatZodIssues(result.error).split('; '),
    );
  }
  return result.data;
}

export interface LoadConfigOptions {
  /** Explicit path must exist; the default path is optional. */
  path?: string;
  env?: Env;
  cwd?: string;
}

export async function loadPipelineConfig(options: LoadConfigOptions = {}): Promise<PipelineConfig> {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const filePath = path.resolve(cwd, options.path ?? DEFAULT_CONFIG_PATH);

  let raw: unknown = {};
  if (existsSync(filePath)) {
    const text = await readFile(filePath, 'utf-8');
    try {
      raw = JSON.parse(text);
    } catch (err) {
      throw new PipelineConfigError(`Cannot parse ${filePath}`, [
        err instanceof Error ? err.message : String(err),
      ]);
    }
  } else if (options.path) {
    throw new PipelineConfigError(`Configuration file not found: ${filePath}`);
  }
  return parsePipelineConfig(raw, env);
}

const MASK = '********';

/** Copy safe to log: secrets replaced by a mask, absent ones left absent. */
export function redactConfig(config: PipelineConfig): PipelineConfig {
  return {
    ...config,
    generationCredential: config.generationCredential ? MASK : undefined,
    serpApiKey: config.serpApiKey ? MASK : undefined,
  };
}
