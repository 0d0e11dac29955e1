import { describe, it, expect } from 'vitest';
import { mkdtemp, mkdir, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { PipelineConfigError } from '@pitchline/core';
import {
  loadPipelineConfig,
  parsePipelineConfig,
  redactConfig,
  resolvePlaceholders,
} from '@pitchline/cli';

const brandVoice = { name: 'Solo & Co.', pillars: ['community'] };

function configError(fn: () => unknown): PipelineConfigError {
  try {
    fn();
  } catch (err) {
    if (err instanceof PipelineConfigError) return err;
    throw err;
  }
  throw new Error('expected a PipelineConfigError');
}

describe('resolvePlaceholders', () => {
  it('substitutes variables and defaults at any depth', () => {
    expect(
      resolvePlaceholders({ a: '${RATE:5}', b: ['${NAME}', 'plain'], c: 3, d: '${MISSING}' }, { NAME: 'x' }),
    ).toEqual({ a: '5', b: ['x', 'plain'], c: 3, d: '' });
  });
});

describe('parsePipelineConfig', () => {
  it('fills in defaults', () => {
    const config = parsePipelineConfig({ brandVoice }, {});

    expect(config.searchProvider).toBe('offline');
    expect(config.searchRateLimit).toBe(60);
    expect(config.concurrency).toBe(4);
    expect(config.maxRetries).toBe(2);
    expect(config.backoffBaseMs).toBe(1000);
    expect(config.maxCallsPerStage).toBe(6);
    expect(config.generationRateLimit).toBe(30);
    expect(config.generationCredential).toBeUndefined();
    expect(config.brandVoice).toEqual({
      name: 'Solo & Co.',
      tone: [],
      mission: '',
      vision: '',
      pillars: ['community'],
    });
  });

  it('reads placeholders and lets the environment override the file', () => {
    const config = parsePipelineConfig(
      {
        searchRateLimit: '${RATE:60}',
        concurrency: 2,
        generationCredential: '${GENERATION_API_KEY:}',
        brandVoice,
      },
      { RATE: '12', CONCURRENCY: '8', GENERATION_API_KEY: 'test-secret', OLLAMA_MODEL_GENERAL: 'llama3' },
    );

    expect(config.searchRateLimit).toBe(12);
    expect(config.concurrency).toBe(8);
    expect(config.generationCredential).toBe('test-secret');
    expect(config.ollama.model).toBe('llama3');
  });

  it('treats a blank credential as absent', () => {
    const config = parsePipelineConfig({ generationCredential: '${GENERATION_API_KEY:}', brandVoice }, {});
    expect(config.generationCredential).toBeUndefined();
  });

  it('lists every invalid setting', () => {
    const err = configError(() => parsePipelineConfig({ concurrency: 0, searchProvider: 'bing' }, {}));

    expect(err.message).toMatch(/^Invalid configuration: /);
    expect(err.issues).toContain('concurrency: Number must be greater than 0');
    expect(err.issues).toContain('brandVoice: Required');
    expect(err.issues.some((issue) => issue.startsWith('searchProvider: '))).toBe(true);
  });
});

describe('loadPipelineConfig', () => {
  it('reads the default path relative to the working directory', async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), 'pitchline-config-'));
    await mkdir(path.join(dir, 'config'));
    await writeFile(
      path.join(dir, 'config', 'pipeline.json'),
      JSON.stringify({ concurrency: 3, brandVoice }),
    );

    const config = await loadPipelineConfig({ cwd: dir, env: {} });

    expect(config.concurrency).toBe(3);
  });

  it('fails when an explicit path does not exist', async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), 'pitchline-config-'));

    await expect(loadPipelineConfig({ cwd: dir, path: 'nope.json', env: {} })).rejects.toThrow(
      'Configuration file not found',
    );
  });

  it('reports malformed JSON', async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), 'pitchline-config-'));
    await writeFile(path.join(dir, 'bad.json'), '{ "concurrency": ');

    await expect(loadPipelineConfig({ cwd: dir, path: 'bad.json', env: {} })).rejects.toThrow(
      PipelineConfigError,
    );
  });
});

describe('redactConfig', () => {
  it('masks secrets that are set', () => {
    const config = parsePipelineConfig(
      { brandVoice },
      { GENERATION_API_KEY: 'test-secret', SERPAPI_KEY: 'test-search-key' },
    );
    const redacted = redactConfig(config);

    expect(redacted.generationCredential).toBe('********');
    expect(redacted.serpApiKey).toBe('********');
    expect(JSON.stringify(redacted)).not.toContain('test-secret');
    expect(redactConfig(parsePipelineConfig({ brandVoice }, {})).serpApiKey).toBeUndefined();
  });
});
