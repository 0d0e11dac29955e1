import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  buildPrompt,
  createPromptTemplate,
  defaultFixers,
  executeTemplate,
  extractJson,
  jsonFixers,
  parseJsonResponse,
  parseWithRetry,
  stripCodeFences,
} from '@pitchline/llm';

const schema = z.object({ subject: z.string(), body: z.string() });

describe('JSON response parsing', () => {
  it('extracts JSON from a fenced block', () => {
    expect(extractJson('Here:\n```json\n{"a":1}\n```')).toBe('{"a":1}');
  });

  it('strips a surrounding code fence', () => {
    expect(stripCodeFences('```markdown\nSubject: Hi\n```')).toBe('Subject: Hi');
  });

  it('reports validation failures with field paths', () => {
    const result = parseJsonResponse('{"subject": 1, "body": "x"}', schema);
    expect(result.success).toBe(false);
    expect(result.error).toBe('Validation failed: subject: Expected string, received number');
  });

  it('repairs trailing commas and raw newlines', () => {
    const raw = '{"subject": "Hi", "body": "line one\nline two",}';
    const result = parseWithRetry(raw, schema, defaultFixers);
    expect(result.success).toBe(true);
    expect(result.data).toEqual({ subject: 'Hi', body: 'line one\nline two' });
  });

  it('leaves newlines between JSON tokens alone', () => {
    expect(jsonFixers.escapeNewlines('{\n"a": "b\nc"\n}')).toBe('{\n"a": "b\\nc"\n}');
  });

  it('quotes bare keys', () => {
    expect(jsonFixers.quoteKeys('{subject: "Hi", body: "x"}')).toBe('{"subject": "Hi","body": "x"}');
  });
});

describe('prompt templates', () => {
  it('collects variables and fills them', () => {
    const template = createPromptTemplate('Hi {name}, about {topic}. Bye {name}.', { system: 'sys' });
    expect(template.variables).toEqual(['name', 'topic']);
    expect(executeTemplate(template, { name: 'Jane', topic: 'rent' })).toEqual({
      prompt: 'Hi Jane, about rent. Bye Jane.',
      system: 'sys',
    });
  });

  it('throws on missing variables', () => {
    const template = createPromptTemplate('Hi {name}');
    expect(() => executeTemplate(template, {})).toThrow('Missing template variables: name');
  });

  it('inserts values literally', () => {
    expect(buildPrompt('cost: {price}', { price: '$1 $& more' })).toBe('cost: $1 $& more');
  });
});
