import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { clearRunLogs, createRunLogSink, formatRunLog, getRunLogs, runLog } from '@pitchline/cli';

describe('run logs', () => {
  beforeEach(() => {
    clearRunLogs();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns entries after a given id', () => {
    const first = runLog('pipeline', 'one');
    runLog('DiscoveryAgent', 'two', { itemId: 'item-1' });

    expect(getRunLogs().map((e) => e.message)).toEqual(['one', 'two']);
    expect(getRunLogs(first.id).map((e) => e.message)).toEqual(['two']);
  });

  it('formats entries with level, agent and item', () => {
    const line = formatRunLog({
      id: 'log-1',
      ts: Date.parse('2025-05-01T12:00:00.000Z'),
      agent: 'ResearchAgent',
      level: 'warn',
      message: 'No usable hits',
      itemId: 'item-2',
    });
    expect(line).toBe('2025-05-01T12:00:00.000Z [WARN] [ResearchAgent] (item-2) No usable hits');
  });

  it('records pipeline events and echoes warnings to stderr', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const sink = createRunLogSink();

    sink({ level: 'warn', message: 'slow provider' });

    expect(getRunLogs()).toEqual([expect.objectContaining({ agent: 'pipeline', level: 'warn' })]);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(String(warn.mock.calls[0]?.[0])).toMatch(/\[WARN\] \[pipeline\] slow provider$/);
  });

  it('keeps quiet when echo is off', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    createRunLogSink({ echo: false })({ level: 'info', message: 'quiet', agent: 'DraftingAgent' });

    expect(log).not.toHaveBeenCalled();
    expect(getRunLogs()[0]?.agent).toBe('DraftingAgent');
  });
});
