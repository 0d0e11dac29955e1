/**
 * In-memory run log buffer for the CLI.
 * Stores recent pipeline logs with timestamps and agent names, echoes them to
 * the console and is flushed to <out>/pitchline.log at the end of a run.
 */

import type { LogEvent } from '@pitchline/agents';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface RunLogEntry {
  id: string;
  ts: number;
  agent: string;
  level: LogLevel;
  message: string;
  itemId?: string;
}

const MAX_LOGS = 2000;
const logs: RunLogEntry[] = [];
let nextId = 1;

export function runLog(
  agent: string,
  message: string,
  options?: { level?: LogLevel; itemId?: string },
): RunLogEntry {
  const entry: RunLogEntry = {
    id: `log-${nextId++}`,
    ts: Date.now(),
    agent,
    level: options?.level ?? 'info',
    message,
    itemId: options?.itemId,
  };
  logs.push(entry);
  if (logs.length > MAX_LOGS) logs.shift();
  return entry;
}

export function getRunLogs(afterId?: string): RunLogEntry[] {
  if (!afterId) return [...logs];
  const idx = logs.findIndex((l) => l.id === afterId);
  if (idx < 0) return [...logs];
  return logs.slice(idx + 1);
}

export function clearRunLogs(): void {
  logs.length = 0;
}

/** 2026-01-05T10:00:00.000Z [INFO] [DiscoveryAgent] (item-1) message */
export function formatRunLog(entry: RunLogEntry): string {
  const item = entry.itemId ? ` (${entry.itemId})` : '';
  return `${new Date(entry.ts).toISOString()} [${entry.level.toUpperCase()}] [${entry.agent}]${item} ${entry.message}`;
}

/**
 * Pipeline log callback that records into the buffer. Debug events are kept
 * but only echoed when LOG_LEVEL=debug.
 */
export function createRunLogSink(options?: { echo?: boolean }): (event: LogEvent) => void {
  const echo = options?.echo ?? true;
  return (event) => {
    const entry = runLog(event.agent ?? 'pipeline', event.message, {
      level: event.level,
      itemId: event.itemId,
    });
    if (!echo) return;
    if (entry.level === 'debug' && process.env.LOG_LEVEL !== 'debug') return;
    const line = formatRunLog(entry);
    if (entry.level === 'error') console.error(line);
    else if (entry.level === 'warn') console.warn(line);
    else console.log(line);
  };
}
