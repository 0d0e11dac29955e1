/**
 * Shared types and interfaces for all agents.
 */

import type { ZodType, ZodTypeDef } from 'zod';
import type { Clock, RateGate, RetryEvent, RetryPolicy } from '@pitchline/core';
import type { ErrorKind, Stage } from '@pitchline/schemas';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEvent {
  level: LogLevel;
  message: string;
  agent?: string;
  itemId?: string;
}

export type LogSink = (event: LogEvent) => void;

export interface AgentContext {
  runId?: string;
  itemId?: string;
  timestamp: Date;
  log?: LogSink;
}

export interface StageFailureDetail {
  stage: Stage;
  kind: ErrorKind;
  message: string;
  attempts: number;
}

/** Outcome of one stage call; failures are values, never exceptions. */
export type StageResult<T> =
  | { ok: true; data: T; duration: number; context: AgentContext }
  | { ok: false; failure: StageFailureDetail; duration: number; context: AgentContext };

export interface AgentConfig {
  name: string;
  description: string;
  version: string;
  stage: Stage;
}

export interface Agent<TInput, TOutput> {
  config: AgentConfig;
  inputSchema: ZodType<TInput, ZodTypeDef, unknown>;
  outputSchema: ZodType<TOutput, ZodTypeDef, unknown>;
  execute(input: unknown, context?: Partial<AgentContext>): Promise<StageResult<TOutput>>;
}

/**
 * Everything a stage needs to make guarded external calls. The gate is built
 * once per run and shared by reference between all chains.
 */
export interface CallGuard {
  gate: RateGate;
  retry: RetryPolicy;
  maxCallsPerStage: number;
  clock?: Clock;
  onRetry?: (event: RetryEvent) => void;
}

export interface AgentLog {
  timestamp: Date;
  level: LogLevel;
  message: string;
  data?: unknown;
}
