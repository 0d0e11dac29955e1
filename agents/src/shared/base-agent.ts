/**
 * Base agent class providing common functionality for all agents.
 *
 * Instances keep the log of their latest execution, so a chain should own its
 * agents rather than share them with other chains.
 */

import type { ZodType, ZodTypeDef } from 'zod';
import { PipelineError, StageCaller, StageFailedError, errorMessage } from '@pitchline/core';
import { formatZodIssues } from '@pitchline/llm';
import type { Stage } from '@pitchline/schemas';
import type {
  Agent,
  AgentConfig,
  AgentContext,
  AgentLog,
  CallGuard,
  StageFailureDetail,
  StageResult,
} from './types.js';

export abstract class BaseAgent<TInput, TOutput> implements Agent<TInput, TOutput> {
  abstract config: AgentConfig;
  abstract inputSchema: ZodType<TInput, ZodTypeDef, unknown>;
  abstract outputSchema: ZodType<TOutput, ZodTypeDef, unknown>;

  protected logs: AgentLog[] = [];
  private sink?: AgentContext['log'];
  private itemId?: string;

  protected log(level: AgentLog['level'], message: string, data?: unknown): void {
    this.logs.push({
      timestamp: new Date(),
      level,
      message,
      data,
    });

    this.sink?.({ level, message, agent: this.config.name, itemId: this.itemId });

    if (process.env.LOG_LEVEL === 'debug' || level === 'error') {
      console.log(`[${this.config.name}] [${level.toUpperCase()}] ${message}`, data ?? '');
    }
  }

  protected debug(message: string, data?: unknown): void {
    this.log('debug', message, data);
  }

  protected info(message: string, data?: unknown): void {
    this.log('info', message, data);
  }

  protected warn(message: string, data?: unknown): void {
    this.log('warn', message, data);
  }

  protected error(message: string, data?: unknown): void {
    this.log('error', message, data);
  }

  /** A fresh call budget for one execution of this agent's stage. */
  protected stageCaller(guard: CallGuard): StageCaller {
    return new StageCaller({
      stage: this.config.stage,
      gate: guard.gate,
      retry: guard.retry,
      maxCalls: guard.maxCallsPerStage,
      clock: guard.clock,
      onRetry: (event) => {
        this.warn(
          `${event.label} attempt ${event.attempt + 1} failed, retrying in ${event.delayMs}ms: ${errorMessage(event.error)}`,
        );
        guard.onRetry?.(event);
      },
    });
  }

  async execute(input: unknown, context?: Partial<AgentContext>): Promise<StageResult<TOutput>> {
    const startTime = Date.now();
    this.logs = [];
    this.sink = context?.log;
    this.itemId = context?.itemId;

    const fullContext: AgentContext = {
      timestamp: new Date(),
      ...context,
    };

    const fail = (failure: StageFailureDetail): StageResult<TOutput> => {
      this.error(`Execution failed: ${failure.message}`, { kind: failure.kind });
      return { ok: false, failure, duration: Date.now() - startTime, context: fullContext };
    };

    this.debug(`Starting execution`);

    // Validate input
    const parsedInput = this.inputSchema.safeParse(input);
    if (!parsedInput.success) {
      return fail(
        this.failure('NON_RETRYABLE', `Invalid input: ${formatZodIssues(parsedInput.error)}`),
      );
    }

    let output: TOutput;
    try {
      // Run the agent's main logic
      output = await this.run(parsedInput.data, fullContext);
    } catch (err) {
      if (err instanceof StageFailedError) {
        return fail({
          stage: err.stage,
          kind: err.kind,
          message: err.reason,
          attempts: err.attempts,
        });
      }
      if (err instanceof PipelineError) {
        return fail(this.failure(err.kind, err.message));
      }
      return fail(this.failure('UNEXPECTED', errorMessage(err)));
    }

    // Validate output
    const parsedOutput = this.outputSchema.safeParse(output);
    if (!parsedOutput.success) {
      return fail(
        this.failure('INVALID_OUTPUT', `Invalid output: ${formatZodIssues(parsedOutput.error)}`),
      );
    }

    const duration = Date.now() - startTime;
    this.info(`Completed successfully`, { duration });

    return {
      ok: true,
      data: parsedOutput.data,
      duration,
      context: fullContext,
    };
  }

  private failure(
    kind: StageFailureDetail['kind'],
    message: string,
    stage: Stage = this.config.stage,
  ): StageFailureDetail {
    return { stage, kind, message, attempts: 0 };
  }

  /**
   * Abstract method to be implemented by each agent.
   * Contains the core agent logic.
   */
  protected abstract run(input: TInput, context: AgentContext): Promise<TOutput>;

  /**
   * Get execution logs.
   */
  getLogs(): AgentLog[] {
    return [...this.logs];
  }
}
