/**
 * Ollama HTTP client.
 *
 * Failures are classified for the caller's retry policy: timeouts, network
 * errors, 429 and 5xx are retryable; other non-2xx responses are not.
 * The API key is only ever placed in the Authorization header.
 */

import { z } from 'zod';
import { NonRetryableError, RetryableError } from '@pitchline/core';
import {
  OLLAMA_BASE_URL,
  type ModelConfig,
  defaultModelConfigs,
  type OllamaModelType,
} from './models.js';

export interface OllamaChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface OllamaChatRequest {
  model: string;
  messages: OllamaChatMessage[];
  stream?: boolean;
  format?: 'json';
  options?: {
    temperature?: number;
    top_p?: number;
    num_predict?: number;
    stop?: string[];
  };
}

export interface OllamaChatResponse {
  model: string;
  created_at: string;
  message: OllamaChatMessage;
  done: boolean;
  total_duration?: number;
  eval_count?: number;
}

const ChatReplySchema = z.object({
  model: z.string().optional(),
  created_at: z.string().optional(),
  message: z
    .object({
      role: z.enum(['system', 'user', 'assistant']),
      content: z.string(),
    })
    .optional(),
  done: z.boolean().optional(),
  total_duration: z.number().optional(),
  eval_count: z.number().optional(),
});

export interface OllamaClientOptions {
  baseUrl?: string;
  apiKey?: string;
  defaultTimeout?: number;
}

export class OllamaClient {
  private baseUrl: string;
  private defaultTimeout: number;
  private apiKey?: string;

  constructor(options: OllamaClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? OLLAMA_BASE_URL).replace(/\/$/, '');
    this.defaultTimeout = options.defaultTimeout ?? 120000;
    this.apiKey = options.apiKey?.trim() || undefined;
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.apiKey) headers.Authorization = `Bearer ${this.apiKey}`;
    return headers;
  }

  /**
   * Chat completion using the /api/chat endpoint.
   */
  async chat(request: OllamaChatRequest, timeout?: number): Promise<OllamaChatResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout ?? this.defaultTimeout);

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/api/chat`, {
        method: 'POST',
        headers: this.headers(),
        body: JSON.stringify({ ...request, stream: false }),
        signal: controller.signal,
      });
    } catch (err) {
      const reason = controller.signal.aborted
        ? 'timed out'
        : err instanceof Error
          ? err.message
          : String(err);
      throw new RetryableError(`Ollama chat request failed: ${reason}`, { cause: err });
    } finally {
      clearTimeout(timeoutId);
    }

    if (!response.ok) {
      const detail = await response.text().catch(() => '');
      const message = `Ollama chat failed: ${response.status} - ${detail.slice(0, 200)}`;
      if (response.status === 429 || response.status >= 500) {
        throw new RetryableError(message);
      }
      throw new NonRetryableError(message);
    }

    const reply = ChatReplySchema.safeParse(await response.json().catch(() => null));
    const data = reply.success ? reply.data : undefined;
    if (!data?.message) {
      throw new NonRetryableError('Ollama chat returned no message content');
    }
    return {
      model: data.model ?? request.model,
      created_at: data.created_at ?? new Date().toISOString(),
      message: data.message,
      done: data.done ?? true,
      total_duration: data.total_duration,
      eval_count: data.eval_count,
    };
  }
}

export interface CompleteOptions extends Partial<ModelConfig> {
  system?: string;
  format?: 'json';
  client?: OllamaClient;
}

/**
 * High-level completion function with model type selection.
 */
export async function complete(
  prompt: string,
  modelType: OllamaModelType = 'GENERAL',
  options?: CompleteOptions,
): Promise<string> {
  const client = options?.client ?? new OllamaClient();
  const config = { ...defaultModelConfigs[modelType], ...options };

  const messages: OllamaChatMessage[] = [];

  if (options?.system) {
    messages.push({ role: 'system', content: options.system });
  }

  messages.push({ role: 'user', content: prompt });

  const response = await client.chat(
    {
      model: config.model,
      messages,
      format: options?.format,
      options: {
        temperature: config.temperature,
        top_p: config.topP,
        num_predict: config.maxTokens,
      },
    },
    config.timeout,
  );

  return response.message.content;
}
