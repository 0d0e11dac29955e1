/**
 * Ollama model configuration loaded from environment variables.
 * Works against a local Ollama or a hosted endpoint that takes a bearer key.
 */

export const OllamaModels = {
  /** Pitch drafting (longer, more careful prose) */
  GENERAL: process.env.OLLAMA_MODEL_GENERAL ?? 'qwen2.5:14b-instruct-q4_K_M',
} as const;

export type OllamaModelType = keyof typeof OllamaModels;

export const OLLAMA_BASE_URL = process.env.OLLAMA_BASE_URL ?? 'http://localhost:11434';

export interface ModelConfig {
  model: string;
  temperature?: number;
  topP?: number;
  maxTokens?: number;
  timeout?: number;
}

export const defaultModelConfigs: Record<OllamaModelType, ModelConfig> = {
  GENERAL: {
    model: OllamaModels.GENERAL,
    temperature: 0.7,
    maxTokens: 1024,
    timeout: 120000, // 2 minutes per draft
  },
};
