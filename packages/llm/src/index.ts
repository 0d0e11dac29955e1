/**
 * @pitchline/llm - Ollama client wrapper used by generative drafting
 */

export {
  OllamaModels,
  OLLAMA_BASE_URL,
  type OllamaModelType,
  type ModelConfig,
  defaultModelConfigs,
} from './models.js';

export {
  OllamaClient,
  complete,
  type CompleteOptions,
  type OllamaClientOptions,
  type OllamaChatMessage,
  type OllamaChatRequest,
  type OllamaChatResponse,
} from './client.js';

export {
  buildPrompt,
  createPromptTemplate,
  executeTemplate,
  type PromptTemplate,
} from './prompts.js';

export {
  extractJson,
  stripCodeFences,
  formatZodIssues,
  parseJsonResponse,
  parseWithRetry,
  jsonFixers,
  defaultFixers,
  type ParseResult,
  type ResponseSchema,
} from './parse.js';
