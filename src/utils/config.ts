import { LLM_MODEL, MODEL_TIMEOUT_MS } from '../constants/providers';
import { DEFAULT_TOP_K, MAX_CHUNK_SIZE, MAX_CONTEXT_LENGTH } from '../constants/rag';
import {
  ValidationError,
  validateContextSize,
  validatePositiveInteger,
  validateTopK,
} from './errors';

/**
 * Per-call pipeline settings; anything left out falls back to the
 * environment-driven defaults in constants/
 */
export interface RagConfig {
  model: string;
  maxChunkSize: number;
  maxContextSize: number;
  topK: number;
  timeoutMs: number;
}

export const DEFAULT_RAG_CONFIG: Readonly<RagConfig> = Object.freeze({
  model: LLM_MODEL,
  maxChunkSize: MAX_CHUNK_SIZE,
  maxContextSize: MAX_CONTEXT_LENGTH,
  topK: DEFAULT_TOP_K,
  timeoutMs: MODEL_TIMEOUT_MS,
});

export function resolveRagConfig(overrides: Partial<RagConfig> = {}): RagConfig {
  const config: RagConfig = {
    model: overrides.model ?? DEFAULT_RAG_CONFIG.model,
    maxChunkSize: overrides.maxChunkSize ?? DEFAULT_RAG_CONFIG.maxChunkSize,
    maxContextSize: overrides.maxContextSize ?? DEFAULT_RAG_CONFIG.maxContextSize,
    topK: overrides.topK ?? DEFAULT_RAG_CONFIG.topK,
    timeoutMs: overrides.timeoutMs ?? DEFAULT_RAG_CONFIG.timeoutMs,
  };

  if (!config.model.trim()) {
    throw new ValidationError('model must be a non-empty string');
  }
  validatePositiveInteger(config.maxChunkSize, 'maxChunkSize');
  validateContextSize(config.maxContextSize);
  validateTopK(config.topK);
  validatePositiveInteger(config.timeoutMs, 'timeoutMs');

  return config;
}
