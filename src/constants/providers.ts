// Local model settings (Ollama CLI or any OpenAI-compatible server)
export type ModelBackendKind = 'process' | 'http';

export const LLM_MODEL = process.env.OLLAMA_MODEL || 'llama2';
export const MODEL_BACKEND: ModelBackendKind =
  process.env.MODEL_BACKEND === 'http' ? 'http' : 'process';

// Process backend
export const OLLAMA_BIN = process.env.OLLAMA_BIN || 'ollama';

// HTTP backend (Ollama exposes /v1, LM Studio listens on 1234)
export const AI_BASE_URL =
  process.env.AI_BASE_URL || 'http://localhost:11434/v1';
export const AI_API_KEY = process.env.AI_API_KEY || 'ollama';

export const MODEL_TIMEOUT_MS = readIntEnv('MODEL_TIMEOUT_MS', 30_000);

export function readIntEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const value = Number.parseInt(raw, 10);
  return Number.isInteger(value) && value > 0 ? value : fallback;
}
