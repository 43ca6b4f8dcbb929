import type { Answer } from '../types/index';
import { LLM_MODEL, MODEL_BACKEND, MODEL_TIMEOUT_MS } from '../constants/providers';
import type { ModelBackendKind } from '../constants/providers';
import { ANSWER_INSTRUCTIONS, DEFAULT_SYSTEM_PROMPT } from '../constants/prompts';
import { GenerationUnavailable, describeError, validatePositiveInteger } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { HttpModelBackend } from './backends/http';
import { ProcessModelBackend } from './backends/process';
import type { ModelBackend, ModelRequest } from './backends/types';

const logger = createLogger('generate');

export function createModelBackend(kind: ModelBackendKind = MODEL_BACKEND): ModelBackend {
  logger.log('Using model backend:', kind);
  return kind === 'http' ? new HttpModelBackend() : new ProcessModelBackend();
}

export function buildPrompt(question: string, context: string): string {
  return `CONTEXT:\n${context}\n\nQUESTION:\n${question}\n\n${ANSWER_INSTRUCTIONS}`;
}

/**
 * Strip reasoning blocks and echoed labels small local models tend to emit
 */
export function cleanAnswer(raw: string): string {
  return raw
    .replace(/<think>[\s\S]*?<\/think>/gi, '')
    .trim()
    .replace(/^(?:Answer:|Response:)\s*/i, '')
    .trim();
}

export interface GenerationInput {
  question: string;
  context: string;
  usedChunkIds: number[];
  model?: string;
}

export interface GenerationOptions {
  timeoutMs?: number;
  systemPrompt?: string;
  /** lets the caller cancel an in-flight call */
  signal?: AbortSignal;
}

/**
 * Ask the model to answer from the given context. Resolves with a non-empty
 * answer or rejects with GenerationUnavailable, at the latest after
 * timeoutMs even if the backend ignores the abort signal.
 */
export async function generateAnswer(
  backend: ModelBackend,
  input: GenerationInput,
  options: GenerationOptions = {}
): Promise<Answer> {
  const model = input.model ?? LLM_MODEL;
  const timeoutMs = options.timeoutMs ?? MODEL_TIMEOUT_MS;
  validatePositiveInteger(timeoutMs, 'timeoutMs');

  const request: ModelRequest = {
    model,
    system: options.systemPrompt || DEFAULT_SYSTEM_PROMPT,
    prompt: buildPrompt(input.question, input.context),
  };

  const controller = new AbortController();
  let rejectRace: (failure: GenerationUnavailable) => void = () => {};
  const stopped = new Promise<never>((_, reject) => {
    rejectRace = reject;
  });
  // Reject first so the race settles with this failure, not the abort
  const stop = (failure: GenerationUnavailable) => {
    rejectRace(failure);
    controller.abort();
  };

  const timer = setTimeout(
    () =>
      stop(
        new GenerationUnavailable(
          `Model "${model}" did not answer within ${timeoutMs}ms`,
          'timeout'
        )
      ),
    timeoutMs
  );
  const onCancel = () =>
    stop(new GenerationUnavailable('Generation was cancelled', 'cancelled'));
  if (options.signal?.aborted) {
    onCancel();
  } else {
    options.signal?.addEventListener('abort', onCancel, { once: true });
  }

  let raw: string;
  try {
    raw = await Promise.race([backend.generate(request, controller.signal), stopped]);
  } catch (err) {
    const failure =
      err instanceof GenerationUnavailable
        ? err
        : new GenerationUnavailable(
            `Model backend "${backend.name}" failed: ${describeError(err)}`,
            controller.signal.aborted ? 'timeout' : 'request_failed',
            err
          );
    logger.error(`${failure.reason}: ${failure.message}`);
    throw failure;
  } finally {
    clearTimeout(timer);
    options.signal?.removeEventListener('abort', onCancel);
  }

  const text = cleanAnswer(raw);
  if (!text) {
    throw new GenerationUnavailable(`Model "${model}" returned an empty answer`, 'empty_output');
  }

  return { text, model, usedChunkIds: input.usedChunkIds };
}
