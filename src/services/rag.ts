import type { AskResult, RankedResult, SearchResponse, Source } from '../types/index';
import { GENERATION_FALLBACK_MESSAGE } from '../constants/prompts';
import type { CorpusSnapshot, CorpusStore } from '../db/store';
import { resolveRagConfig } from '../utils/config';
import type { RagConfig } from '../utils/config';
import { EmptyCorpusError, GenerationUnavailable, validateQueryInput } from '../utils/errors';
import { createLogger } from '../utils/logger';
import type { ModelBackend } from './backends/types';
import { assembleContext, formatProvenance } from './context';
import { generateAnswer } from './llm';
import { retrieve } from './search';

const logger = createLogger('ask');

export interface AskOptions extends Partial<Omit<RagConfig, 'maxChunkSize'>> {
  systemPrompt?: string;
  signal?: AbortSignal;
}

function requireSnapshot(store: CorpusStore): CorpusSnapshot {
  const snapshot = store.snapshot;
  if (!snapshot) {
    throw new EmptyCorpusError('No documents have been processed yet');
  }
  return snapshot;
}

function toSources(ranked: RankedResult, usedChunkIds: number[]): Source[] {
  const used = new Set(usedChunkIds);
  return ranked
    .filter(r => used.has(r.chunk.id))
    .map(r => ({
      chunk_id: r.chunk.id,
      filename: r.chunk.documentId,
      provenance: formatProvenance(r.chunk),
      similarity: r.score,
    }));
}

/**
 * Ranked chunks for a query without calling the model
 */
export function searchDocuments(
  store: CorpusStore,
  query: string,
  topK?: number
): SearchResponse {
  const startTime = performance.now();
  validateQueryInput(query);
  const { index } = requireSnapshot(store);
  const config = resolveRagConfig({ topK });

  const results = retrieve(index, query, config.topK).map(({ chunk, score }) => ({
    chunk_id: chunk.id,
    filename: chunk.documentId,
    provenance: formatProvenance(chunk),
    chunk_text: chunk.text,
    similarity: score,
  }));

  return {
    results,
    query,
    took_ms: Math.round((performance.now() - startTime) * 100) / 100,
  };
}

/**
 * Ask a question about the processed documents. A model failure is
 * returned as an 'unavailable' result rather than thrown.
 */
export async function askQuestion(
  store: CorpusStore,
  backend: ModelBackend,
  question: string,
  options: AskOptions = {}
): Promise<AskResult> {
  const startTime = performance.now();
  const config = resolveRagConfig(options);
  validateQueryInput(question);

  // Read the snapshot once; a concurrent re-ingest publishes a new one
  const { index } = requireSnapshot(store);

  logger.log(`Question: "${question}"`);

  const ranked = retrieve(index, question, config.topK);
  const contextFound = ranked.length > 0;
  if (!contextFound) {
    logger.log('No relevant context found');
  }

  const context = assembleContext(ranked, config.maxContextSize);
  const sources = toSources(ranked, context.usedChunkIds);
  const tookMs = () => Math.round((performance.now() - startTime) * 100) / 100;

  try {
    const answer = await generateAnswer(
      backend,
      {
        question,
        context: context.text,
        usedChunkIds: context.usedChunkIds,
        model: config.model,
      },
      {
        timeoutMs: config.timeoutMs,
        systemPrompt: options.systemPrompt,
        signal: options.signal,
      }
    );

    logger.log(`Completed in ${tookMs()}ms`);
    return { status: 'answered', question, answer, sources, contextFound, took_ms: tookMs() };
  } catch (err) {
    if (!(err instanceof GenerationUnavailable)) throw err;
    return {
      status: 'unavailable',
      question,
      message: `${GENERATION_FALLBACK_MESSAGE} (${err.message})`,
      error: err,
      sources,
      contextFound,
      took_ms: tookMs(),
    };
  }
}
