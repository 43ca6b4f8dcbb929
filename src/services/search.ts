import type { RankedChunk, RankedResult } from '../types/index';
import { DEFAULT_TOP_K } from '../constants/rag';
import { createLogger } from '../utils/logger';
import { dotProduct } from '../utils/vectors';
import { tokenize } from '../utils/text';
import { ValidationError, validateTopK } from '../utils/errors';
import { countTerms, weighTerms } from './tfidf-index';
import type { TfidfIndex } from './tfidf-index';

const logger = createLogger('retrieve');

/**
 * Rank every chunk by cosine similarity to the query and keep the best k.
 * Only positive scores are returned; equal scores keep chunk order. A query
 * with no known terms yields an empty result. Length is not capped here;
 * a whole chunk is a valid query.
 */
export function retrieve(
  index: TfidfIndex,
  query: string,
  topK: number = DEFAULT_TOP_K
): RankedResult {
  if (!query.trim()) {
    throw new ValidationError('Query cannot be empty or whitespace only');
  }
  validateTopK(topK);

  const queryVector = weighTerms(index, countTerms(tokenize(query)));
  if (queryVector.size === 0) {
    logger.log(`No indexed terms in query: "${query}"`);
    return [];
  }

  const scored: RankedChunk[] = [];
  index.chunks.forEach((chunk, i) => {
    const vector = index.vectors[i];
    if (!vector) return;
    // Rounding can push a perfect match a hair above 1
    const score = Math.min(1, dotProduct(queryVector, vector));
    if (score > 0) {
      scored.push({ chunk, score });
    }
  });

  scored.sort((a, b) => b.score - a.score || a.chunk.id - b.chunk.id);
  return scored.slice(0, topK);
}
