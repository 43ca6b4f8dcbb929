import type { Chunk } from '../types/index';
import { EmptyCorpusError, IndexBuildError } from '../utils/errors';
import { tokenize } from '../utils/text';
import { normalizeVector } from '../utils/vectors';
import type { SparseVector } from '../utils/vectors';

/**
 * Immutable TF-IDF representation of one chunk set. Any change to the
 * chunks means building a new index.
 */
export interface TfidfIndex {
  readonly chunks: readonly Chunk[];
  /** term -> column */
  readonly vocabulary: ReadonlyMap<string, number>;
  /** number of chunks containing the term, by column */
  readonly documentFrequency: readonly number[];
  readonly idf: readonly number[];
  /** one L2-normalized vector per chunk, same order as chunks */
  readonly vectors: readonly SparseVector[];
  readonly builtAt: string;
}

/**
 * Smoothed inverse document frequency: never zero, never divides by zero
 */
export function smoothedIdf(totalChunks: number, df: number): number {
  return Math.log((1 + totalChunks) / (1 + df)) + 1;
}

export function countTerms(terms: string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const term of terms) {
    counts.set(term, (counts.get(term) ?? 0) + 1);
  }
  return counts;
}

/**
 * Weight raw term counts against an existing vocabulary and normalize.
 * Terms outside the vocabulary are ignored.
 */
export function weighTerms(
  index: Pick<TfidfIndex, 'vocabulary' | 'idf'>,
  counts: ReadonlyMap<string, number>
): SparseVector {
  const weights = new Map<number, number>();
  for (const [term, tf] of counts) {
    const column = index.vocabulary.get(term);
    if (column === undefined) continue;
    const idf = index.idf[column];
    if (idf === undefined) continue;
    weights.set(column, tf * idf);
  }
  return normalizeVector(weights);
}

export function buildIndex(chunks: readonly Chunk[]): TfidfIndex {
  if (chunks.length === 0) {
    throw new EmptyCorpusError('Cannot build an index over zero chunks');
  }

  const seenIds = new Set<number>();
  const vocabulary = new Map<string, number>();
  const documentFrequency: number[] = [];
  const termCounts: Array<Map<string, number>> = [];

  for (const chunk of chunks) {
    if (seenIds.has(chunk.id)) {
      throw new IndexBuildError(`Duplicate chunk id: ${chunk.id}`);
    }
    seenIds.add(chunk.id);

    if (!chunk.text.trim()) {
      throw new IndexBuildError(`Chunk ${chunk.id} has no text`);
    }

    const counts = countTerms(tokenize(chunk.text));
    termCounts.push(counts);

    for (const term of counts.keys()) {
      let column = vocabulary.get(term);
      if (column === undefined) {
        column = documentFrequency.length;
        vocabulary.set(term, column);
        documentFrequency.push(0);
      }
      documentFrequency[column] = (documentFrequency[column] ?? 0) + 1;
    }
  }

  const idf = documentFrequency.map(df => smoothedIdf(chunks.length, df));
  const vectors = termCounts.map(counts => weighTerms({ vocabulary, idf }, counts));

  return Object.freeze({
    chunks: Object.freeze([...chunks]),
    vocabulary,
    documentFrequency: Object.freeze(documentFrequency),
    idf: Object.freeze(idf),
    vectors: Object.freeze(vectors),
    builtAt: new Date().toISOString(),
  });
}
