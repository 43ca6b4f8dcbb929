import type { ProcessingSummary } from '../types/index';
import type { TfidfIndex } from '../services/tfidf-index';

/**
 * Everything derived from one processing run. Never mutated; a new run
 * produces a new snapshot.
 */
export interface CorpusSnapshot {
  readonly index: TfidfIndex;
  readonly summary: ProcessingSummary;
  readonly documents: readonly string[];
}

/**
 * Holds the current snapshot. Publishing swaps a single reference, so a
 * reader that grabbed the previous snapshot keeps a complete, consistent
 * index until it is done.
 */
export class CorpusStore {
  private current: CorpusSnapshot | null = null;

  get snapshot(): CorpusSnapshot | null {
    return this.current;
  }

  publish(index: TfidfIndex, summary: ProcessingSummary): CorpusSnapshot {
    const documents = Object.freeze([
      ...new Set(index.chunks.map(chunk => chunk.documentId)),
    ]);
    const snapshot: CorpusSnapshot = Object.freeze({ index, summary, documents });
    this.current = snapshot;
    return snapshot;
  }

  clear(): void {
    this.current = null;
  }

  getChunkCount(): number {
    return this.current?.index.chunks.length ?? 0;
  }
}
