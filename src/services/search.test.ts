import { describe, it, expect } from 'vitest';
import type { Block, Chunk } from '../types/index';
import { ValidationError } from '../utils/errors';
import { chunkBlocks } from './chunker';
import { retrieve } from './search';
import { buildIndex } from './tfidf-index';

function chunk(id: number, text: string): Chunk {
  return { id, documentId: 'annual.pdf', text, locators: [{ type: 'page', page: id + 1 }] };
}

const chunks = [
  chunk(0, 'Revenue increased to $5M in Q1'),
  chunk(1, 'Expenses were $2M in Q1'),
  chunk(2, 'Operating cash flow stayed positive for the full year'),
  chunk(3, 'Headcount grew to 120 employees across three offices'),
];

describe('retrieve', () => {
  const index = buildIndex(chunks);

  it('ranks the revenue chunk above the expenses chunk', () => {
    const result = retrieve(index, 'What was Q1 revenue?', 5);
    expect(result.map(r => r.chunk.id)).toEqual([0, 1]);
    expect(result[0]?.score).toBeGreaterThan(result[1]?.score ?? 1);
  });

  it('ranks a chunk first when queried with its own text', () => {
    for (const c of chunks) {
      const [top] = retrieve(index, c.text, 1);
      expect(top?.chunk.id).toBe(c.id);
      expect(top?.score).toBeCloseTo(1, 12);
    }
  });

  it('matches a chunk longer than any user query against its own text', () => {
    const ledger = Array.from({ length: 150 }, (_, i) => `Ledger line ${i} balance ${i * 7}`).join('\n');
    const blocks: Block[] = [
      { documentId: 'ledger.pdf', text: 'Board approved the budget', kind: 'paragraph', locator: { type: 'page', page: 1 } },
      { documentId: 'ledger.pdf', text: ledger, kind: 'paragraph', locator: { type: 'page', page: 2 } },
    ];
    const long = chunkBlocks(blocks, 800);
    expect(long.map(c => c.text.length > 1000)).toEqual([false, true]);

    const [top] = retrieve(buildIndex(long), ledger, 1);
    expect(top?.chunk.id).toBe(1);
    expect(top?.score).toBeCloseTo(1, 12);
  });

  it('returns an empty result for out-of-vocabulary queries', () => {
    expect(retrieve(index, 'xyzzy plugh', 3)).toEqual([]);
  });

  it('never returns more than k results', () => {
    const result = retrieve(index, 'q1 revenue expenses cash headcount', 2);
    expect(result).toHaveLength(2);
  });

  it('breaks ties by chunk id', () => {
    const twins = buildIndex([chunk(0, 'net income'), chunk(1, 'other'), chunk(2, 'net income')]);
    const result = retrieve(twins, 'income', 3);
    expect(result.map(r => r.chunk.id)).toEqual([0, 2]);
    expect(result[0]?.score).toBe(result[1]?.score);
  });

  it('is deterministic for the same inputs', () => {
    const first = retrieve(index, 'Q1 results', 4);
    const second = retrieve(index, 'Q1 results', 4);
    expect(second).toEqual(first);
    expect(first.map(r => r.chunk.id)).toEqual([1, 0]);
  });

  it('only returns chunks held by the index', () => {
    const ids = new Set(chunks.map(c => c.id));
    for (const r of retrieve(index, 'was to in the', 10)) {
      expect(ids.has(r.chunk.id)).toBe(true);
    }
  });

  it('rejects bad k and blank queries', () => {
    expect(() => retrieve(index, 'revenue', 0)).toThrow(ValidationError);
    expect(() => retrieve(index, '   ', 3)).toThrow(ValidationError);
  });
});
