import { describe, it, expect } from 'vitest';
import type { Block } from '../types/index';
import { ValidationError } from '../utils/errors';
import { chunkBlocks } from './chunker';

function block(text: string, page: number, documentId = 'a.pdf'): Block {
  return { documentId, text, kind: 'paragraph', locator: { type: 'page', page } };
}

describe('chunkBlocks', () => {
  it('packs blocks until the next one would exceed the limit', () => {
    const chunks = chunkBlocks(
      [block('aaaa', 1), block('bbbb', 1), block('cccc', 2)],
      9
    );

    expect(chunks).toEqual([
      {
        id: 0,
        documentId: 'a.pdf',
        text: 'aaaa\nbbbb',
        locators: [
          { type: 'page', page: 1 },
          { type: 'page', page: 1 },
        ],
      },
      { id: 1, documentId: 'a.pdf', text: 'cccc', locators: [{ type: 'page', page: 2 }] },
    ]);
  });

  it('never mixes documents in one chunk', () => {
    const chunks = chunkBlocks([block('one', 1, 'a.pdf'), block('two', 1, 'b.pdf')], 100);
    expect(chunks.map(c => [c.id, c.documentId, c.text])).toEqual([
      [0, 'a.pdf', 'one'],
      [1, 'b.pdf', 'two'],
    ]);
  });

  it('keeps an oversized block whole in its own chunk', () => {
    const long = 'x'.repeat(25);
    const chunks = chunkBlocks([block('head', 1), block(long, 1), block('tail', 2)], 10);
    expect(chunks.map(c => c.text)).toEqual(['head', long, 'tail']);
  });

  it('drops whitespace-only blocks and numbers from firstId', () => {
    const chunks = chunkBlocks([block('  ', 1), block('kept', 1)], 10, 7);
    expect(chunks).toEqual([
      { id: 7, documentId: 'a.pdf', text: 'kept', locators: [{ type: 'page', page: 1 }] },
    ]);
  });

  it('reproduces the same boundaries on a second run', () => {
    const blocks = [block('alpha', 1), block('beta', 1), block('gamma', 2), block('delta', 3)];
    const first = chunkBlocks(blocks, 12);
    const second = chunkBlocks(blocks, 12);
    expect(second).toEqual(first);
    expect(first.map(c => c.text)).toEqual(['alpha\nbeta', 'gamma\ndelta']);
  });

  it('rejects a non-positive limit', () => {
    expect(() => chunkBlocks([block('a', 1)], 0)).toThrow(ValidationError);
  });

  it('returns nothing for no blocks', () => {
    expect(chunkBlocks([], 10)).toEqual([]);
  });
});
