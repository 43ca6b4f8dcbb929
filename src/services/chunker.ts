import type { Block, Chunk, Locator } from '../types/index';
import { BLOCK_SEPARATOR, MAX_CHUNK_SIZE } from '../constants/rag';
import { validatePositiveInteger } from '../utils/errors';

/**
 * Greedily pack consecutive blocks of the same document into chunks of at
 * most maxChunkSize characters (blocks joined by a newline). A block longer
 * than the limit becomes its own chunk untouched. Ids are sequential from
 * firstId.
 */
export function chunkBlocks(
  blocks: Block[],
  maxChunkSize: number = MAX_CHUNK_SIZE,
  firstId: number = 0
): Chunk[] {
  validatePositiveInteger(maxChunkSize, 'maxChunkSize');

  const chunks: Chunk[] = [];
  let documentId: string | null = null;
  let text = '';
  let locators: Locator[] = [];

  const flush = () => {
    if (documentId !== null && text) {
      chunks.push({ id: firstId + chunks.length, documentId, text, locators });
    }
    text = '';
    locators = [];
  };

  for (const block of blocks) {
    const blockText = block.text.trim();
    if (!blockText) continue;

    const sameDocument = block.documentId === documentId;
    const fits =
      text.length + BLOCK_SEPARATOR.length + blockText.length <= maxChunkSize;

    if (text && (!sameDocument || !fits)) {
      flush();
    }

    documentId = block.documentId;
    text = text ? text + BLOCK_SEPARATOR + blockText : blockText;
    locators.push(block.locator);
  }

  flush();
  return chunks;
}
