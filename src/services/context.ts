import type { AssembledContext, Chunk, Locator, RankedResult } from '../types/index';
import {
  CONTEXT_SEPARATOR,
  MAX_CONTEXT_LENGTH,
  TRUNCATION_MARKER,
} from '../constants/rag';
import { NO_CONTEXT_MARKER } from '../constants/prompts';
import { validateContextSize } from '../utils/errors';
import { log } from '../utils/logger';

/**
 * Summarize where a chunk came from, e.g. "pages 2-3" or
 * "Summary rows 1-4; Notes row 1"
 */
export function describeLocators(locators: readonly Locator[]): string {
  const pages: number[] = [];
  const sheets = new Map<string, { start: number; end: number }>();

  for (const locator of locators) {
    if (locator.type === 'page') {
      pages.push(locator.page);
      continue;
    }
    const range = sheets.get(locator.sheet);
    if (range) {
      range.start = Math.min(range.start, locator.rowStart);
      range.end = Math.max(range.end, locator.rowEnd);
    } else {
      sheets.set(locator.sheet, { start: locator.rowStart, end: locator.rowEnd });
    }
  }

  const parts: string[] = [];
  if (pages.length > 0) {
    const first = Math.min(...pages);
    const last = Math.max(...pages);
    parts.push(first === last ? `page ${first}` : `pages ${first}-${last}`);
  }
  for (const [sheet, { start, end }] of sheets) {
    parts.push(start === end ? `${sheet} row ${start}` : `${sheet} rows ${start}-${end}`);
  }

  return parts.join('; ');
}

export function formatProvenance(chunk: Chunk): string {
  const where = describeLocators(chunk.locators);
  return where ? `${chunk.documentId}, ${where}` : chunk.documentId;
}

/**
 * Build the model context from ranked chunks, best first, each tagged with
 * its provenance. Chunks with identical text are used once. Stops before
 * the text would exceed maxContextSize; only the top chunk is ever cut.
 */
export function assembleContext(
  ranked: RankedResult,
  maxContextSize: number = MAX_CONTEXT_LENGTH
): AssembledContext {
  validateContextSize(maxContextSize);

  if (ranked.length === 0) {
    return { text: NO_CONTEXT_MARKER, usedChunkIds: [] };
  }

  const seenTexts = new Set<string>();
  const parts: string[] = [];
  const usedChunkIds: number[] = [];
  let totalLength = 0;

  for (const { chunk } of ranked) {
    const key = chunk.text.trim();
    if (seenTexts.has(key)) continue;
    seenTexts.add(key);

    const part = `[${formatProvenance(chunk)}]\n${chunk.text}`;
    const addedLength =
      (parts.length > 0 ? CONTEXT_SEPARATOR.length : 0) + part.length;

    if (totalLength + addedLength <= maxContextSize) {
      parts.push(part);
      usedChunkIds.push(chunk.id);
      totalLength += addedLength;
      continue;
    }

    if (parts.length === 0) {
      const truncated =
        part.slice(0, maxContextSize - TRUNCATION_MARKER.length) +
        TRUNCATION_MARKER;
      parts.push(truncated);
      usedChunkIds.push(chunk.id);
      totalLength = truncated.length;
      log(
        `[assembleContext] Truncated top chunk ${chunk.id} from ${part.length} to ${truncated.length} chars`
      );
    } else {
      log(
        `[assembleContext] Reached max context length at chunk ${chunk.id} (${totalLength} chars)`
      );
    }
    break;
  }

  return { text: parts.join(CONTEXT_SEPARATOR), usedChunkIds };
}
