import { CELL_DELIMITER } from '../constants/rag';

/**
 * Remove thousands separators inside numbers so "1,234,567" and "1234567"
 * index as the same term
 */
export function normalizeNumericTokens(text: string): string {
  return text.replace(/(?<=\d),(?=\d)/g, '');
}

/**
 * Tokenize text into index terms: lower-cased, split on anything that is
 * not a letter or digit
 */
export function tokenize(text: string): string[] {
  return normalizeNumericTokens(text.toLowerCase())
    .split(/[^\p{L}\p{N}]+/u)
    .filter(t => t.length > 0);
}

/**
 * Clean and normalize text
 */
export function normalizeText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Cleans PDF page text by removing page furniture and normalizing whitespace.
 * Standalone numbers are kept: in statements they are usually figures.
 */
export function cleanPDFText(text: string): string {
  let cleaned = text.replace(/\r\n/g, '\n');

  // Remove page numbers
  cleaned = cleaned.replace(/\bPage\s+\d+\s+of\s+\d+\b/gi, '');
  cleaned = cleaned.replace(/^[ \t]*-[ \t]*\d+[ \t]*-[ \t]*$/gm, ''); // "- 3 -"

  // Remove rule lines
  cleaned = cleaned.replace(/^[-_=]+$/gm, '');

  // Fix hyphenated words split across lines
  cleaned = cleaned.replace(/(\w+)-\s*\n\s*(\w+)/g, '$1$2');

  cleaned = cleaned.replace(/[ \t]+/g, ' ');
  cleaned = cleaned
    .split('\n')
    .map(line => line.trim())
    .join('\n');
  cleaned = cleaned.replace(/\n{3,}/g, '\n\n');

  return cleaned.trim();
}

/**
 * Split cleaned page text into paragraphs on blank lines
 */
export function splitParagraphs(text: string): string[] {
  return text
    .split(/\n\s*\n/)
    .map(p => p.trim())
    .filter(p => p.length > 0);
}

/**
 * Render a table row as delimited text. Empty cells are dropped, so a row
 * with no content renders as an empty string.
 */
export function joinCells(cells: ReadonlyArray<string | null | undefined>): string {
  return cells
    .map(cell => (cell == null ? '' : normalizeText(cell)))
    .filter(cell => cell.length > 0)
    .join(CELL_DELIMITER);
}
