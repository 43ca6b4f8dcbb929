import { PDFParse } from 'pdf-parse';
import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';
import type { Block, ExtractionIssue, ExtractionOutput, Locator, SourceDocument } from '../../types/index';
import { ExtractionError, describeError } from '../../utils/errors';
import { cleanPDFText, joinCells, splitParagraphs } from '../../utils/text';
import { createLogger } from '../../utils/logger';
import type { Extractor } from './types';

const logger = createLogger('extract');

export interface PdfPage {
  num: number;
  text: string;
  tables: string[][][];
}

export interface PdfReader {
  pageCount: number;
  readPage(num: number): Promise<PdfPage>;
  close(): Promise<void>;
}

export type OpenPdf = (data: Uint8Array) => Promise<PdfReader>;

/** A run of text placed on the page, in PDF units with y growing upwards */
export interface PositionedText {
  text: string;
  x: number;
  y: number;
  width: number;
  height: number;
}

interface TextLine {
  text: string;
  y: number;
  height: number;
  endX: number;
}

// Fractions of the font height
const SAME_LINE_TOLERANCE = 0.5;
const WORD_GAP = 0.15;
// A vertical gap wider than this many line heights starts a paragraph
const PARAGRAPH_GAP = 1.5;

/**
 * Rebuild page text from positioned runs: runs on the same baseline form a
 * line, and a blank line is put wherever the gap to the previous line is
 * wider than normal line spacing or the text jumps back up the page.
 */
export function layoutPageText(items: readonly PositionedText[]): string {
  const lines: TextLine[] = [];
  let current: TextLine | undefined;

  for (const item of items) {
    const blank = item.text.trim().length === 0;
    const sameLine =
      current !== undefined &&
      Math.abs(item.y - current.y) <=
        Math.max(current.height, item.height) * SAME_LINE_TOLERANCE;

    if (current && sameLine) {
      const gap = item.x - current.endX;
      if ((blank || gap > current.height * WORD_GAP) && !current.text.endsWith(' ')) {
        current.text += ' ';
      }
      if (!blank) current.text += item.text;
      current.endX = Math.max(current.endX, item.x + item.width);
      current.height = Math.max(current.height, item.height);
      continue;
    }
    if (blank) continue;

    current = { text: item.text, y: item.y, height: item.height, endX: item.x + item.width };
    lines.push(current);
  }

  let text = '';
  let previous: TextLine | undefined;
  for (const line of lines) {
    const content = line.text.trim();
    if (!content) continue;
    if (previous) {
      const gap = previous.y - line.y;
      const lineHeight = Math.max(previous.height, line.height);
      text += gap < 0 || gap > lineHeight * PARAGRAPH_GAP ? '\n\n' : '\n';
    }
    text += content;
    previous = line;
  }

  return text;
}

/**
 * Open a PDF one page at a time so a broken page only loses that page.
 * pdf.js supplies positioned text for paragraph layout; pdf-parse finds
 * the tables.
 */
export async function openPdfDocument(data: Uint8Array): Promise<PdfReader> {
  // pdf.js may detach the buffer it is given
  const loadingTask = getDocument({
    data: new Uint8Array(data),
    isEvalSupported: false,
    verbosity: 0,
  });

  const pdf = await loadingTask.promise.catch(async (err: unknown) => {
    await loadingTask.destroy();
    throw err;
  });
  const parser = new PDFParse({ data: new Uint8Array(data) });

  return {
    pageCount: pdf.numPages,
    async readPage(num: number): Promise<PdfPage> {
      const page = await pdf.getPage(num);
      let text: string;
      try {
        const content = await page.getTextContent();
        const items: PositionedText[] = [];
        for (const item of content.items) {
          if (!('str' in item)) continue;
          const [, , c, d, x, y] = item.transform;
          items.push({
            text: item.str,
            x: Number(x),
            y: Number(y),
            width: item.width,
            height: item.height || Math.hypot(Number(c), Number(d)),
          });
        }
        text = layoutPageText(items);
      } finally {
        page.cleanup();
      }

      const tableResult = await parser.getTable({ partial: [num] });
      return {
        num,
        text,
        tables: tableResult.pages.flatMap(p => p.tables),
      };
    },
    async close() {
      await parser.destroy();
      await loadingTask.destroy();
    },
  };
}

/**
 * Paragraph blocks first, then one table-row block per row of each
 * detected table. pdf-parse gives no positions for tables, so they follow
 * the page text.
 */
export function pageToBlocks(documentId: string, page: PdfPage): Block[] {
  const locator: Locator = { type: 'page', page: page.num };
  const blocks: Block[] = [];

  for (const paragraph of splitParagraphs(cleanPDFText(page.text))) {
    blocks.push({ documentId, text: paragraph, kind: 'paragraph', locator });
  }

  for (const table of page.tables) {
    for (const row of table) {
      const text = joinCells(row);
      if (!text) continue;
      blocks.push({ documentId, text, kind: 'table-row', locator });
    }
  }

  return blocks;
}

export class PdfExtractor implements Extractor {
  readonly kind = 'pdf' as const;
  private readonly open: OpenPdf;

  constructor(open: OpenPdf = openPdfDocument) {
    this.open = open;
  }

  async extract(document: SourceDocument): Promise<ExtractionOutput> {
    const blocks: Block[] = [];
    const issues: ExtractionIssue[] = [];
    const reader = await this.open(document.data);

    try {
      for (let num = 1; num <= reader.pageCount; num++) {
        const locator: Locator = { type: 'page', page: num };
        try {
          const page = await reader.readPage(num);
          blocks.push(...pageToBlocks(document.name, page));
        } catch (err) {
          const failure = new ExtractionError(
            `Failed to extract page ${num} of ${document.name}: ${describeError(err)}`,
            document.name,
            locator,
            err
          );
          logger.log(`Skipping page ${num}: ${failure.message}`);
          issues.push(failure.toIssue());
        }
      }
    } finally {
      await reader.close();
    }

    return { blocks, issues };
  }
}
