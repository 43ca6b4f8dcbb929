import type { Block } from '../../types/index';
import { joinCells } from '../../utils/text';
import type { SheetRow } from './types';

/**
 * Turn the rows of one sheet into blocks. The first row with content is the
 * header and is kept as a paragraph; every later row is a table-row.
 */
export function sheetRowsToBlocks(
  documentId: string,
  sheet: string,
  rows: SheetRow[]
): Block[] {
  const blocks: Block[] = [];

  for (const row of rows) {
    const text = joinCells(row.cells);
    if (!text) continue;

    blocks.push({
      documentId,
      text,
      kind: blocks.length === 0 ? 'paragraph' : 'table-row',
      locator: {
        type: 'sheet',
        sheet,
        rowStart: row.rowNumber,
        rowEnd: row.rowNumber,
      },
    });
  }

  return blocks;
}
