import * as XLSX from 'xlsx';
import type { Block, ExtractionIssue, ExtractionOutput, SourceDocument } from '../../types/index';
import { ExtractionError, describeError } from '../../utils/errors';
import { createLogger } from '../../utils/logger';
import { sheetRowsToBlocks } from './rows';
import type { Extractor, SheetRow } from './types';

const logger = createLogger('extract');

export interface SpreadsheetReader {
  sheetNames: string[];
  readSheet(name: string): SheetRow[];
}

export type OpenSpreadsheet = (data: Uint8Array) => SpreadsheetReader;

function isCellObject(value: unknown): value is XLSX.CellObject {
  return typeof value === 'object' && value !== null && 't' in value;
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * Dates render as YYYY-MM-DD; everything else as Excel displays it.
 * SheetJS builds dates at local midnight, so local fields give the day.
 */
export function cellText(cell: XLSX.CellObject): string {
  if (cell.v instanceof Date) {
    const date = cell.v;
    return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  }
  if (cell.w !== undefined) return cell.w;
  return cell.v === undefined ? '' : String(cell.v);
}

export function readSheetRows(sheet: XLSX.WorkSheet): SheetRow[] {
  const ref = sheet['!ref'];
  if (!ref) return [];

  const range = XLSX.utils.decode_range(ref);
  const rows: SheetRow[] = [];

  for (let r = range.s.r; r <= range.e.r; r++) {
    const cells: string[] = [];
    for (let c = range.s.c; c <= range.e.c; c++) {
      const value: unknown = sheet[XLSX.utils.encode_cell({ r, c })];
      cells.push(isCellObject(value) ? cellText(value) : '');
    }
    if (cells.some(cell => cell.trim().length > 0)) {
      rows.push({ rowNumber: r + 1, cells });
    }
  }

  return rows;
}

/**
 * Reads .xlsx, .xlsm and legacy .xls. Each sheet is parsed on its own, so a
 * damaged sheet does not take the others with it.
 */
export function openSpreadsheet(data: Uint8Array): SpreadsheetReader {
  const options: XLSX.ParsingOptions = { type: 'array', cellDates: true };
  const { SheetNames } = XLSX.read(data, { ...options, bookSheets: true });

  return {
    sheetNames: SheetNames,
    readSheet(name: string): SheetRow[] {
      const workbook = XLSX.read(data, { ...options, sheets: name });
      const sheet = workbook.Sheets[name];
      if (!sheet) {
        throw new Error(`sheet "${name}" could not be parsed`);
      }
      return readSheetRows(sheet);
    },
  };
}

export class ExcelExtractor implements Extractor {
  readonly kind = 'excel' as const;
  private readonly open: OpenSpreadsheet;

  constructor(open: OpenSpreadsheet = openSpreadsheet) {
    this.open = open;
  }

  async extract(document: SourceDocument): Promise<ExtractionOutput> {
    const reader = this.open(document.data);
    const blocks: Block[] = [];
    const issues: ExtractionIssue[] = [];

    for (const name of reader.sheetNames) {
      try {
        blocks.push(...sheetRowsToBlocks(document.name, name, reader.readSheet(name)));
      } catch (err) {
        const failure = new ExtractionError(
          `Failed to extract sheet "${name}" of ${document.name}: ${describeError(err)}`,
          document.name,
          undefined,
          err
        );
        logger.log(`Skipping sheet: ${failure.message}`);
        issues.push(failure.toIssue());
      }
    }

    return { blocks, issues };
  }
}
