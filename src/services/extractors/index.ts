import type { DocumentKind, ExtractionOutput, SourceDocument } from '../../types/index';
import { ExtractionError, ValidationError, describeError } from '../../utils/errors';
import { error as logError } from '../../utils/logger';
import { CsvExtractor } from './csv';
import { ExcelExtractor } from './excel';
import { PdfExtractor } from './pdf';
import type { Extractor } from './types';

export type ExtractorRegistry = Record<DocumentKind, Extractor>;

export const DEFAULT_EXTRACTORS: ExtractorRegistry = {
  pdf: new PdfExtractor(),
  excel: new ExcelExtractor(),
  csv: new CsvExtractor(),
};

export function detectDocumentKind(filename: string): DocumentKind | null {
  const ext = filename.toLowerCase().split('.').pop();
  switch (ext) {
    case 'pdf':
      return 'pdf';
    case 'xlsx':
    case 'xlsm':
    case 'xls':
      return 'excel';
    case 'csv':
      return 'csv';
    default:
      return null;
  }
}

/**
 * Extract one document. A document that cannot be opened yields no blocks
 * and a single issue instead of an exception, so a batch keeps going.
 */
export async function extractDocument(
  document: SourceDocument,
  extractors: ExtractorRegistry = DEFAULT_EXTRACTORS
): Promise<ExtractionOutput> {
  const kind = detectDocumentKind(document.name);
  if (!kind) {
    throw new ValidationError(`Unsupported file type: ${document.name}`);
  }

  try {
    return await extractors[kind].extract(document);
  } catch (err) {
    const failure = new ExtractionError(
      `Failed to read ${document.name}: ${describeError(err)}`,
      document.name,
      undefined,
      err
    );
    logError(`✗ ${failure.message}`);
    return { blocks: [], issues: [failure.toIssue()] };
  }
}

export type { Extractor, SheetRow } from './types';
