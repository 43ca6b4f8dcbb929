import type { ExtractionOutput, SourceDocument } from '../../types/index';
import { parseCSV } from '../../utils/csvs';
import { sheetRowsToBlocks } from './rows';
import type { Extractor } from './types';

/**
 * A CSV file is a single sheet named after the file
 */
export class CsvExtractor implements Extractor {
  readonly kind = 'csv' as const;

  async extract(document: SourceDocument): Promise<ExtractionOutput> {
    const content = new TextDecoder('utf-8').decode(document.data);
    const blocks = sheetRowsToBlocks(document.name, document.name, parseCSV(content));
    return { blocks, issues: [] };
  }
}
