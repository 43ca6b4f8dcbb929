import type { DocumentKind, ExtractionOutput, SourceDocument } from '../../types/index';

/**
 * One implementation per input format. A document that cannot be opened at
 * all may throw; failures inside a page or sheet are returned as issues.
 */
export interface Extractor {
  readonly kind: DocumentKind;
  extract(document: SourceDocument): Promise<ExtractionOutput>;
}

export interface SheetRow {
  rowNumber: number;
  cells: string[];
}
