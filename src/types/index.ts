import type { GenerationUnavailable } from '../utils/errors';

export type DocumentKind = 'pdf' | 'excel' | 'csv';

export interface SourceDocument {
  name: string;
  data: Uint8Array;
}

export type Locator =
  | { type: 'page'; page: number }
  | { type: 'sheet'; sheet: string; rowStart: number; rowEnd: number };

export type BlockKind = 'paragraph' | 'table-row';

export interface Block {
  documentId: string;
  text: string;
  kind: BlockKind;
  locator: Locator;
}

export interface Chunk {
  id: number;
  documentId: string;
  text: string;
  locators: Locator[];
}

export interface RankedChunk {
  chunk: Chunk;
  score: number;
}

export type RankedResult = RankedChunk[];

export interface AssembledContext {
  text: string;
  usedChunkIds: number[];
}

export interface Answer {
  text: string;
  model: string;
  usedChunkIds: number[];
}

export interface ExtractionIssue {
  documentId: string;
  locator?: Locator;
  message: string;
}

export interface ExtractionOutput {
  blocks: Block[];
  issues: ExtractionIssue[];
}

export interface IngestResult {
  filename: string;
  blocks_extracted: number;
  chunks_created: number;
  success: boolean;
  issues: ExtractionIssue[];
  error?: string;
}

export interface ProcessingSummary {
  documents: IngestResult[];
  total_chunks: number;
  took_ms: number;
}

export interface SearchResult {
  chunk_id: number;
  filename: string;
  provenance: string;
  chunk_text: string;
  similarity: number;
}

export interface SearchResponse {
  results: SearchResult[];
  query: string;
  took_ms: number;
}

export interface Source {
  chunk_id: number;
  filename: string;
  provenance: string;
  similarity: number;
}

export type AskResult =
  | {
      status: 'answered';
      question: string;
      answer: Answer;
      sources: Source[];
      contextFound: boolean;
      took_ms: number;
    }
  | {
      status: 'unavailable';
      question: string;
      message: string;
      error: GenerationUnavailable;
      sources: Source[];
      contextFound: boolean;
      took_ms: number;
    };
