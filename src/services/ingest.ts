import { readFile, readdir, stat } from 'node:fs/promises';
import { basename, join } from 'node:path';
import type { Chunk, IngestResult, ProcessingSummary, SourceDocument } from '../types/index';
import { MAX_CHUNK_SIZE } from '../constants/rag';
import type { CorpusSnapshot, CorpusStore } from '../db/store';
import { EmptyCorpusError, ValidationError } from '../utils/errors';
import { log, error } from '../utils/logger';
import { chunkBlocks } from './chunker';
import { DEFAULT_EXTRACTORS, detectDocumentKind, extractDocument } from './extractors/index';
import type { ExtractorRegistry } from './extractors/index';
import { buildIndex } from './tfidf-index';

export interface ProcessOptions {
  maxChunkSize?: number;
  extractors?: ExtractorRegistry;
}

export interface ProcessedDocuments {
  chunks: Chunk[];
  summary: ProcessingSummary;
}

/**
 * Extract every document concurrently, then chunk them in input order so
 * chunk ids follow document order
 */
export async function processDocuments(
  documents: SourceDocument[],
  options: ProcessOptions = {}
): Promise<ProcessedDocuments> {
  const startTime = performance.now();
  const maxChunkSize = options.maxChunkSize ?? MAX_CHUNK_SIZE;
  const extractors = options.extractors ?? DEFAULT_EXTRACTORS;

  const names = new Set<string>();
  for (const document of documents) {
    if (names.has(document.name)) {
      throw new ValidationError(`Duplicate document name: ${document.name}`);
    }
    names.add(document.name);
  }

  const outputs = await Promise.all(
    documents.map(async document => {
      if (!detectDocumentKind(document.name)) return null;
      log(`Processing: ${document.name}`);
      return extractDocument(document, extractors);
    })
  );

  const chunks: Chunk[] = [];
  const results: IngestResult[] = [];

  documents.forEach((document, i) => {
    const output = outputs[i];
    if (!output) {
      results.push({
        filename: document.name,
        blocks_extracted: 0,
        chunks_created: 0,
        success: false,
        issues: [],
        error: 'Unsupported file type',
      });
      return;
    }

    const documentChunks = chunkBlocks(output.blocks, maxChunkSize, chunks.length);
    chunks.push(...documentChunks);

    if (documentChunks.length === 0) {
      results.push({
        filename: document.name,
        blocks_extracted: output.blocks.length,
        chunks_created: 0,
        success: false,
        issues: output.issues,
        error: output.issues[0]?.message ?? 'No text content found in file',
      });
      return;
    }

    log(`  ${document.name}: ${output.blocks.length} blocks, ${documentChunks.length} chunks`);
    results.push({
      filename: document.name,
      blocks_extracted: output.blocks.length,
      chunks_created: documentChunks.length,
      success: true,
      issues: output.issues,
    });
  });

  return {
    chunks,
    summary: {
      documents: results,
      total_chunks: chunks.length,
      took_ms: Math.round((performance.now() - startTime) * 100) / 100,
    },
  };
}

/**
 * Process documents and replace the store's corpus. When nothing could be
 * chunked the previous snapshot stays in place and EmptyCorpusError carries
 * the summary.
 */
export async function ingestDocuments(
  store: CorpusStore,
  documents: SourceDocument[],
  options: ProcessOptions = {}
): Promise<CorpusSnapshot> {
  const { chunks, summary } = await processDocuments(documents, options);

  if (chunks.length === 0) {
    error('✗ No chunks were produced from the uploaded documents');
    throw new EmptyCorpusError(
      `No text could be extracted from ${documents.length} document(s)`,
      summary
    );
  }

  const snapshot = store.publish(buildIndex(chunks), summary);
  log(`✓ Indexed ${chunks.length} chunks from ${snapshot.documents.length} document(s)`);
  return snapshot;
}

/**
 * Expand files and directories (recursively) into supported documents
 */
export async function readDocuments(paths: string[]): Promise<SourceDocument[]> {
  const files: Array<{ path: string; name: string }> = [];

  for (const path of paths) {
    const info = await stat(path);
    if (info.isDirectory()) {
      const entries = await readdir(path, { recursive: true });
      for (const entry of entries.sort()) {
        if (detectDocumentKind(entry)) {
          files.push({ path: join(path, entry), name: entry });
        }
      }
    } else {
      files.push({ path, name: basename(path) });
    }
  }

  if (files.length === 0) {
    error('No supported files found');
  }

  return Promise.all(
    files.map(async file => ({
      name: file.name,
      data: new Uint8Array(await readFile(file.path)),
    }))
  );
}

export async function ingestPaths(
  store: CorpusStore,
  paths: string[],
  options: ProcessOptions = {}
): Promise<CorpusSnapshot> {
  return ingestDocuments(store, await readDocuments(paths), options);
}
