import 'dotenv/config';
import { parseArgs } from 'node:util';
import { CorpusStore } from '../db/store';
import { ingestPaths } from '../services/ingest';
import { createModelBackend } from '../services/llm';
import { askQuestion } from '../services/rag';
import type { ProcessingSummary } from '../types/index';
import { EmptyCorpusError } from '../utils/errors';

const USAGE = 'Usage: tsx src/scripts/ask.ts <file-or-dir>... --question "..." [--top-k N] [--model NAME]';

function printSummary(summary: ProcessingSummary) {
  const successful = summary.documents.filter(d => d.success);
  const failed = summary.documents.filter(d => !d.success);

  console.log('\n=== Ingestion Summary ===');
  console.log(`Total files processed: ${summary.documents.length}`);
  console.log(`Successful: ${successful.length}`);
  console.log(`Failed: ${failed.length}`);
  console.log(`Total chunks created: ${summary.total_chunks}`);
  console.log(`Time elapsed: ${(summary.took_ms / 1000).toFixed(2)}s`);

  if (failed.length > 0) {
    console.log('\nFailed files:');
    failed.forEach(f => {
      console.log(`  - ${f.filename}: ${f.error}`);
    });
  }

  const issues = summary.documents.flatMap(d => d.issues);
  if (issues.length > 0) {
    console.log('\nSkipped sections:');
    issues.forEach(issue => {
      console.log(`  - ${issue.documentId}: ${issue.message}`);
    });
  }
}

async function main() {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      question: { type: 'string', short: 'q' },
      'top-k': { type: 'string', short: 'k' },
      model: { type: 'string', short: 'm' },
    },
  });

  const question = values.question;
  if (!question || positionals.length === 0) {
    console.error(USAGE);
    process.exit(1);
  }

  const topK = values['top-k'] === undefined ? undefined : Number(values['top-k']);

  console.log('=== Financial Document Q&A ===\n');

  const store = new CorpusStore();
  try {
    const snapshot = await ingestPaths(store, positionals);
    printSummary(snapshot.summary);
  } catch (err) {
    if (err instanceof EmptyCorpusError && err.summary) {
      printSummary(err.summary);
    }
    throw err;
  }

  console.log(`\nQuestion: ${question}\n`);
  const result = await askQuestion(store, createModelBackend(), question, {
    topK,
    model: values.model,
  });

  if (result.status === 'answered') {
    console.log(result.answer.text);
  } else {
    console.log(result.message);
  }
  if (!result.contextFound) {
    console.log('\n(No relevant context was found in the documents.)');
  }

  if (result.sources.length > 0) {
    console.log('\nSources:');
    result.sources.forEach(source => {
      console.log(`  [${source.similarity.toFixed(3)}] ${source.provenance}`);
    });
  }
  console.log(`\nTime elapsed: ${(result.took_ms / 1000).toFixed(2)}s`);
}

main().catch(err => {
  console.error('Fatal error:', err instanceof Error ? err.message : err);
  process.exit(1);
});
