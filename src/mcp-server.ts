// Set MCP mode to suppress stdout logging
process.env.MCP_MODE = 'true';

import 'dotenv/config';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { CorpusStore } from './db/store';
import { ingestPaths } from './services/ingest';
import { createModelBackend } from './services/llm';
import { askQuestion, searchDocuments } from './services/rag';
import { LLM_MODEL, MODEL_BACKEND } from './constants/providers';
import {
  DEFAULT_TOP_K,
  MAX_CHUNK_SIZE,
  MAX_CONTEXT_LENGTH,
  MAX_TOP_K,
} from './constants/rag';
import { EmptyCorpusError, describeError } from './utils/errors';
import { error } from './utils/logger';

const IngestArgs = z.object({
  paths: z.array(z.string().min(1)).min(1),
  maxChunkSize: z.number().int().positive().optional(),
});

const SearchArgs = z.object({
  query: z.string().min(1),
  topK: z.number().int().positive().optional(),
});

const AskArgs = z.object({
  question: z.string().min(1),
  topK: z.number().int().positive().optional(),
  model: z.string().min(1).optional(),
  maxContextSize: z.number().int().positive().optional(),
  timeoutMs: z.number().int().positive().optional(),
  systemPrompt: z.string().optional(),
});

const store = new CorpusStore();
const backend = createModelBackend();

function jsonResult(value: unknown, isError = false) {
  return {
    content: [{ type: 'text' as const, text: JSON.stringify(value, null, 2) }],
    ...(isError ? { isError: true } : {}),
  };
}

const server = new Server(
  {
    name: 'finance-docs-qa',
    version: '1.0.0',
  },
  {
    capabilities: {
      tools: {},
    },
  }
);

// List available tools
server.setRequestHandler(ListToolsRequestSchema, async () => {
  return {
    tools: [
      {
        name: 'documents_ingest',
        description:
          'Extract, chunk and index PDF, Excel or CSV files. Replaces the current corpus.',
        inputSchema: {
          type: 'object',
          properties: {
            paths: {
              type: 'array',
              items: { type: 'string' },
              description: 'Files or directories to ingest',
            },
            maxChunkSize: {
              type: 'number',
              description: `Maximum chunk size in characters (default: ${MAX_CHUNK_SIZE})`,
              default: MAX_CHUNK_SIZE,
            },
          },
          required: ['paths'],
        },
      },
      {
        name: 'documents_search',
        description:
          'Rank indexed chunks against a query by TF-IDF cosine similarity',
        inputSchema: {
          type: 'object',
          properties: {
            query: {
              type: 'string',
              description: 'The search query text',
            },
            topK: {
              type: 'number',
              description: `Number of results to return (default: ${DEFAULT_TOP_K}, max: ${MAX_TOP_K})`,
              default: DEFAULT_TOP_K,
            },
          },
          required: ['query'],
        },
      },
      {
        name: 'documents_ask',
        description:
          'Answer a question from the ingested financial documents using the local model',
        inputSchema: {
          type: 'object',
          properties: {
            question: {
              type: 'string',
              description: 'The question to ask',
            },
            topK: {
              type: 'number',
              description: `Number of chunks to use as context (default: ${DEFAULT_TOP_K})`,
              default: DEFAULT_TOP_K,
            },
            model: {
              type: 'string',
              description: `Local model name (default: ${LLM_MODEL})`,
            },
            maxContextSize: {
              type: 'number',
              description: `Maximum context length in characters (default: ${MAX_CONTEXT_LENGTH})`,
              default: MAX_CONTEXT_LENGTH,
            },
            timeoutMs: {
              type: 'number',
              description: 'Give up on the model after this many milliseconds',
            },
            systemPrompt: {
              type: 'string',
              description: 'Optional custom system prompt for the model',
            },
          },
          required: ['question'],
        },
      },
      {
        name: 'documents_status',
        description: 'Get the indexed documents and chunk count',
        inputSchema: {
          type: 'object',
          properties: {},
        },
      },
    ],
  };
});

// Handle tool calls
server.setRequestHandler(CallToolRequestSchema, async request => {
  const { name, arguments: args = {} } = request.params;

  try {
    switch (name) {
      case 'documents_ingest': {
        const { paths, maxChunkSize } = IngestArgs.parse(args);
        const snapshot = await ingestPaths(store, paths, { maxChunkSize });
        return jsonResult(snapshot.summary);
      }

      case 'documents_search': {
        const { query, topK } = SearchArgs.parse(args);
        return jsonResult(searchDocuments(store, query, topK));
      }

      case 'documents_ask': {
        const { question, systemPrompt, ...overrides } = AskArgs.parse(args);
        const result = await askQuestion(store, backend, question, {
          ...overrides,
          systemPrompt,
        });

        if (result.status === 'unavailable') {
          const { error: failure, ...rest } = result;
          return jsonResult({
            ...rest,
            error: { reason: failure.reason, message: failure.message },
          });
        }
        return jsonResult(result);
      }

      case 'documents_status': {
        const snapshot = store.snapshot;
        return jsonResult({
          status: snapshot ? 'ready' : 'empty',
          documents: snapshot?.documents ?? [],
          document_chunks: store.getChunkCount(),
          vocabulary_size: snapshot?.index.vocabulary.size ?? 0,
          model_backend: MODEL_BACKEND,
          llm_model: LLM_MODEL,
        });
      }

      default:
        throw new Error(`Unknown tool: ${name}`);
    }
  } catch (err) {
    if (err instanceof z.ZodError) {
      return jsonResult({ error: 'Invalid arguments', issues: err.issues }, true);
    }
    if (err instanceof EmptyCorpusError) {
      return jsonResult({ error: err.message, summary: err.summary }, true);
    }
    error(`[${name}]`, describeError(err));
    return jsonResult({ error: describeError(err) }, true);
  }
});

// Start the server
async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  // Server is now running - no logging needed in MCP mode
}

main().catch(err => {
  console.error('Fatal error:', err);
  process.exit(1);
});
