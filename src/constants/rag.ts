import { readIntEnv } from './providers';

// Chunking (characters of chunk text)
export const MAX_CHUNK_SIZE = readIntEnv('MAX_CHUNK_SIZE', 800);
export const BLOCK_SEPARATOR = '\n';

// Extraction
export const CELL_DELIMITER = ' | ';

// Retrieval
export const DEFAULT_TOP_K = readIntEnv('DEFAULT_TOP_K', 3);
export const MAX_TOP_K = 50;
export const MAX_QUERY_LENGTH = 1000;

// Context Assembly
export const MAX_CONTEXT_LENGTH = readIntEnv('MAX_CONTEXT_LENGTH', 4000);
export const MIN_CONTEXT_SIZE = 200;
export const CONTEXT_SEPARATOR = '\n\n---\n\n';
export const TRUNCATION_MARKER = '\n\n[... truncated for length ...]';

// Generation
export const GENERATION_TEMPERATURE = 0.2;
