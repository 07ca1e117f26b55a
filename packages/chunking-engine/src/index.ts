/**
 * FILE PURPOSE: Barrel export for the chunking engine
 *
 * WHY: Single import point. `import { ChunkingProcessor } from '@docchunk/chunking-engine'`
 */

export type {
  DocumentMap,
  DocumentNode,
  FieldMap,
  ChunkerAlgorithm,
  ChunkerParameters,
  ChunkingProcessorDefinition,
  RuntimeParameters,
} from '@docchunk/shared-types';

// ─── Processor (host adapter) ───────────────────────────────────────────────
export {
  ChunkingProcessor,
  parseMaxChunkLimit,
  PROCESSOR_TYPE,
  MAX_CHUNK_LIMIT_FIELD,
  INDEX_METADATA_FIELD,
} from './processor.js';
export type { ChunkingProcessorDeps } from './processor.js';

// ─── Chunkers ───────────────────────────────────────────────────────────────
export {
  createChunker,
  supportedAlgorithms,
  ALGORITHM_FIELD,
  DelimiterChunker,
  DELIMITER_FIELD,
  FixedTokenLengthChunker,
  computeOverlapTokens,
  TOKEN_LIMIT_FIELD,
  OVERLAP_RATE_FIELD,
  TOKENIZER_FIELD,
  TOKEN_CONCATENATOR_FIELD,
} from './chunkers/index.js';
export type { Chunker, ChunkerContext, DelimiterParams, FixedTokenLengthParams } from './chunkers/index.js';

// ─── Walker + validation ────────────────────────────────────────────────────
export { chunkDocument, walkFieldMap, validateDocument, parseFieldMap, WriteBuffer } from './walker/index.js';
export type { WalkContext, ChunkDocumentOptions } from './walker/index.js';

// ─── Quota ──────────────────────────────────────────────────────────────────
export { ChunkQuotaTracker, DISABLED_CHUNK_LIMIT } from './quota-tracker.js';

// ─── Tokenizers + settings ──────────────────────────────────────────────────
export { TokenizerRegistry, createDefaultTokenizerRegistry, BUILTIN_TOKENIZERS } from './tokenizers/index.js';
export type { Tokenizer } from './tokenizers/index.js';
export { StaticIndexSettings } from './index-settings.js';
export type { IndexSettingsLookup } from './index-settings.js';

// ─── Config + errors ────────────────────────────────────────────────────────
export { loadChunkingEnv, DEFAULT_MAX_TOKEN_COUNT, DEFAULT_MAPPING_DEPTH_LIMIT } from './config.js';
export type { ChunkingEnv } from './config.js';
export {
  ChunkingError,
  ConfigurationError,
  ShapeError,
  DepthLimitError,
  QuotaExceededError,
  TokenizationError,
} from './errors.js';
