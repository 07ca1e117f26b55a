/**
 * FILE PURPOSE: Error taxonomy for the chunking engine
 *
 * WHY: Every failure aborts the whole document. Hosts branch on the class
 *      (or `name`) to decide whether to fix configuration or drop the document.
 */

export class ChunkingError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ChunkingError';
  }
}

/** Algorithm, parameter, field map or environment configuration is invalid. */
export class ConfigurationError extends ChunkingError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/** A mapped field holds a value that is not a string, list or map. */
export class ShapeError extends ChunkingError {
  readonly field: string;

  constructor(field: string, message: string) {
    super(message);
    this.name = 'ShapeError';
    this.field = field;
  }
}

export class DepthLimitError extends ChunkingError {
  readonly field: string;
  readonly maxDepth: number;

  constructor(field: string, maxDepth: number) {
    super(`map type field [${field}] reached max depth limit, cannot process it`);
    this.name = 'DepthLimitError';
    this.field = field;
    this.maxDepth = maxDepth;
  }
}

export class QuotaExceededError extends ChunkingError {
  readonly chunkCount: number;
  readonly maxChunkLimit: number;

  constructor(chunkCount: number, maxChunkLimit: number) {
    super(
      `Unable to chunk the document as the number of chunks [${chunkCount}] exceeds the maximum chunk limit [${maxChunkLimit}]`,
    );
    this.name = 'QuotaExceededError';
    this.chunkCount = chunkCount;
    this.maxChunkLimit = maxChunkLimit;
  }
}

/** The tokenizer failed or produced more tokens than the index allows. */
export class TokenizationError extends ChunkingError {
  readonly tokenizer: string;

  constructor(tokenizer: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TokenizationError';
    this.tokenizer = tokenizer;
  }
}
