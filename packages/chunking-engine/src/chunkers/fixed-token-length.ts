/**
 * FILE PURPOSE: Fixed-token-length chunker with fractional overlap
 * WHY: Embedding models have a token budget, not a character budget. Windows of
 *      `token_limit` tokens slide forward by `token_limit - overlap` so context
 *      that straddles a boundary appears in both neighbouring chunks.
 */

import type { ChunkerParameters, RuntimeParameters } from '@docchunk/shared-types';
import { DEFAULT_MAX_TOKEN_COUNT } from '../config.js';
import { ConfigurationError } from '../errors.js';
import type { TokenizerRegistry } from '../tokenizers/registry.js';
import type { Chunker } from './types.js';

export const TOKEN_LIMIT_FIELD = 'token_limit';
export const OVERLAP_RATE_FIELD = 'overlap_rate';
export const TOKENIZER_FIELD = 'tokenizer';
export const TOKEN_CONCATENATOR_FIELD = 'token_concatenator';

export const DEFAULT_TOKEN_LIMIT = 384;
export const DEFAULT_OVERLAP_RATE = 0;
export const DEFAULT_TOKENIZER = 'standard';
export const DEFAULT_TOKEN_CONCATENATOR = ' ';
export const MAX_OVERLAP_RATE = 0.5;

export interface FixedTokenLengthParams {
  tokenLimit: number;
  overlapRate: number;
  tokenizer: string;
  tokenConcatenator: string;
}

function readNumber(parameters: ChunkerParameters, field: string): number | undefined {
  if (!(field in parameters)) return undefined;
  const value = parameters[field];
  if (typeof value !== 'number' || Number.isNaN(value)) {
    throw new ConfigurationError(`fixed length parameter [${field}] cannot be cast to [number]`);
  }
  return value;
}

function readString(parameters: ChunkerParameters, field: string): string | undefined {
  if (!(field in parameters)) return undefined;
  const value = parameters[field];
  if (typeof value !== 'string') {
    throw new ConfigurationError(`fixed length parameter [${field}] cannot be cast to [string]`);
  }
  return value;
}

/**
 * Round-half-up on the decimal product. The product is first fixed to ten
 * fractional digits so binary noise (0.15 * 10 = 1.4999999999999998) rounds
 * the way the decimal value would.
 */
export function computeOverlapTokens(overlapRate: number, tokenLimit: number): number {
  const product = Number((overlapRate * tokenLimit).toFixed(10));
  const overlap = Math.floor(product + 0.5);
  return Math.min(overlap, tokenLimit - 1);
}

export class FixedTokenLengthChunker implements Chunker {
  readonly algorithm = 'fixed_token_length';
  readonly usesTokenizer = true;
  private readonly params: FixedTokenLengthParams;
  private readonly overlapTokens: number;

  constructor(
    parameters: ChunkerParameters,
    private readonly tokenizers: TokenizerRegistry,
  ) {
    this.params = FixedTokenLengthChunker.validateParameters(parameters);
    if (!tokenizers.has(this.params.tokenizer)) {
      throw new ConfigurationError(
        `fixed length parameter [${TOKENIZER_FIELD}] names unknown tokenizer [${this.params.tokenizer}]. ` +
          `Registered tokenizers are [${tokenizers.names().join(', ')}]`,
      );
    }
    this.overlapTokens = computeOverlapTokens(this.params.overlapRate, this.params.tokenLimit);
  }

  static validateParameters(parameters: ChunkerParameters): FixedTokenLengthParams {
    const tokenLimit = readNumber(parameters, TOKEN_LIMIT_FIELD) ?? DEFAULT_TOKEN_LIMIT;
    if (!Number.isInteger(tokenLimit) || tokenLimit <= 0) {
      throw new ConfigurationError(`fixed length parameter [${TOKEN_LIMIT_FIELD}] must be a positive integer`);
    }

    const overlapRate = readNumber(parameters, OVERLAP_RATE_FIELD) ?? DEFAULT_OVERLAP_RATE;
    if (overlapRate < 0 || overlapRate > MAX_OVERLAP_RATE) {
      throw new ConfigurationError(
        `fixed length parameter [${OVERLAP_RATE_FIELD}] must be between 0 and ${MAX_OVERLAP_RATE}`,
      );
    }

    const tokenizer = readString(parameters, TOKENIZER_FIELD) ?? DEFAULT_TOKENIZER;
    if (tokenizer.length === 0) {
      throw new ConfigurationError(`fixed length parameter [${TOKENIZER_FIELD}] should not be empty`);
    }

    const tokenConcatenator = readString(parameters, TOKEN_CONCATENATOR_FIELD) ?? DEFAULT_TOKEN_CONCATENATOR;

    return { tokenLimit, overlapRate, tokenizer, tokenConcatenator };
  }

  chunk(content: string, runtime: RuntimeParameters = {}): string[] {
    const maxTokenCount = runtime.maxTokenCount ?? DEFAULT_MAX_TOKEN_COUNT;
    const { tokenLimit, tokenizer, tokenConcatenator } = this.params;
    const tokens = this.tokenizers.tokenize(content, tokenizer, maxTokenCount);

    const chunks: string[] = [];
    const step = tokenLimit - this.overlapTokens;
    let start = 0;
    while (start < tokens.length) {
      if (start + tokenLimit >= tokens.length) {
        chunks.push(tokens.slice(start).join(tokenConcatenator));
        break;
      }
      chunks.push(tokens.slice(start, start + tokenLimit).join(tokenConcatenator));
      start += step;
    }
    return chunks;
  }
}
