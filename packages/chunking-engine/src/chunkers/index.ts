/**
 * FILE PURPOSE: Chunker factory — algorithm name → configured chunker
 * WHY: The processor definition names exactly one algorithm. Adding an
 *      algorithm means adding a constructor here, never touching the walker.
 */

import type { ChunkerAlgorithm, ChunkerParameters } from '@docchunk/shared-types';
import { ConfigurationError } from '../errors.js';
import type { TokenizerRegistry } from '../tokenizers/registry.js';
import { DelimiterChunker } from './delimiter.js';
import { FixedTokenLengthChunker } from './fixed-token-length.js';
import type { Chunker } from './types.js';

export type { Chunker } from './types.js';
export { DelimiterChunker, DELIMITER_FIELD } from './delimiter.js';
export type { DelimiterParams } from './delimiter.js';
export {
  FixedTokenLengthChunker,
  computeOverlapTokens,
  TOKEN_LIMIT_FIELD,
  OVERLAP_RATE_FIELD,
  TOKENIZER_FIELD,
  TOKEN_CONCATENATOR_FIELD,
} from './fixed-token-length.js';
export type { FixedTokenLengthParams } from './fixed-token-length.js';

export const ALGORITHM_FIELD = 'algorithm';

export interface ChunkerContext {
  tokenizers: TokenizerRegistry;
}

type ChunkerConstructor = (parameters: ChunkerParameters, context: ChunkerContext) => Chunker;

const constructors: Record<ChunkerAlgorithm, ChunkerConstructor> = {
  fixed_token_length: (parameters, context) => new FixedTokenLengthChunker(parameters, context.tokenizers),
  delimiter: (parameters) => new DelimiterChunker(parameters),
};

export function supportedAlgorithms(): ChunkerAlgorithm[] {
  return ['fixed_token_length', 'delimiter'];
}

function isSupportedAlgorithm(name: string): name is ChunkerAlgorithm {
  return Object.prototype.hasOwnProperty.call(constructors, name);
}

function isParameterObject(value: unknown): value is ChunkerParameters {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Builds the single chunker named in an `algorithm` definition. */
export function createChunker(algorithmDefinition: unknown, context: ChunkerContext): Chunker {
  if (!isParameterObject(algorithmDefinition) || Object.keys(algorithmDefinition).length !== 1) {
    throw new ConfigurationError(
      `Unable to create the processor as [${ALGORITHM_FIELD}] must contain and only contain 1 algorithm`,
    );
  }
  const [name, parameters] = Object.entries(algorithmDefinition)[0]!;
  if (!isSupportedAlgorithm(name)) {
    throw new ConfigurationError(
      `Unable to create the processor as chunker algorithm [${name}] is not supported. ` +
        `Supported chunkers types are [${supportedAlgorithms().join(', ')}]`,
    );
  }
  if (!isParameterObject(parameters)) {
    throw new ConfigurationError(`Unable to create the processor as [${name}] parameters must be an object`);
  }
  return constructors[name](parameters, context);
}
