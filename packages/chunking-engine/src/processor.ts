/**
 * FILE PURPOSE: Chunking processor — host adapter around the walker
 *
 * WHY: Hosts store processors as definitions (`field_map`, `algorithm`,
 *      `max_chunk_limit`). This class parses one definition once and then
 *      chunks any number of documents with it.
 * HOW: create() validates everything that does not depend on a document.
 *      execute() resolves runtime parameters from the document's index,
 *      gives the call its own quota tracker, and runs the walker.
 *
 * EXAMPLE:
 * ```typescript
 * const processor = ChunkingProcessor.create({
 *   field_map: { body: 'body_chunks' },
 *   algorithm: { fixed_token_length: { token_limit: 128, overlap_rate: 0.2 } },
 *   max_chunk_limit: 100,
 * });
 * processor.execute({ _index: 'articles', body: longText });
 * ```
 */

import type { DocumentMap, FieldMap, RuntimeParameters } from '@docchunk/shared-types';
import { ALGORITHM_FIELD, createChunker } from './chunkers/index.js';
import type { Chunker } from './chunkers/types.js';
import { loadChunkingEnv } from './config.js';
import { ChunkingError, ConfigurationError } from './errors.js';
import { StaticIndexSettings } from './index-settings.js';
import type { IndexSettingsLookup } from './index-settings.js';
import { ChunkQuotaTracker, DISABLED_CHUNK_LIMIT } from './quota-tracker.js';
import { createDefaultTokenizerRegistry } from './tokenizers/registry.js';
import type { TokenizerRegistry } from './tokenizers/registry.js';
import { chunkDocument } from './walker/field-map-walker.js';
import { isDocumentMap } from './walker/guards.js';
import { FIELD_MAP_FIELD, parseFieldMap } from './walker/validation.js';

export const PROCESSOR_TYPE = 'chunking';
export const MAX_CHUNK_LIMIT_FIELD = 'max_chunk_limit';
export const INDEX_METADATA_FIELD = '_index';

export interface ChunkingProcessorDeps {
  tokenizers?: TokenizerRegistry;
  indexSettings?: IndexSettingsLookup;
  mappingDepthLimit?: number;
}

export function parseMaxChunkLimit(raw: unknown): number {
  if (raw === undefined) return DISABLED_CHUNK_LIMIT;
  if (typeof raw !== 'number' || !Number.isInteger(raw)) {
    throw new ConfigurationError(`Parameter [${MAX_CHUNK_LIMIT_FIELD}] must be an integer`);
  }
  if (raw <= 0 && raw !== DISABLED_CHUNK_LIMIT) {
    throw new ConfigurationError(`Parameter [${MAX_CHUNK_LIMIT_FIELD}] must be a positive integer`);
  }
  return raw;
}

export class ChunkingProcessor {
  readonly type = PROCESSOR_TYPE;

  private constructor(
    readonly tag: string | undefined,
    readonly description: string | undefined,
    readonly fieldMap: FieldMap,
    readonly chunker: Chunker,
    readonly maxChunkLimit: number,
    private readonly indexSettings: IndexSettingsLookup,
    private readonly mappingDepthLimit: number,
  ) {}

  static create(definition: unknown, deps: ChunkingProcessorDeps = {}): ChunkingProcessor {
    if (!isDocumentMap(definition)) {
      throw new ConfigurationError('Unable to create the processor as the definition must be an object');
    }
    const { tag, description } = definition;
    if (tag !== undefined && typeof tag !== 'string') {
      throw new ConfigurationError('Parameter [tag] must be a string');
    }
    if (description !== undefined && typeof description !== 'string') {
      throw new ConfigurationError('Parameter [description] must be a string');
    }

    // Env is only read for whatever the caller did not inject.
    const needsEnv = deps.indexSettings === undefined || deps.mappingDepthLimit === undefined;
    const env = needsEnv ? loadChunkingEnv() : undefined;
    const indexSettings =
      deps.indexSettings ?? new StaticIndexSettings(env?.maxTokenCount, env?.indexMaxTokenCounts);
    const mappingDepthLimit = deps.mappingDepthLimit ?? env?.mappingDepthLimit;
    if (mappingDepthLimit === undefined || !Number.isInteger(mappingDepthLimit) || mappingDepthLimit <= 0) {
      throw new ConfigurationError('mapping depth limit must be a positive integer');
    }

    const fieldMap = parseFieldMap(definition[FIELD_MAP_FIELD]);
    const chunker = createChunker(definition[ALGORITHM_FIELD], {
      tokenizers: deps.tokenizers ?? createDefaultTokenizerRegistry(),
    });
    const maxChunkLimit = parseMaxChunkLimit(definition[MAX_CHUNK_LIMIT_FIELD]);

    return new ChunkingProcessor(
      tag,
      description,
      fieldMap,
      chunker,
      maxChunkLimit,
      indexSettings,
      mappingDepthLimit,
    );
  }

  private resolveRuntimeParameters(document: DocumentMap): RuntimeParameters {
    if (!this.chunker.usesTokenizer) return {};
    const index = document[INDEX_METADATA_FIELD];
    return {
      maxTokenCount: this.indexSettings.maxTokenCountFor(typeof index === 'string' ? index : undefined),
    };
  }

  /** Chunks the mapped fields of `document` in place and returns it. */
  execute(document: DocumentMap): DocumentMap {
    try {
      return chunkDocument(document, this.fieldMap, this.chunker, new ChunkQuotaTracker(this.maxChunkLimit), {
        maxDepth: this.mappingDepthLimit,
        runtime: this.resolveRuntimeParameters(document),
      });
    } catch (err) {
      if (err instanceof ChunkingError) {
        const index = document[INDEX_METADATA_FIELD];
        process.stderr.write(
          `WARN: chunking aborted for document in index [${typeof index === 'string' ? index : 'unknown'}]: ${err.message}\n`,
        );
      }
      throw err;
    }
  }
}
