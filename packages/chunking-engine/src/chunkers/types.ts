/**
 * FILE PURPOSE: Capability interface shared by every chunking algorithm
 */

import type { ChunkerAlgorithm, RuntimeParameters } from '@docchunk/shared-types';

export interface Chunker {
  readonly algorithm: ChunkerAlgorithm;
  /** True when `chunk` needs `RuntimeParameters.maxTokenCount` from the index settings. */
  readonly usesTokenizer: boolean;
  chunk(content: string, runtime?: RuntimeParameters): string[];
}
