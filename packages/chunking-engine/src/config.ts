/**
 * FILE PURPOSE: Environment-driven defaults for the chunking engine
 *
 * WHY: The max token count and mapping depth limit are host settings, not part
 *      of a processor definition. Read once, pass down explicitly.
 */

import { ConfigurationError } from './errors.js';

export const DEFAULT_MAX_TOKEN_COUNT = 10_000;
export const DEFAULT_MAPPING_DEPTH_LIMIT = 20;

export interface ChunkingEnv {
  /** Tokenizer cutoff for documents whose index has no override. */
  maxTokenCount: number;
  /** Deepest nesting a mapped source value may reach. */
  mappingDepthLimit: number;
  /** Per-index `max_token_count` overrides. */
  indexMaxTokenCounts: Map<string, number>;
}

function parsePositiveInt(name: string, raw: string | undefined, fallback?: number): number {
  if ((raw === undefined || raw.trim() === '') && fallback !== undefined) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`${name} must be a positive integer, got [${raw}]`);
  }
  return value;
}

/** Parses `index-a=512,index-b=2048`. */
export function parseIndexOverrides(raw: string | undefined): Map<string, number> {
  const overrides = new Map<string, number>();
  if (!raw) return overrides;
  for (const entry of raw.split(',')) {
    const trimmed = entry.trim();
    if (!trimmed) continue;
    const sep = trimmed.lastIndexOf('=');
    if (sep <= 0) {
      throw new ConfigurationError(`CHUNKING_INDEX_MAX_TOKEN_COUNTS entry [${trimmed}] must look like index=count`);
    }
    const index = trimmed.slice(0, sep).trim();
    overrides.set(index, parsePositiveInt(`max_token_count for index [${index}]`, trimmed.slice(sep + 1)));
  }
  return overrides;
}

export function loadChunkingEnv(env: NodeJS.ProcessEnv = process.env): ChunkingEnv {
  return {
    maxTokenCount: parsePositiveInt('CHUNKING_MAX_TOKEN_COUNT', env.CHUNKING_MAX_TOKEN_COUNT, DEFAULT_MAX_TOKEN_COUNT),
    mappingDepthLimit: parsePositiveInt(
      'CHUNKING_MAPPING_DEPTH_LIMIT',
      env.CHUNKING_MAPPING_DEPTH_LIMIT,
      DEFAULT_MAPPING_DEPTH_LIMIT,
    ),
    indexMaxTokenCounts: parseIndexOverrides(env.CHUNKING_INDEX_MAX_TOKEN_COUNTS),
  };
}
