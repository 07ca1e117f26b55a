/**
 * FILE PURPOSE: Shared types for the document chunking engine
 *
 * WHY: Single source of truth for the document tree, field map and processor
 *      definition. Hosts import from here instead of defining their own copies.
 * HOW: Type-only exports; no runtime code lives in this package.
 */

/** A JSON scalar that may appear in an incoming document. */
export type DocumentScalar = string | number | boolean | null;

/** Any node of a document tree. */
export type DocumentNode = DocumentScalar | DocumentNode[] | DocumentMap;

/** A string-keyed level of a document. The root also carries metadata such as `_index`. */
export interface DocumentMap {
  [key: string]: DocumentNode | undefined;
}

/**
 * Source field → output field name, or source field → nested field map when the
 * source value is itself a map (or a list of maps).
 */
export interface FieldMap {
  [sourceField: string]: string | FieldMap;
}

/** Registered chunking algorithm names. */
export type ChunkerAlgorithm = 'fixed_token_length' | 'delimiter';

/** Raw parameters for one algorithm, validated by the chunker that owns them. */
export type ChunkerParameters = Record<string, unknown>;

/** Processor definition as a host would store it (snake_case keys). */
export interface ChunkingProcessorDefinition {
  tag?: string;
  description?: string;
  field_map: FieldMap;
  algorithm: Partial<Record<ChunkerAlgorithm, ChunkerParameters>>;
  /** Positive integer, or -1 to disable the check. */
  max_chunk_limit?: number;
}

/** Parameters only known while a document is processed. */
export interface RuntimeParameters {
  /** Tokenizer cutoff resolved from the document's index settings. */
  maxTokenCount?: number;
}
