/**
 * FILE PURPOSE: Recursive field-map walker — finds mapped text and writes chunks back
 *
 * WHY: Text to chunk can sit anywhere in a nested document. The field map
 *      mirrors the document's shape: a string target means "chunk this field
 *      into a sibling key", a nested map means "descend".
 * HOW: validate → walk (staging writes, recording every chunking call on the
 *      quota tracker) → commit. Any throw leaves the document as it was.
 */

import type { DocumentMap, DocumentNode, FieldMap, RuntimeParameters } from '@docchunk/shared-types';
import type { Chunker } from '../chunkers/types.js';
import type { ChunkQuotaTracker } from '../quota-tracker.js';
import { isDocumentMap } from './guards.js';
import { validateDocument } from './validation.js';
import { WriteBuffer } from './write-buffer.js';

export interface WalkContext {
  chunker: Chunker;
  quota: ChunkQuotaTracker;
  runtime: RuntimeParameters;
  writes: WriteBuffer;
}

/** Strings and lists made only of strings are chunkable; everything else yields no text. */
function toTextUnits(value: DocumentNode | undefined): string[] {
  if (typeof value === 'string') return [value];
  if (Array.isArray(value) && value.every((element): element is string => typeof element === 'string')) {
    return value;
  }
  return [];
}

function chunkLeaf(value: DocumentNode | undefined, context: WalkContext): string[] {
  const result: string[] = [];
  for (const unit of toTextUnits(value)) {
    const chunks = context.chunker.chunk(unit, context.runtime);
    context.quota.record(chunks.length);
    result.push(...chunks);
  }
  return result;
}

export function walkFieldMap(level: DocumentMap, fieldMap: FieldMap, context: WalkContext): void {
  for (const [sourceKey, target] of Object.entries(fieldMap)) {
    const source = context.writes.read(level, sourceKey);

    if (typeof target === 'string') {
      context.writes.stage(level, target, chunkLeaf(source, context));
      continue;
    }

    if (Array.isArray(source)) {
      for (const element of source) {
        if (isDocumentMap(element)) walkFieldMap(element, target, context);
      }
    } else if (isDocumentMap(source)) {
      walkFieldMap(source, target, context);
    }
  }
}

export interface ChunkDocumentOptions {
  maxDepth: number;
  runtime?: RuntimeParameters;
}

/**
 * Chunks every mapped field of `document` in place.
 *
 * EXAMPLE:
 * ```typescript
 * const doc = { body: 'a\nb', _index: 'articles' };
 * chunkDocument(doc, { body: 'body_chunks' }, new DelimiterChunker({ delimiter: '\n' }),
 *   new ChunkQuotaTracker(), { maxDepth: 20 });
 * // doc.body_chunks → ['a\n', 'b']
 * ```
 */
export function chunkDocument(
  document: DocumentMap,
  fieldMap: FieldMap,
  chunker: Chunker,
  quota: ChunkQuotaTracker,
  options: ChunkDocumentOptions,
): DocumentMap {
  validateDocument(document, fieldMap, options.maxDepth);
  const writes = new WriteBuffer();
  walkFieldMap(document, fieldMap, { chunker, quota, runtime: options.runtime ?? {}, writes });
  writes.commit();
  return document;
}
