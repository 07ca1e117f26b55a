/**
 * FILE PURPOSE: Shape and depth checks run before a document is touched
 *
 * WHY: A malformed value deep inside a mapped field must fail the document
 *      before any chunk is produced. Field maps are checked once when the
 *      processor is built.
 *
 * DEPTH: the top-level list or map of a mapped field is depth 1; every map
 *        value and every map inside a list adds one.
 */

import type { DocumentMap, DocumentNode, FieldMap } from '@docchunk/shared-types';
import { ConfigurationError, DepthLimitError, ShapeError } from '../errors.js';
import { isDocumentMap, readOwnField, writeOwnField } from './guards.js';

export const FIELD_MAP_FIELD = 'field_map';

export function validateDocument(document: DocumentMap, fieldMap: FieldMap, maxDepth: number): void {
  for (const sourceKey of Object.keys(fieldMap)) {
    const value = readOwnField(document, sourceKey);
    if (value === null || value === undefined) continue;
    if (Array.isArray(value) || isDocumentMap(value)) {
      validateNestedValue(sourceKey, value, 1, maxDepth);
    } else if (typeof value !== 'string') {
      throw new ShapeError(sourceKey, `field [${sourceKey}] is neither string nor nested type, cannot process it`);
    }
  }
}

function validateNestedValue(sourceKey: string, value: DocumentNode, depth: number, maxDepth: number): void {
  if (depth > maxDepth) {
    throw new DepthLimitError(sourceKey, maxDepth);
  }
  if (Array.isArray(value)) {
    validateListValue(sourceKey, value, depth, maxDepth);
  } else if (isDocumentMap(value)) {
    for (const nested of Object.values(value)) {
      if (nested === null || nested === undefined) continue;
      validateNestedValue(sourceKey, nested, depth + 1, maxDepth);
    }
  } else if (typeof value !== 'string') {
    throw new ShapeError(sourceKey, `map type field [${sourceKey}] has non-string type, cannot process it`);
  }
}

function validateListValue(sourceKey: string, list: DocumentNode[], depth: number, maxDepth: number): void {
  for (const element of list) {
    if (isDocumentMap(element)) {
      validateNestedValue(sourceKey, element, depth + 1, maxDepth);
    } else if (element === null || element === undefined) {
      throw new ShapeError(sourceKey, `list type field [${sourceKey}] has null, cannot process it`);
    } else if (typeof element !== 'string') {
      throw new ShapeError(sourceKey, `list type field [${sourceKey}] has non string value, cannot process it`);
    }
  }
}

/**
 * Checks a raw `field_map` and returns a frozen copy, so the map a processor
 * holds cannot change between documents.
 */
export function parseFieldMap(raw: unknown, path: string = FIELD_MAP_FIELD): FieldMap {
  if (!isDocumentMap(raw)) {
    throw new ConfigurationError(`[${path}] must be an object`);
  }
  const entries = Object.entries(raw);
  if (entries.length === 0) {
    throw new ConfigurationError(`[${path}] must not be empty`);
  }

  const parsed: FieldMap = {};
  for (const [sourceKey, target] of entries) {
    const fieldPath = `${path}.${sourceKey}`;
    if (sourceKey.length === 0) {
      throw new ConfigurationError(`[${path}] contains an empty field name`);
    }
    if (typeof target === 'string') {
      if (target.length === 0) {
        throw new ConfigurationError(`[${fieldPath}] output field name must not be empty`);
      }
      writeOwnField<string | FieldMap>(parsed, sourceKey, target);
    } else if (isDocumentMap(target)) {
      writeOwnField<string | FieldMap>(parsed, sourceKey, parseFieldMap(target, fieldPath));
    } else {
      throw new ConfigurationError(`[${fieldPath}] must be an output field name or a nested field map`);
    }
  }
  return Object.freeze(parsed);
}
