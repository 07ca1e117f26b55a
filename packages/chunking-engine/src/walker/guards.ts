import type { DocumentMap, DocumentNode } from '@docchunk/shared-types';

export function isDocumentMap(value: unknown): value is DocumentMap {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Own fields only: `constructor` or `toString` on a plain object is not a document field. */
export function readOwnField(level: DocumentMap, key: string): DocumentNode | undefined {
  return Object.hasOwn(level, key) ? level[key] : undefined;
}

/** Defines `key` as an ordinary field, including `__proto__`. */
export function writeOwnField<T>(target: Record<string, T>, key: string, value: T): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}
