/**
 * FILE PURPOSE: Staged chunk writes, committed only when a document succeeds
 *
 * WHY: A quota overflow halfway through a document must not leave earlier
 *      fields rewritten. Reads go through the buffer so a later field map
 *      entry sees what an earlier one staged, as with in-place writes.
 */

import type { DocumentMap, DocumentNode } from '@docchunk/shared-types';
import { readOwnField, writeOwnField } from './guards.js';

export class WriteBuffer {
  private staged = new Map<DocumentMap, Map<string, string[]>>();

  read(level: DocumentMap, key: string): DocumentNode | undefined {
    const pending = this.staged.get(level);
    if (pending?.has(key)) return pending.get(key);
    return readOwnField(level, key);
  }

  stage(level: DocumentMap, key: string, chunks: string[]): void {
    let pending = this.staged.get(level);
    if (!pending) {
      pending = new Map();
      this.staged.set(level, pending);
    }
    pending.set(key, chunks);
  }

  commit(): void {
    for (const [level, pending] of this.staged) {
      for (const [key, chunks] of pending) writeOwnField<DocumentNode | undefined>(level, key, chunks);
    }
    this.staged.clear();
  }
}
