/**
 * FILE PURPOSE: Per-document chunk budget
 *
 * WHY: Downstream embedding cost scales with the total number of chunks in a
 *      document, however many fields or nesting levels produced them. One
 *      tracker is threaded through the whole walk and checked after every
 *      chunking call.
 * HOW: Created fresh for each document; never shared between calls.
 *
 * EDGE CASES:
 * - maxChunkLimit === DISABLED_CHUNK_LIMIT → counts, never throws
 * - any other limit below 1, or a fraction, is rejected at construction
 * - the first call that pushes the total past the limit throws QuotaExceededError
 *   with that total
 */

import { ConfigurationError, QuotaExceededError } from './errors.js';

export const DISABLED_CHUNK_LIMIT = -1;

export class ChunkQuotaTracker {
  private total = 0;

  constructor(readonly maxChunkLimit: number = DISABLED_CHUNK_LIMIT) {
    if (!Number.isInteger(maxChunkLimit) || (maxChunkLimit <= 0 && maxChunkLimit !== DISABLED_CHUNK_LIMIT)) {
      throw new ConfigurationError(
        `max chunk limit must be a positive integer or ${DISABLED_CHUNK_LIMIT}, got [${maxChunkLimit}]`,
      );
    }
  }

  get count(): number {
    return this.total;
  }

  get enabled(): boolean {
    return this.maxChunkLimit !== DISABLED_CHUNK_LIMIT;
  }

  /** Adds one chunking call's output and enforces the limit. */
  record(produced: number): void {
    this.total += produced;
    this.ensureWithinLimit();
  }

  ensureWithinLimit(): void {
    if (this.enabled && this.total > this.maxChunkLimit) {
      throw new QuotaExceededError(this.total, this.maxChunkLimit);
    }
  }
}
