/**
 * FILE PURPOSE: Index settings lookup — resolves `max_token_count` per index
 * WHY: Token cutoffs are an index setting, only known once a document says
 *      which index it belongs to.
 */

import { DEFAULT_MAX_TOKEN_COUNT } from './config.js';

export interface IndexSettingsLookup {
  maxTokenCountFor(index: string | undefined): number;
}

/** In-memory settings: per-index overrides with a global default. */
export class StaticIndexSettings implements IndexSettingsLookup {
  private readonly overrides: Map<string, number>;

  constructor(
    private readonly defaultMaxTokenCount: number = DEFAULT_MAX_TOKEN_COUNT,
    overrides: Map<string, number> | Record<string, number> = {},
  ) {
    this.overrides = overrides instanceof Map ? new Map(overrides) : new Map(Object.entries(overrides));
  }

  maxTokenCountFor(index: string | undefined): number {
    if (index === undefined) return this.defaultMaxTokenCount;
    return this.overrides.get(index) ?? this.defaultMaxTokenCount;
  }
}
