/**
 * FILE PURPOSE: Named tokenizer lookup with the max-token-count guard
 *
 * WHY: Chunkers name their tokenizer in configuration; the registry resolves
 *      it at construction and enforces the per-index token cutoff at call time.
 * HOW: Same register/get shape as an adapter registry. Failures inside a
 *      tokenizer surface as TokenizationError with the thrown value as `cause`.
 */

import { TokenizationError } from '../errors.js';
import { BUILTIN_TOKENIZERS } from './builtin.js';
import type { Tokenizer } from './types.js';

export class TokenizerRegistry {
  private tokenizers = new Map<string, Tokenizer>();

  register(tokenizer: Tokenizer): void {
    this.tokenizers.set(tokenizer.name, tokenizer);
  }

  has(name: string): boolean {
    return this.tokenizers.has(name);
  }

  names(): string[] {
    return [...this.tokenizers.keys()];
  }

  tokenize(text: string, tokenizerName: string, maxTokenCount: number): string[] {
    const tokenizer = this.tokenizers.get(tokenizerName);
    if (!tokenizer) {
      throw new TokenizationError(tokenizerName, `tokenizer [${tokenizerName}] is not registered`);
    }

    let tokens: string[];
    try {
      tokens = tokenizer.tokenize(text);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new TokenizationError(tokenizerName, `tokenizer [${tokenizerName}] failed: ${reason}`, { cause: err });
    }

    if (tokens.length > maxTokenCount) {
      throw new TokenizationError(
        tokenizerName,
        `The number of tokens produced by tokenizer [${tokenizerName}] has exceeded the allowed maximum of [${maxTokenCount}]`,
      );
    }
    return tokens;
  }
}

export function createDefaultTokenizerRegistry(): TokenizerRegistry {
  const registry = new TokenizerRegistry();
  for (const tokenizer of BUILTIN_TOKENIZERS) registry.register(tokenizer);
  return registry;
}
