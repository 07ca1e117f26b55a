/**
 * FILE PURPOSE: Tokenizer port consumed by token-based chunkers
 */

/** Turns text into an ordered list of token strings. Must be deterministic. */
export interface Tokenizer {
  readonly name: string;
  tokenize(text: string): string[];
}
