/**
 * FILE PURPOSE: Built-in tokenizers registered by default
 *
 * WHY: Fixed-token-length chunking needs a word-level tokenizer out of the box.
 *      `standard` mirrors a search engine's default analyzer (Unicode word
 *      boundaries, punctuation dropped); `cl100k_base` counts tokens the way
 *      OpenAI embedding models do.
 */

import { encode, decodeGenerator } from 'gpt-tokenizer';
import type { Tokenizer } from './types.js';

const wordSegmenter = new Intl.Segmenter('en', { granularity: 'word' });

export const standardTokenizer: Tokenizer = {
  name: 'standard',
  tokenize(text) {
    const tokens: string[] = [];
    for (const segment of wordSegmenter.segment(text)) {
      if (segment.isWordLike) tokens.push(segment.segment);
    }
    return tokens;
  },
};

export const whitespaceTokenizer: Tokenizer = {
  name: 'whitespace',
  tokenize(text) {
    return text.split(/\s+/).filter((t) => t.length > 0);
  },
};

export const letterTokenizer: Tokenizer = {
  name: 'letter',
  tokenize(text) {
    return text.match(/\p{L}+/gu) ?? [];
  },
};

/** Whole input as a single token. */
export const keywordTokenizer: Tokenizer = {
  name: 'keyword',
  tokenize(text) {
    return text.length > 0 ? [text] : [];
  },
};

/**
 * BPE tokens of the cl100k_base encoding. A character split across several ids
 * (CJK, emoji) comes back as one token once its bytes are complete.
 */
export const cl100kTokenizer: Tokenizer = {
  name: 'cl100k_base',
  tokenize(text) {
    if (text.length === 0) return [];
    const tokens: string[] = [];
    for (const piece of decodeGenerator(encode(text))) {
      if (piece.length > 0) tokens.push(piece);
    }
    return tokens;
  },
};

export const BUILTIN_TOKENIZERS: readonly Tokenizer[] = [
  standardTokenizer,
  whitespaceTokenizer,
  letterTokenizer,
  keywordTokenizer,
  cl100kTokenizer,
];
