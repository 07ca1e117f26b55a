export type { Tokenizer } from './types.js';
export { TokenizerRegistry, createDefaultTokenizerRegistry } from './registry.js';
export {
  standardTokenizer,
  whitespaceTokenizer,
  letterTokenizer,
  keywordTokenizer,
  cl100kTokenizer,
  BUILTIN_TOKENIZERS,
} from './builtin.js';
