/**
 * FILE PURPOSE: Delimiter chunker — split text after every literal delimiter
 * WHY: Paragraph- or line-oriented content already carries its own boundaries.
 *      Each chunk keeps its trailing delimiter so chunks concatenate back to the input.
 */

import type { ChunkerParameters } from '@docchunk/shared-types';
import { ConfigurationError } from '../errors.js';
import type { Chunker } from './types.js';

export const DELIMITER_FIELD = 'delimiter';

export interface DelimiterParams {
  delimiter: string;
}

export class DelimiterChunker implements Chunker {
  readonly algorithm = 'delimiter';
  readonly usesTokenizer = false;
  private readonly params: DelimiterParams;

  constructor(parameters: ChunkerParameters) {
    this.params = DelimiterChunker.validateParameters(parameters);
  }

  static validateParameters(parameters: ChunkerParameters): DelimiterParams {
    if (!(DELIMITER_FIELD in parameters)) {
      throw new ConfigurationError(`You must contain field: [${DELIMITER_FIELD}] in your parameter`);
    }
    const delimiter = parameters[DELIMITER_FIELD];
    if (typeof delimiter !== 'string') {
      throw new ConfigurationError(`delimiter parameter [${DELIMITER_FIELD}] must be a string`);
    }
    if (delimiter.length === 0) {
      throw new ConfigurationError(`delimiter parameter [${DELIMITER_FIELD}] should not be empty`);
    }
    return { delimiter };
  }

  chunk(content: string): string[] {
    const { delimiter } = this.params;
    const chunks: string[] = [];
    let position = 0;
    while (position < content.length) {
      const found = content.indexOf(delimiter, position);
      if (found === -1) {
        chunks.push(content.slice(position));
        break;
      }
      const end = found + delimiter.length;
      chunks.push(content.slice(position, end));
      position = end;
    }
    return chunks;
  }
}
