import { describe, it, expect } from 'vitest';
import { DelimiterChunker } from '../src/chunkers/delimiter.js';
import { ConfigurationError } from '../src/errors.js';

describe('DelimiterChunker.validateParameters', () => {
  it('rejects parameters without a delimiter', () => {
    expect(() => new DelimiterChunker({})).toThrow(
      new ConfigurationError('You must contain field: [delimiter] in your parameter'),
    );
  });

  it('rejects a non-string delimiter', () => {
    expect(() => new DelimiterChunker({ delimiter: [''] })).toThrow(
      'delimiter parameter [delimiter] must be a string',
    );
  });

  it('rejects an empty delimiter', () => {
    expect(() => new DelimiterChunker({ delimiter: '' })).toThrow(
      'delimiter parameter [delimiter] should not be empty',
    );
  });

  it('ignores unrelated parameters', () => {
    expect(DelimiterChunker.validateParameters({ delimiter: '.', extra: 1 })).toEqual({ delimiter: '.' });
  });
});

describe('DelimiterChunker.chunk', () => {
  const lines = new DelimiterChunker({ delimiter: '\n' });

  it('keeps the delimiter on every chunk but the last', () => {
    expect(lines.chunk('a\nb\nc\nd')).toEqual(['a\n', 'b\n', 'c\n', 'd']);
  });

  it('ends on a delimiter without an empty trailing chunk', () => {
    expect(lines.chunk('a\nb\nc\nd\n')).toEqual(['a\n', 'b\n', 'c\n', 'd\n']);
  });

  it('returns a lone delimiter as one chunk', () => {
    expect(lines.chunk('\n')).toEqual(['\n']);
  });

  it('emits consecutive delimiters as delimiter-only chunks', () => {
    expect(lines.chunk('\n\n\n')).toEqual(['\n', '\n', '\n']);
  });

  it('returns no chunks for empty text', () => {
    expect(lines.chunk('')).toEqual([]);
  });

  it('returns the whole text when the delimiter never occurs', () => {
    expect(lines.chunk('no breaks here')).toEqual(['no breaks here']);
  });

  it('splits on other single-character delimiters', () => {
    const dots = new DelimiterChunker({ delimiter: '.' });
    expect(dots.chunk('a.b.cc.d.')).toEqual(['a.', 'b.', 'cc.', 'd.']);
  });

  it('matches a multi-character delimiter as a literal string', () => {
    const paragraphs = new DelimiterChunker({ delimiter: '\n\n' });
    expect(paragraphs.chunk('\n\na\n\n\n')).toEqual(['\n\n', 'a\n\n', '\n']);
  });

  it('does not treat the delimiter as a regular expression', () => {
    const chunker = new DelimiterChunker({ delimiter: '.*' });
    expect(chunker.chunk('ab.*cd.*')).toEqual(['ab.*', 'cd.*']);
  });

  it('chunks concatenate back to the input', () => {
    const text = 'first line\nsecond line\n\nfourth';
    expect(lines.chunk(text).join('')).toBe(text);
  });
});
