import { describe, it, expect, vi, afterEach } from 'vitest';
import type { DocumentMap } from '@docchunk/shared-types';
import { ChunkingProcessor, parseMaxChunkLimit } from '../src/processor.js';
import { ConfigurationError, QuotaExceededError, TokenizationError } from '../src/errors.js';
import { StaticIndexSettings } from '../src/index-settings.js';
import { createDefaultTokenizerRegistry } from '../src/tokenizers/registry.js';

const deps = {
  tokenizers: createDefaultTokenizerRegistry(),
  indexSettings: new StaticIndexSettings(10_000, { 'tight-index': 3 }),
  mappingDepthLimit: 20,
};

afterEach(() => {
  vi.restoreAllMocks();
});

describe('ChunkingProcessor.create', () => {
  it('parses a delimiter definition', () => {
    const processor = ChunkingProcessor.create(
      {
        tag: 'split-body',
        description: 'split on new lines',
        field_map: { body: 'body_chunks' },
        algorithm: { delimiter: { delimiter: '\n' } },
        max_chunk_limit: 5,
      },
      deps,
    );
    expect(processor.type).toBe('chunking');
    expect(processor.tag).toBe('split-body');
    expect(processor.description).toBe('split on new lines');
    expect(processor.maxChunkLimit).toBe(5);
    expect(processor.chunker.algorithm).toBe('delimiter');
    expect(processor.fieldMap).toEqual({ body: 'body_chunks' });
  });

  it('disables the chunk limit by default', () => {
    const processor = ChunkingProcessor.create(
      { field_map: { body: 'out' }, algorithm: { delimiter: { delimiter: '\n' } } },
      deps,
    );
    expect(processor.maxChunkLimit).toBe(-1);
  });

  it('freezes the field map it keeps', () => {
    const fieldMap = { page: { body: 'out' } };
    const processor = ChunkingProcessor.create({ field_map: fieldMap, algorithm: { delimiter: { delimiter: '\n' } } }, deps);
    fieldMap.page.body = 'changed';
    expect(processor.fieldMap).toEqual({ page: { body: 'out' } });
    expect(Object.isFrozen(processor.fieldMap)).toBe(true);
  });

  it('keeps a __proto__ source field from a JSON definition', () => {
    const processor = ChunkingProcessor.create(
      JSON.parse('{"field_map":{"__proto__":"out","body":"b"},"algorithm":{"delimiter":{"delimiter":"."}}}'),
      deps,
    );
    expect(Object.keys(processor.fieldMap)).toEqual(['__proto__', 'body']);
    expect(Object.getOwnPropertyDescriptor(processor.fieldMap, '__proto__')?.value).toBe('out');
    expect(Object.getPrototypeOf(processor.fieldMap)).toBe(Object.prototype);
  });

  it('rejects a definition that is not an object', () => {
    expect(() => ChunkingProcessor.create('chunking', deps)).toThrow(ConfigurationError);
  });

  it.each<[unknown, string]>([
    [undefined, '[field_map] must be an object'],
    [{}, '[field_map] must not be empty'],
    [{ body: '' }, '[field_map.body] output field name must not be empty'],
    [{ body: 3 }, '[field_map.body] must be an output field name or a nested field map'],
    [{ page: {} }, '[field_map.page] must not be empty'],
  ])('rejects field_map %j', (fieldMap, message) => {
    expect(() =>
      ChunkingProcessor.create({ field_map: fieldMap, algorithm: { delimiter: { delimiter: '\n' } } }, deps),
    ).toThrow(message);
  });

  it('rejects two algorithms', () => {
    expect(() =>
      ChunkingProcessor.create(
        { field_map: { body: 'out' }, algorithm: { delimiter: { delimiter: '\n' }, fixed_token_length: {} } },
        deps,
      ),
    ).toThrow('Unable to create the processor as [algorithm] must contain and only contain 1 algorithm');
  });

  it.each<[unknown, string]>([
    [0, 'Parameter [max_chunk_limit] must be a positive integer'],
    [-2, 'Parameter [max_chunk_limit] must be a positive integer'],
    ['10', 'Parameter [max_chunk_limit] must be an integer'],
    [1.5, 'Parameter [max_chunk_limit] must be an integer'],
  ])('rejects max_chunk_limit %j', (limit, message) => {
    expect(() => parseMaxChunkLimit(limit)).toThrow(message);
  });

  it('accepts the disabled sentinel', () => {
    expect(parseMaxChunkLimit(-1)).toBe(-1);
  });

  it('rejects a non-positive mapping depth limit', () => {
    expect(() =>
      ChunkingProcessor.create(
        { field_map: { body: 'out' }, algorithm: { delimiter: { delimiter: '\n' } } },
        { ...deps, mappingDepthLimit: 0 },
      ),
    ).toThrow('mapping depth limit must be a positive integer');
  });
});

describe('ChunkingProcessor.execute', () => {
  it('chunks nested fields with the fixed token length algorithm', () => {
    const processor = ChunkingProcessor.create(
      {
        field_map: { title: 'title_chunks', body: { text: 'text_chunks' } },
        algorithm: { fixed_token_length: { token_limit: 2, tokenizer: 'whitespace' } },
      },
      deps,
    );
    const doc: DocumentMap = { _index: 'articles', title: 'one two three', body: [{ text: 'four five' }] };

    expect(processor.execute(doc)).toBe(doc);
    expect(doc).toEqual({
      _index: 'articles',
      title: 'one two three',
      title_chunks: ['one two', 'three'],
      body: [{ text: 'four five', text_chunks: ['four five'] }],
    });
  });

  it('applies the max token count of the document index', () => {
    const processor = ChunkingProcessor.create(
      { field_map: { body: 'out' }, algorithm: { fixed_token_length: { tokenizer: 'whitespace' } } },
      deps,
    );
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

    expect(() => processor.execute({ _index: 'tight-index', body: 'a b c d' })).toThrow(TokenizationError);
    expect(processor.execute({ _index: 'other-index', body: 'a b c d' }).out).toEqual(['a b c d']);
  });

  it('looks up index settings only for tokenizer-based chunkers', () => {
    const maxTokenCountFor = vi.fn((_index: string | undefined) => 100);
    const delimiter = ChunkingProcessor.create(
      { field_map: { body: 'out' }, algorithm: { delimiter: { delimiter: ' ' } } },
      { ...deps, indexSettings: { maxTokenCountFor } },
    );
    delimiter.execute({ _index: 'articles', body: 'a b' });
    expect(maxTokenCountFor).not.toHaveBeenCalled();

    const fixed = ChunkingProcessor.create(
      { field_map: { body: 'out' }, algorithm: { fixed_token_length: {} } },
      { ...deps, indexSettings: { maxTokenCountFor } },
    );
    fixed.execute({ _index: 'articles', body: 'a b' });
    fixed.execute({ body: 'a b' });
    expect(maxTokenCountFor).toHaveBeenNthCalledWith(1, 'articles');
    expect(maxTokenCountFor).toHaveBeenNthCalledWith(2, undefined);
  });

  it('gives every document its own chunk budget', () => {
    const processor = ChunkingProcessor.create(
      { field_map: { body: 'out' }, algorithm: { delimiter: { delimiter: '\n' } }, max_chunk_limit: 2 },
      deps,
    );
    expect(processor.execute({ body: 'a\nb' }).out).toEqual(['a\n', 'b']);
    expect(processor.execute({ body: 'c\nd' }).out).toEqual(['c\n', 'd']);
  });

  it('reports an aborted document on stderr and rethrows', () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const processor = ChunkingProcessor.create(
      { field_map: { body: 'out' }, algorithm: { delimiter: { delimiter: '\n' } }, max_chunk_limit: 1 },
      deps,
    );
    const doc: DocumentMap = { _index: 'articles', body: 'a\nb' };

    expect(() => processor.execute(doc)).toThrow(QuotaExceededError);
    expect(doc).toEqual({ _index: 'articles', body: 'a\nb' });
    expect(write).toHaveBeenCalledWith(
      'WARN: chunking aborted for document in index [articles]: ' +
        'Unable to chunk the document as the number of chunks [2] exceeds the maximum chunk limit [1]\n',
    );
  });

  it('reads defaults from the environment when nothing is injected', () => {
    vi.stubEnv('CHUNKING_MAPPING_DEPTH_LIMIT', '1');
    try {
      const processor = ChunkingProcessor.create({
        field_map: { page: { body: 'out' } },
        algorithm: { delimiter: { delimiter: '\n' } },
      });
      vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
      expect(() => processor.execute({ page: { body: 'x' } })).toThrow(
        'map type field [page] reached max depth limit, cannot process it',
      );
    } finally {
      vi.unstubAllEnvs();
    }
  });
});
