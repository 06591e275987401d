import { describe, it, expect, vi } from 'vitest';
import { buildSentences } from '../src/lib/corpus';
import type { Logger } from '../src/lib/logger';
import { context } from './helpers';

describe('buildSentences', () => {
  it('should turn each URL into one sentence of tokens', () => {
    expect(buildSentences(['http://test.com/page', 'https://some.test.com?arg=val'], context)).toEqual([
      ['http', 'test', 'com', 'page'],
      ['https', 'some', 'test', 'com', 'arg', 'val'],
    ]);
  });

  it('should skip malformed URLs with a warning', () => {
    const logger: Logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const sentences = buildSentences(['ftp://test.com', 'http://test.com'], context, {}, logger);

    expect(sentences).toEqual([['http', 'test', 'com']]);
    expect(logger.warn).toHaveBeenCalledWith('Error matching url: ftp://test.com - Skipped');
  });

  it('should propagate other failures', () => {
    const failing = {
      splitWord: () => {
        throw new Error('segmenter unavailable');
      },
    };
    expect(() => buildSentences(['http://test.com'], failing)).toThrow('segmenter unavailable');
  });

  it('should accept any iterable', () => {
    function* urls() {
      yield 'http://test.com';
    }
    expect(buildSentences(urls(), context)).toHaveLength(1);
  });
});
