import { describe, it, expect } from 'vitest';
import { InMemoryEmbeddingIndex } from '../src/lib/embeddings';
import { tokenizeUrl } from '../src/lib/url-tokenizer';
import { createWordMatrix, embedToken, embedTokens, totalLength, zeroMatrix } from '../src/lib/word-matrix';
import type { ZoneCapacities } from '../src/types';
import { context, sampleIndex } from './helpers';

const FALLBACK = [-4.5, 4.5];

describe('totalLength', () => {
  it('should add one row for the domain ending', () => {
    expect(totalLength({ subDomainMaxLen: 5, mainDomainMaxLen: 5, pathMaxLen: 10, argMaxLen: 10 })).toBe(31);
  });
});

describe('zeroMatrix', () => {
  it('should build independent zero rows', () => {
    const matrix = zeroMatrix(2, 3);
    matrix[0][0] = 1;
    expect(matrix).toEqual([[1, 0, 0], [0, 0, 0]]);
  });
});

describe('embedToken', () => {
  it('should return the stored vector or the fallback', () => {
    const index = sampleIndex();
    expect(embedToken(index, 'page')).toEqual([-7, 7]);
    expect(embedToken(index, 'unknown')).toEqual(FALLBACK);
  });

  it('should prepend the lookup prefix', () => {
    const index = new InMemoryEmbeddingIndex([['/c/en/test', [1, 1]], ['test', [9, 9]]]);
    expect(embedToken(index, 'test', '/c/en/')).toEqual([1, 1]);
  });
});

describe('embedTokens', () => {
  it('should pad with zero rows', () => {
    expect(embedTokens(sampleIndex(), ['the'], 3)).toEqual([[-1, 1], [0, 0], [0, 0]]);
  });

  it('should drop tokens beyond the row count', () => {
    expect(embedTokens(sampleIndex(), ['the', 'test', 'com'], 2)).toEqual([[-1, 1], [-2, 2]]);
  });
});

describe('createWordMatrix', () => {
  const capacities: ZoneCapacities = { subDomainMaxLen: 1, mainDomainMaxLen: 2, pathMaxLen: 1, argMaxLen: 2 };

  it('should give each zone its own block of rows', () => {
    const data = tokenizeUrl('http://unk.test.com?arg=val', context);
    expect(createWordMatrix(data, sampleIndex(), { layout: 'positional', capacities })).toEqual([
      FALLBACK,  // unk
      [-2, 2],   // test
      [0, 0],
      [-3, 3],   // com
      [0, 0],    // no path
      [-4, 4],   // arg
      [-5, 5],   // val
    ]);
  });

  it('should concatenate zones in sequential layout', () => {
    const data = tokenizeUrl('http://unk.test.com?arg=val', context);
    expect(createWordMatrix(data, sampleIndex(), { layout: 'sequential', capacities })).toEqual([
      FALLBACK,
      [-2, 2],
      [-3, 3],
      [-4, 4],
      [-5, 5],
      [0, 0],
      [0, 0],
    ]);
  });

  it('should truncate differently per layout', () => {
    const small: ZoneCapacities = { subDomainMaxLen: 1, mainDomainMaxLen: 1, pathMaxLen: 1, argMaxLen: 1 };
    const data = tokenizeUrl('http://a.b.test.com/page/web?arg=val', context);

    expect(createWordMatrix(data, sampleIndex(), { layout: 'positional', capacities: small })).toEqual([
      FALLBACK,  // a
      [-2, 2],   // test
      [-3, 3],   // com
      [-7, 7],   // page
      [-4, 4],   // arg
    ]);
    expect(createWordMatrix(data, sampleIndex(), { layout: 'sequential', capacities: small })).toEqual([
      FALLBACK,  // a
      FALLBACK,  // b
      [-2, 2],   // test
      [-3, 3],   // com
      [-7, 7],   // page
    ]);
  });

  it('should always have N rows of the embedding dimension', () => {
    const urls = ['http://test.com', 'https://a.b.c.d.e.f.test.com/1/2/3/4/5?a=1&b=2&c=3'];
    for (const url of urls) {
      for (const layout of ['positional', 'sequential'] as const) {
        const matrix = createWordMatrix(tokenizeUrl(url, context), sampleIndex(), { layout, capacities });
        expect(matrix).toHaveLength(totalLength(capacities));
        expect(matrix.every(row => row.length === 2)).toBe(true);
      }
    }
  });
});
