/**
 * Word Embedding Matrix
 *
 * Lays the embedded tokens of a URL out into an (N, D) matrix where
 * N = sub + main + 1 (TLD) + path + args. Positional layout gives every
 * zone a fixed block of rows; sequential layout concatenates all zones and
 * cuts once at N. In both, missing rows are zeros and surplus tokens are
 * dropped.
 */

import { flattenTwice } from './util';
import type { EmbeddingIndex } from './embeddings';
import type { Matrix, MatrixLayout, UrlData, ZoneCapacities } from '../types';

export interface WordMatrixOptions {
  layout: MatrixLayout;
  capacities: ZoneCapacities;
  /** Namespace prepended to each token, e.g. `/c/en/` */
  prefix?: string;
}

export function totalLength(capacities: ZoneCapacities): number {
  return capacities.subDomainMaxLen
    + capacities.mainDomainMaxLen
    + 1
    + capacities.pathMaxLen
    + capacities.argMaxLen;
}

export function zeroMatrix(rows: number, columns: number): Matrix {
  return Array.from({ length: rows }, () => new Array<number>(columns).fill(0));
}

/**
 * Vector for a token, or the index's fallback vector when it is absent
 */
export function embedToken(index: EmbeddingIndex, token: string, prefix = ''): number[] {
  return Array.from(index.lookup(prefix + token) ?? index.fallbackVector());
}

/**
 * Embeds the first `rows` tokens and zero-pads up to `rows`
 */
export function embedTokens(
  index: EmbeddingIndex,
  tokens: readonly string[],
  rows: number,
  prefix = ''
): Matrix {
  const matrix = zeroMatrix(rows, index.dimension());
  tokens.slice(0, rows).forEach((token, i) => {
    matrix[i] = embedToken(index, token, prefix);
  });
  return matrix;
}

export function createWordMatrix(
  urlData: UrlData,
  index: EmbeddingIndex,
  options: WordMatrixOptions
): Matrix {
  const { subDomains, mainDomain, domainEnding } = urlData.domains;
  const argsFlat = flattenTwice(urlData.args);
  const { capacities, prefix = '' } = options;

  if (options.layout === 'sequential') {
    const tokens = [...subDomains, ...mainDomain, domainEnding, ...urlData.path, ...argsFlat];
    return embedTokens(index, tokens, totalLength(capacities), prefix);
  }

  return [
    ...embedTokens(index, subDomains, capacities.subDomainMaxLen, prefix),
    ...embedTokens(index, mainDomain, capacities.mainDomainMaxLen, prefix),
    ...embedTokens(index, [domainEnding], 1, prefix),
    ...embedTokens(index, urlData.path, capacities.pathMaxLen, prefix),
    ...embedTokens(index, argsFlat, capacities.argMaxLen, prefix),
  ];
}
