/**
 * Small fixed dictionary and embedding table so expected tokens and
 * vectors do not depend on the shipped word list.
 */

import { InMemoryEmbeddingIndex } from '../src/lib/embeddings';
import { ZipfSegmenter, createWordSplitter } from '../src/lib/word-splitter';
import type { TokenizerContext } from '../src/lib/url-tokenizer';

export const TEST_WORDS = [
  'some', 'word', 'path', 'test', 'page', 'medium', 'length', 'geo', 'cities', 'domain',
  'multi', 'param', 'value', 'members', 'tripod', 'long', 'html', 'with', 'weird', 'http',
  'val', 'arg', 'net', 'ech', 'user', 'host', 'library', 'part', 'site',
  ...'abcdefghijklmnopqrstuvwxyz'.split(''),
  ...'0123456789'.split(''),
];

export const testSegmenter = new ZipfSegmenter(TEST_WORDS);

export const splitWord = createWordSplitter(testSegmenter);

export const context: TokenizerContext = { splitWord };

/** Mean of these rows is exactly (-4.5, 4.5) */
export const SAMPLE_VECTORS: Array<[string, number[]]> = [
  ['the', [-1, 1]],
  ['test', [-2, 2]],
  ['com', [-3, 3]],
  ['arg', [-4, 4]],
  ['val', [-5, 5]],
  ['web', [-6, 6]],
  ['page', [-7, 7]],
  ['home', [-8, 8]],
];

export function sampleIndex(): InMemoryEmbeddingIndex {
  return new InMemoryEmbeddingIndex(SAMPLE_VECTORS);
}
