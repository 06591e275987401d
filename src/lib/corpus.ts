/**
 * Turns URL lists into token sentences for training word embeddings on
 * URL vocabulary. Training itself happens outside this package.
 */

import { MalformedUrlError } from './errors';
import { silentLogger, type Logger } from './logger';
import { flattenUrlData, tokenizeUrl, type TokenizerContext } from './url-tokenizer';
import type { TokenizerOptions } from '../types';

/**
 * One sentence per URL that tokenizes; malformed URLs are logged and
 * skipped.
 */
export function buildSentences(
  urls: Iterable<string>,
  context: TokenizerContext,
  options: TokenizerOptions = {},
  logger: Logger = silentLogger
): string[][] {
  const sentences: string[][] = [];

  for (const url of urls) {
    try {
      sentences.push(flattenUrlData(tokenizeUrl(url, context, options)));
    } catch (error) {
      if (!(error instanceof MalformedUrlError)) throw error;
      logger.warn(`${error.message} - Skipped`);
    }
  }

  return sentences;
}
