/**
 * URL Tokenizer
 *
 * Turns a raw URL into its tokenized form: protocol, domain tokens
 * (sub-domains, main domain, ending), path tokens and the ordered list of
 * (parameter, value) token pairs. Every stage is a pure function; the word
 * splitter and acronym table are passed in by the caller.
 */

import he from 'he';
import { MalformedUrlError } from './errors';
import { expandUrlTokens, type AcronymTable } from './acronyms';
import { flatten, flattenTwice } from './util';
import type { WordSplitter } from './word-splitter';
import type {
  ArgPair,
  DomainData,
  ParsedUrl,
  Protocol,
  RawUrlParts,
  TokenizerOptions,
  UrlData,
} from '../types';

/** Trailing path token recording an `@` anywhere in the path */
export const AT_MARKER = '@';

// ============================================================================
// DECODING
// ============================================================================

const PERCENT_RUN = /(?:%[0-9a-fA-F]{2})+/g;
const utf8 = new TextDecoder('utf-8');

function percentDecode(text: string): string {
  return text.replace(PERCENT_RUN, run => {
    const bytes = new Uint8Array(run.length / 3);
    for (let i = 0; i < bytes.length; i++) {
      bytes[i] = parseInt(run.slice(i * 3 + 1, i * 3 + 3), 16);
    }
    return utf8.decode(bytes);
  });
}

/**
 * Percent-decodes, then resolves HTML character references.
 * Malformed escapes pass through unchanged.
 *
 * @example
 * decodeUrl('http://www.asstr.org/janice%20and%20kirk%27s')
 * // "http://www.asstr.org/janice and kirk's"
 */
export function decodeUrl(rawUrl: string): string {
  return he.decode(percentDecode(rawUrl));
}

// ============================================================================
// STRUCTURAL SPLIT
// ============================================================================

// Letters and digits of any script count as word characters
const WORD_CHAR = '[\\p{L}\\p{N}_]';
const WORD_BOUNDARY = `(?:(?<=${WORD_CHAR})(?!${WORD_CHAR})|(?<!${WORD_CHAR})(?=${WORD_CHAR}))`;

const URL_PATTERN = new RegExp(
  '^(https?):\\/\\/' +                              // protocol
  '([-a-zA-Z0-9@:%._+~#=]+\\.[a-zA-Z0-9()]{1,12})' + // domains, ending in a plausible TLD
  WORD_BOUNDARY +
  '([-a-zA-Z0-9()@:%_+;.~#&/=]*)' +                  // path
  '\\??' +
  '([-a-zA-Z0-9()@:%_+;.~#&/=?\\\\]*)',              // args
  'u'
);

function isProtocol(value: string): value is Protocol {
  return value === 'http' || value === 'https';
}

/**
 * Cuts a decoded URL into protocol, domain, path and argument strings.
 * Matching runs on the lowercased URL, so all four parts are lowercase.
 *
 * @throws MalformedUrlError when the URL does not start with a protocol
 * and a domain
 */
export function splitUrl(url: string): RawUrlParts {
  const match = URL_PATTERN.exec(url.toLowerCase());
  const protocol = match?.[1];
  if (!match || protocol === undefined || !isProtocol(protocol)) {
    throw new MalformedUrlError(url);
  }

  return {
    protocol,
    domain: match[2] ?? '',
    path: match[3] ?? '',
    args: match[4] ?? '',
  };
}

// ============================================================================
// ZONE TOKENIZERS
// ============================================================================

/**
 * @example
 * tokenizeDomains('www.members.tripod.net', split)
 * // { subDomains: ['www', 'members'], mainDomain: ['tripod'], domainEnding: 'net' }
 */
export function tokenizeDomains(domain: string, splitWord: WordSplitter): DomainData {
  const labels = domain.split('.');
  if (labels.length < 2) {
    throw new MalformedUrlError(domain);
  }

  return {
    subDomains: flatten(labels.slice(0, -2).map(label => splitWord(label))),
    mainDomain: splitWord(labels[labels.length - 2]),
    domainEnding: labels[labels.length - 1],
  };
}

export function tokenizePath(
  path: string,
  splitWord: WordSplitter,
  reversePath = false
): string[] {
  const tokens = flatten(
    path
      .split('/')
      .filter(segment => segment.length > 0)
      .map(segment => splitWord(segment))
  );

  if (reversePath) {
    tokens.reverse();
  }
  if (path.includes('@')) {
    tokens.push(AT_MARKER);
  }
  return tokens;
}

const ARG_SEPARATOR = /&amp;|;|&|\\/;

/**
 * Tokenizes `param=value` chunks. Only the first two `=`-separated fields
 * of a chunk are kept, so `a=b=c` loses `c`; downstream token counts are
 * calibrated on that.
 *
 * @example
 * tokenizeArgs('sid=4&amp;list', split)
 * // [[['sid'], ['4']], [['list'], []]]
 */
export function tokenizeArgs(args: string, splitWord: WordSplitter): ArgPair[] {
  if (args.length === 0) return [];

  return args.split(ARG_SEPARATOR).map((chunk): ArgPair => {
    const [param, value = ''] = chunk.split('=');
    return [splitWord(param), splitWord(value)];
  });
}

// ============================================================================
// FULL PIPELINE
// ============================================================================

export interface TokenizerContext {
  splitWord: WordSplitter;
  acronyms?: AcronymTable;
}

/**
 * Decodes, splits and tokenizes a URL, keeping the decoded string and the
 * raw parts for features computed on characters rather than tokens.
 */
export function parseUrl(
  url: string,
  context: TokenizerContext,
  options: TokenizerOptions = {}
): ParsedUrl {
  const decoded = decodeUrl(url);
  const raw = splitUrl(decoded);

  let data: UrlData = {
    protocol: raw.protocol,
    domains: tokenizeDomains(raw.domain, context.splitWord),
    path: tokenizePath(raw.path, context.splitWord, options.reversePath),
    args: tokenizeArgs(raw.args, context.splitWord),
  };

  if (options.expandTokens && context.acronyms) {
    data = expandUrlTokens(data, context.acronyms);
  }

  return { decoded, raw, data };
}

export function tokenizeUrl(
  url: string,
  context: TokenizerContext,
  options: TokenizerOptions = {}
): UrlData {
  return parseUrl(url, context, options).data;
}

/**
 * All tokens of a URL in reading order, for uses where position is
 * irrelevant.
 *
 * @example
 * flattenUrlData(tokenizeUrl('http://some.test.com/path.html?arg1=val1', ctx))
 * // ['http', 'some', 'test', 'com', 'path', 'html', 'arg1', 'val1']
 */
export function flattenUrlData(urlData: UrlData): string[] {
  const { subDomains, mainDomain, domainEnding } = urlData.domains;
  return [
    urlData.protocol,
    ...subDomains,
    ...mainDomain,
    domainEnding,
    ...urlData.path,
    ...flattenTwice(urlData.args),
  ];
}
