/**
 * Hand-picked Features
 *
 * Fixed-order numeric signals computed from a tokenized URL and, for the
 * extended set, from its raw substrings. Consumers index the vector by
 * position, so the name lists are the contract: new fields go at the end.
 */

import { AT_MARKER, flattenUrlData } from './url-tokenizer';
import {
  DEFAULT_TLD_REPUTATION,
  countDigits,
  countUppercase,
  hasSuspiciousArgSymbol,
  isIPv4Literal,
  tldVerdict,
  type TldReputation,
} from './indicators';
import { countMatches, flattenTwice } from './util';
import type { FeatureSet, FeatureVector, ParsedUrl, TldScoring } from '../types';

export const BASIC_FEATURE_NAMES = [
  'isHttps',
  'mainDomainWordCount',
  'subDomainCount',
  'isWww',
  'isWwwLike',
  'pathTokenCount',
  'tldVerdict',
  'subDomainDigitCount',
  'pathDigitCount',
  'argDigitCount',
  'totalDigitCount',
  'hasAtMarker',
  'tokenCount',
] as const;

export const EXTENDED_FEATURE_NAMES = [
  ...BASIC_FEATURE_NAMES,
  'domainLength',
  'pathLength',
  'argLength',
  'dotCountInPathAndArgs',
  'capitalCount',
  'domainIsIpv4',
  'hasSuspiciousArgSymbol',
] as const;

export type FeatureName = (typeof EXTENDED_FEATURE_NAMES)[number];

export function featureNames(featureSet: FeatureSet): readonly FeatureName[] {
  return featureSet === 'extended' ? EXTENDED_FEATURE_NAMES : BASIC_FEATURE_NAMES;
}

export interface FeatureOptions {
  featureSet: FeatureSet;
  tldScoring: TldScoring;
  tldReputation?: TldReputation;
}

const WWW_LIKE = /^www./;

const flag = (value: boolean): number => (value ? 1 : 0);

export function createHandPickedFeatures(parsed: ParsedUrl, options: FeatureOptions): FeatureVector {
  const { protocol, domains, path, args } = parsed.data;
  const { subDomains, mainDomain, domainEnding } = domains;

  const hasAtMarker = path.length > 0 && path[path.length - 1] === AT_MARKER;
  const atMarkerCount = flag(hasAtMarker);
  const firstSubDomain = subDomains.length > 0 ? subDomains[0] : undefined;

  const subDomainDigitCount = countDigits(subDomains.join(''));
  const pathDigitCount = countDigits(path.join(''));
  const argDigitCount = countDigits(flattenTwice(args).join(''));

  const basic: FeatureVector = [
    flag(protocol === 'https'),
    mainDomain.length,
    subDomains.length,
    flag(firstSubDomain === 'www'),
    flag(firstSubDomain !== undefined && WWW_LIKE.test(firstSubDomain)),
    path.length - atMarkerCount,
    tldVerdict(domainEnding, options.tldScoring, options.tldReputation ?? DEFAULT_TLD_REPUTATION),
    subDomainDigitCount,
    pathDigitCount,
    argDigitCount,
    subDomainDigitCount + pathDigitCount + argDigitCount,
    atMarkerCount,
    flattenUrlData(parsed.data).length - atMarkerCount,
  ];

  if (options.featureSet === 'basic') {
    return basic;
  }

  const { raw } = parsed;
  return [
    ...basic,
    raw.domain.length,
    raw.path.length,
    raw.args.length,
    countMatches(raw.path + raw.args, /\./g),
    countUppercase(parsed.decoded),
    flag(isIPv4Literal(raw.domain)),
    flag(hasSuspiciousArgSymbol(raw.args)),
  ];
}
