import { describe, it, expect } from 'vitest';
import {
  BASIC_FEATURE_NAMES,
  EXTENDED_FEATURE_NAMES,
  createHandPickedFeatures,
  featureNames,
  type FeatureOptions,
} from '../src/lib/features';
import { parseUrl } from '../src/lib/url-tokenizer';
import { context } from './helpers';

const extended: FeatureOptions = { featureSet: 'extended', tldScoring: 'untrusted-flag' };

const features = (url: string, options: FeatureOptions = extended) =>
  createHandPickedFeatures(parseUrl(url, context), options);

describe('featureNames', () => {
  it('should prefix the extended set with the basic set', () => {
    expect(BASIC_FEATURE_NAMES).toHaveLength(13);
    expect(EXTENDED_FEATURE_NAMES).toHaveLength(20);
    expect(EXTENDED_FEATURE_NAMES.slice(0, 13)).toEqual([...BASIC_FEATURE_NAMES]);
    expect(featureNames('basic')).toBe(BASIC_FEATURE_NAMES);
    expect(featureNames('extended')).toBe(EXTENDED_FEATURE_NAMES);
  });
});

describe('createHandPickedFeatures', () => {
  it('should describe a bare domain', () => {
    expect(features('http://test.com'))
      .toEqual([0, 1, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 3, 8, 0, 0, 0, 0, 0, 0]);
  });

  it('should flag an untrustworthy ending and count main-domain words', () => {
    expect(features('https://test-a-domain.xyz'))
      .toEqual([1, 3, 0, 0, 0, 0, 1, 0, 0, 0, 0, 0, 5, 17, 0, 0, 0, 0, 0, 0]);
  });

  it('should detect www-like sub-domains, capitals and a URL in the args', () => {
    expect(features('https://wwws.test.com/some/LONG?http://domain'))
      .toEqual([1, 1, 1, 0, 1, 2, 0, 0, 0, 0, 0, 0, 8, 13, 10, 13, 0, 4, 0, 1]);
  });

  it('should count digits per zone and detect an IPv4 host', () => {
    expect(features('http://12.34.23.66/path?arg1=val11;arg2=val22'))
      .toEqual([0, 1, 2, 0, 0, 1, 0, 4, 0, 6, 10, 0, 12, 11, 5, 21, 0, 0, 1, 0]);
  });

  it('should count the @ marker separately from path tokens', () => {
    expect(features('http://www.geocities.com/@ech.net?BET%5Cpage.html'))
      .toEqual([0, 2, 1, 1, 0, 2, 0, 0, 0, 0, 0, 1, 10, 17, 9, 13, 2, 3, 0, 1]);
  });

  it('should return only the basic fields for the basic set', () => {
    expect(features('http://12.34.23.66/path?arg1=val11;arg2=val22', {
      featureSet: 'basic',
      tldScoring: 'untrusted-flag',
    })).toEqual([0, 1, 2, 0, 0, 1, 0, 4, 0, 6, 10, 0, 12]);
  });

  it('should use signed TLD scores when configured', () => {
    const signed: FeatureOptions = { featureSet: 'basic', tldScoring: 'signed' };
    expect(features('http://test.com', signed)[6]).toBe(1);
    expect(features('https://test-a-domain.xyz', signed)[6]).toBe(-1);
    expect(features('http://test.de', signed)[6]).toBe(0);
  });

  it('should not depend on path order', () => {
    const url = 'http://test.com/some/path/user@host';
    const forward = createHandPickedFeatures(parseUrl(url, context), extended);
    const reversed = createHandPickedFeatures(parseUrl(url, context, { reversePath: true }), extended);
    expect(reversed).toEqual(forward);
  });
});
