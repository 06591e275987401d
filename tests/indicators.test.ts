import { describe, it, expect } from 'vitest';
import {
  DEFAULT_TLD_REPUTATION,
  countDigits,
  countUppercase,
  createTldReputation,
  hasSuspiciousArgSymbol,
  isIPv4Literal,
  tldVerdict,
} from '../src/lib/indicators';

// =============================================================================
// TLD REPUTATION TESTS
// =============================================================================

describe('tldVerdict', () => {
  describe('untrusted-flag scoring', () => {
    it('should flag untrustworthy endings', () => {
      expect(tldVerdict('xyz', 'untrusted-flag')).toBe(1);
      expect(tldVerdict('tk', 'untrusted-flag')).toBe(1);
    });

    it('should not flag trustworthy or unknown endings', () => {
      expect(tldVerdict('com', 'untrusted-flag')).toBe(0);
      expect(tldVerdict('de', 'untrusted-flag')).toBe(0);
      expect(tldVerdict('66', 'untrusted-flag')).toBe(0);
    });
  });

  describe('signed scoring', () => {
    it('should score untrustworthy, unknown and trustworthy endings', () => {
      expect(tldVerdict('xyz', 'signed')).toBe(-1);
      expect(tldVerdict('de', 'signed')).toBe(0);
      expect(tldVerdict('edu', 'signed')).toBe(1);
    });
  });

  it('should use a custom reputation', () => {
    const reputation = createTldReputation({ untrustworthy: ['COM'], trustworthy: ['xyz'] });
    expect(tldVerdict('com', 'signed', reputation)).toBe(-1);
    expect(tldVerdict('xyz', 'signed', reputation)).toBe(1);
  });

  it('should keep default lists for omitted overrides', () => {
    const reputation = createTldReputation({ untrustworthy: ['de'] });
    expect(reputation.trustworthy).toBe(DEFAULT_TLD_REPUTATION.trustworthy);
    expect(tldVerdict('xyz', 'untrusted-flag', reputation)).toBe(0);
  });
});

// =============================================================================
// RAW STRING SIGNAL TESTS
// =============================================================================

describe('isIPv4Literal', () => {
  it('should accept dotted quads', () => {
    expect(isIPv4Literal('12.34.23.66')).toBe(true);
    expect(isIPv4Literal('0.0.0.0')).toBe(true);
    expect(isIPv4Literal('255.255.255.255')).toBe(true);
  });

  it('should reject out-of-range octets and other shapes', () => {
    expect(isIPv4Literal('256.1.1.1')).toBe(false);
    expect(isIPv4Literal('1.2.3')).toBe(false);
    expect(isIPv4Literal('1.2.3.4.5')).toBe(false);
    expect(isIPv4Literal('1.2.3.a')).toBe(false);
    expect(isIPv4Literal('www.test.com')).toBe(false);
  });
});

describe('hasSuspiciousArgSymbol', () => {
  it('should detect backslashes and colons', () => {
    expect(hasSuspiciousArgSymbol('bet\\page.html')).toBe(true);
    expect(hasSuspiciousArgSymbol('http://domain')).toBe(true);
  });

  it('should ignore ordinary query strings', () => {
    expect(hasSuspiciousArgSymbol('a=1&b=2')).toBe(false);
    expect(hasSuspiciousArgSymbol('')).toBe(false);
  });
});

describe('character counts', () => {
  it('should count ASCII digits', () => {
    expect(countDigits('arg1val11')).toBe(3);
    expect(countDigits('none')).toBe(0);
  });

  it('should count ASCII capitals', () => {
    expect(countUppercase('https://Test.com/LONG')).toBe(5);
    expect(countUppercase('Éa')).toBe(0);
  });
});
