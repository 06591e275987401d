/**
 * URL Indicators
 *
 * Character-level and reputation signals that phishing URLs tend to carry:
 * the trust category of the TLD, raw IPv4 hosts, and credential or
 * obfuscation symbols in the query string.
 */

import type { TldScoring } from '../types';

// ============================================================================
// TLD REPUTATION
// ============================================================================

// Commonly abused endings
const UNTRUSTWORTHY_TLDS: ReadonlySet<string> = new Set([
  'xyz', 'biz', 'info',
  'tk', 'ml', 'ga', 'cf', 'gq',  // Free TLDs
  'top', 'club', 'online', 'site', 'website',  // Cheap TLDs
  'buzz', 'surf', 'cam', 'icu',  // Known spam TLDs
  'zip', 'mov',  // Confusing TLDs
]);

const TRUSTWORTHY_TLDS: ReadonlySet<string> = new Set([
  'com', 'net', 'org',
  'edu', 'gov', 'mil',
]);

export interface TldReputation {
  untrustworthy: ReadonlySet<string>;
  trustworthy: ReadonlySet<string>;
}

export const DEFAULT_TLD_REPUTATION: TldReputation = {
  untrustworthy: UNTRUSTWORTHY_TLDS,
  trustworthy: TRUSTWORTHY_TLDS,
};

export function createTldReputation(overrides: {
  untrustworthy?: readonly string[];
  trustworthy?: readonly string[];
} = {}): TldReputation {
  return {
    untrustworthy: overrides.untrustworthy
      ? new Set(overrides.untrustworthy.map(tld => tld.toLowerCase()))
      : UNTRUSTWORTHY_TLDS,
    trustworthy: overrides.trustworthy
      ? new Set(overrides.trustworthy.map(tld => tld.toLowerCase()))
      : TRUSTWORTHY_TLDS,
  };
}

/**
 * `untrusted-flag`: 1 for an untrustworthy ending, otherwise 0.
 * `signed`: -1 untrustworthy, +1 trustworthy, 0 for anything else.
 */
export function tldVerdict(
  tld: string,
  scoring: TldScoring,
  reputation: TldReputation = DEFAULT_TLD_REPUTATION
): number {
  const untrustworthy = reputation.untrustworthy.has(tld);
  if (scoring === 'untrusted-flag') {
    return untrustworthy ? 1 : 0;
  }
  return (untrustworthy ? -1 : 0) + (reputation.trustworthy.has(tld) ? 1 : 0);
}

// ============================================================================
// RAW STRING SIGNALS
// ============================================================================

/**
 * Dotted-quad host such as `12.34.23.66`; every octet must be 0-255.
 */
export function isIPv4Literal(host: string): boolean {
  const parts = host.split('.');
  if (parts.length !== 4) return false;

  return parts.every(part => {
    if (!/^\d{1,3}$/.test(part)) return false;
    const octet = parseInt(part, 10);
    return octet >= 0 && octet <= 255;
  });
}

/** A backslash or colon in the query string hides credentials or a second URL */
export function hasSuspiciousArgSymbol(args: string): boolean {
  return args.includes('\\') || args.includes(':');
}

export function countDigits(text: string): number {
  let count = 0;
  for (const ch of text) {
    if (ch >= '0' && ch <= '9') count++;
  }
  return count;
}

export function countUppercase(text: string): number {
  let count = 0;
  for (const ch of text) {
    if (ch >= 'A' && ch <= 'Z') count++;
  }
  return count;
}
