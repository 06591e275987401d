/**
 * URL Featurizer Type Definitions
 *
 * Central type definitions shared by the tokenizer, the feature extractor
 * and the embedding-matrix builder.
 */

// =============================================================================
// TOKENIZED URL
// =============================================================================

export type Protocol = 'http' | 'https';

export interface DomainData {
  readonly subDomains: readonly string[];
  readonly mainDomain: readonly string[];
  /** The TLD label, kept whole */
  readonly domainEnding: string;
}

/** Parameter tokens and value tokens of one `param=value` chunk */
export type ArgPair = readonly [param: readonly string[], value: readonly string[]];

export interface UrlData {
  readonly protocol: Protocol;
  readonly domains: DomainData;
  readonly path: readonly string[];
  readonly args: readonly ArgPair[];
}

/** The four substrings the structural splitter cuts a decoded URL into */
export interface RawUrlParts {
  protocol: Protocol;
  domain: string;
  path: string;
  args: string;
}

export interface ParsedUrl {
  /** Percent- and HTML-decoded URL, original case */
  decoded: string;
  raw: RawUrlParts;
  data: UrlData;
}

// =============================================================================
// NUMERIC OUTPUT
// =============================================================================

export type Vector = ArrayLike<number>;

export type FeatureVector = number[];

/** Row-major matrix of shape (N, D) */
export type Matrix = number[][];

export type VectorMatrix = readonly [features: FeatureVector, wordMatrix: Matrix];

// =============================================================================
// CONFIGURATION TYPES
// =============================================================================

export type EmbeddingChoice = 'GloVe' | 'Conceptnet' | 'Word2Vec' | 'FastText' | 'sample';

export type MatrixLayout = 'positional' | 'sequential';

export type FeatureSet = 'basic' | 'extended';

export type TldScoring = 'untrusted-flag' | 'signed';

export interface ZoneCapacities {
  subDomainMaxLen: number;
  mainDomainMaxLen: number;
  pathMaxLen: number;
  argMaxLen: number;
}

export interface TokenizerOptions {
  expandTokens?: boolean;
  reversePath?: boolean;
}
