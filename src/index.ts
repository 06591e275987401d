/**
 * URL Featurizer
 *
 * Public surface: the featurizer, its configuration, and the individual
 * pipeline stages for callers that need tokens rather than matrices.
 */

export { UrlFeaturizer, type FeaturizerResources } from './featurizer';
export {
  FeaturizerConfigSchema,
  loadConfig,
  parseConfig,
  resolveConfig,
  type FeaturizerConfig,
  type FeaturizerConfigInput,
} from './config';

export {
  AT_MARKER,
  decodeUrl,
  flattenUrlData,
  parseUrl,
  splitUrl,
  tokenizeArgs,
  tokenizeDomains,
  tokenizePath,
  tokenizeUrl,
  type TokenizerContext,
} from './lib/url-tokenizer';
export {
  MIN_SPLIT_LEN,
  ZipfSegmenter,
  createWordSplitter,
  loadSegmenter,
  loadWordList,
  type Segmenter,
  type WordSplitter,
} from './lib/word-splitter';
export {
  EMPTY_ACRONYMS,
  MapAcronymTable,
  expandToken,
  expandTokens,
  expandUrlTokens,
  loadAcronymTable,
  parseAcronymTable,
  type AcronymTable,
} from './lib/acronyms';
export {
  BASIC_FEATURE_NAMES,
  EXTENDED_FEATURE_NAMES,
  createHandPickedFeatures,
  featureNames,
  type FeatureName,
  type FeatureOptions,
} from './lib/features';
export {
  DEFAULT_TLD_REPUTATION,
  createTldReputation,
  isIPv4Literal,
  tldVerdict,
  type TldReputation,
} from './lib/indicators';
export {
  EMBEDDING_SOURCES,
  InMemoryEmbeddingIndex,
  PackedEmbeddingStore,
  embeddingSource,
  isEmbeddingChoice,
  loadEmbedding,
  loadInMemoryIndex,
  loadPackedStore,
  readVectorFile,
  type EmbeddingIndex,
  type EmbeddingSource,
  type FallbackMode,
} from './lib/embeddings';
export { createWordMatrix, embedToken, embedTokens, totalLength, zeroMatrix } from './lib/word-matrix';
export { buildSentences } from './lib/corpus';
export { ConfigError, InvalidEmbeddingChoiceError, MalformedUrlError } from './lib/errors';
export { consoleLogger, silentLogger, type Logger } from './lib/logger';
export { flatten, flattenTwice } from './lib/util';

export type * from './types';
