/**
 * URL Featurizer
 *
 * Main entry point: turns URLs into (hand-picked feature vector, word
 * embedding matrix) pairs for a downstream classifier. Loading the
 * embedding is slow and happens once; featurizing is synchronous and
 * stateless per URL.
 */

import { resolveConfig, type FeaturizerConfig, type FeaturizerConfigInput } from './config';
import { loadAcronymTable, type AcronymTable } from './lib/acronyms';
import { embeddingSource, loadEmbedding, type EmbeddingIndex } from './lib/embeddings';
import { ConfigError, errorMessage } from './lib/errors';
import { createHandPickedFeatures, featureNames, type FeatureName } from './lib/features';
import { createTldReputation, type TldReputation } from './lib/indicators';
import { consoleLogger, type Logger } from './lib/logger';
import { parseUrl, type TokenizerContext } from './lib/url-tokenizer';
import { createWordMatrix, totalLength, zeroMatrix } from './lib/word-matrix';
import { createWordSplitter, loadSegmenter, type WordSplitter } from './lib/word-splitter';
import type { FeatureVector, TokenizerOptions, UrlData, VectorMatrix, ZoneCapacities } from './types';

const CAPACITY_KEYS = [
  'subDomainMaxLen',
  'mainDomainMaxLen',
  'pathMaxLen',
  'argMaxLen',
] as const satisfies ReadonlyArray<keyof ZoneCapacities>;

// =============================================================================
// TYPES
// =============================================================================

/** Everything the featurizer reads but never changes */
export interface FeaturizerResources {
  embeddings: EmbeddingIndex;
  /** Namespace prepended to tokens before lookup, e.g. `/c/en/` */
  embedPrefix?: string;
  splitWord: WordSplitter;
  acronyms?: AcronymTable;
  logger?: Logger;
}

// =============================================================================
// FEATURIZER
// =============================================================================

export class UrlFeaturizer {
  readonly config: Readonly<FeaturizerConfig>;
  readonly handPickedFeatureLength: number;

  private readonly embeddings: EmbeddingIndex;
  private readonly embedPrefix: string;
  private readonly tokenizer: TokenizerContext;
  private readonly tldReputation: TldReputation;
  private readonly logger: Logger;
  private capacities: ZoneCapacities;
  private n: number;

  /**
   * Builds a featurizer around resources that are already loaded.
   * Use {@link UrlFeaturizer.create} to load them from disk.
   */
  constructor(resources: FeaturizerResources, config: FeaturizerConfigInput = {}) {
    this.config = resolveConfig(config);
    this.embeddings = resources.embeddings;
    this.embedPrefix = resources.embedPrefix ?? '';
    this.tokenizer = { splitWord: resources.splitWord, acronyms: resources.acronyms };
    this.logger = resources.logger ?? consoleLogger;
    this.tldReputation = createTldReputation({
      untrustworthy: this.config.untrustworthyTlds,
      trustworthy: this.config.trustworthyTlds,
    });
    this.capacities = {
      subDomainMaxLen: this.config.subDomainMaxLen,
      mainDomainMaxLen: this.config.mainDomainMaxLen,
      pathMaxLen: this.config.pathMaxLen,
      argMaxLen: this.config.argMaxLen,
    };
    this.n = totalLength(this.capacities);
    this.handPickedFeatureLength = featureNames(this.config.featureSet).length;
  }

  /**
   * Loads the word list, the acronym table and the chosen embedding.
   *
   * @throws InvalidEmbeddingChoiceError before anything is read when the
   * embedding selector is unknown
   */
  static async create(
    config: FeaturizerConfigInput = {},
    logger: Logger = consoleLogger
  ): Promise<UrlFeaturizer> {
    const started = Date.now();
    const resolved = resolveConfig(config);
    embeddingSource(resolved.embedding);
    const log: Logger = resolved.verbose
      ? logger
      : { info: () => {}, warn: message => logger.warn(message), error: message => logger.error(message) };

    const [segmenter, acronyms, embedding] = await Promise.all([
      loadSegmenter(resolved.wordListPath),
      resolved.expandTokens ? loadAcronymTable(resolved.acronymsPath) : Promise.resolve(undefined),
      loadEmbedding(resolved.embedding, { vectorsDir: resolved.vectorsDir, logger: log }),
    ]);

    const featurizer = new UrlFeaturizer(
      {
        embeddings: embedding.index,
        embedPrefix: embedding.prefix,
        splitWord: createWordSplitter(segmenter, resolved.minSplitLength),
        acronyms,
        logger,
      },
      resolved
    );

    const elapsed = (Date.now() - started) / 1000;
    log.info(`Created ${resolved.embedding} UrlFeaturizer in ${elapsed.toFixed(1)} s`);
    return featurizer;
  }

  /** Rows of every word matrix: sub + main + 1 + path + args */
  get N(): number {
    return this.n;
  }

  get embeddingDim(): number {
    return this.embeddings.dimension();
  }

  get zoneCapacities(): Readonly<ZoneCapacities> {
    return { ...this.capacities };
  }

  get featureNames(): readonly FeatureName[] {
    return featureNames(this.config.featureSet);
  }

  fallbackVector(): number[] {
    return Array.from(this.embeddings.fallbackVector());
  }

  tokenize(url: string): UrlData {
    return parseUrl(url, this.tokenizer, this.tokenizerOptions()).data;
  }

  /**
   * A single URL gives one (features, matrix) pair; a list gives one pair
   * per URL in the same order. A URL that fails anywhere in the pipeline
   * yields all-zero placeholders of the usual shapes.
   */
  featurize(url: string): VectorMatrix;
  featurize(urls: readonly string[]): VectorMatrix[];
  featurize(urls: string | readonly string[]): VectorMatrix | VectorMatrix[] {
    if (typeof urls === 'string') {
      return this.featurizeOne(urls);
    }
    return urls.map(url => this.featurizeOne(url));
  }

  /**
   * Changes zone capacities without reloading the embedding. Omitted or
   * zero values keep the current capacity.
   */
  setHyperparams(params: Partial<ZoneCapacities>): void {
    const next: ZoneCapacities = { ...this.capacities };
    const issues: string[] = [];

    for (const key of CAPACITY_KEYS) {
      const value = params[key];
      if (value === undefined || value === 0) continue;
      if (!Number.isInteger(value) || value < 0) {
        issues.push(`${key}: expected a positive integer, got ${value}`);
        continue;
      }
      next[key] = value;
    }

    if (issues.length > 0) {
      throw new ConfigError('setHyperparams', issues);
    }
    this.capacities = next;
    this.n = totalLength(next);
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  private tokenizerOptions(): TokenizerOptions {
    return { expandTokens: this.config.expandTokens, reversePath: this.config.reversePath };
  }

  private featurizeOne(url: string): VectorMatrix {
    try {
      const parsed = parseUrl(url, this.tokenizer, this.tokenizerOptions());
      const features = createHandPickedFeatures(parsed, {
        featureSet: this.config.featureSet,
        tldScoring: this.config.tldScoring,
        tldReputation: this.tldReputation,
      });
      const wordMatrix = createWordMatrix(parsed.data, this.embeddings, {
        layout: this.config.layout,
        capacities: this.capacities,
        prefix: this.embedPrefix,
      });
      return [features, wordMatrix];
    } catch (error) {
      this.logger.error(`Error with "${url}": ${errorMessage(error)}`);
      return this.placeholder();
    }
  }

  private placeholder(): VectorMatrix {
    const features: FeatureVector = new Array<number>(this.handPickedFeatureLength).fill(0);
    return [features, zeroMatrix(this.n, this.embeddingDim)];
  }
}
