/**
 * Embedding Indexes
 *
 * Token -> vector lookup used by the word-matrix builder. Two backends:
 * a Map of plain arrays for small tables (the sample set, test fakes) and a
 * packed Float32Array store for pretrained vocabularies with hundreds of
 * thousands of rows. Both expose the vector returned on a miss.
 */

import { createReadStream } from 'node:fs';
import { join } from 'node:path';
import { createInterface } from 'node:readline';
import { InvalidEmbeddingChoiceError } from './errors';
import { DEFAULT_VECTORS_DIR } from './data-files';
import { silentLogger, type Logger } from './logger';
import type { EmbeddingChoice, Vector } from '../types';

// ============================================================================
// INTERFACE
// ============================================================================

export interface EmbeddingIndex {
  lookup(token: string): Vector | undefined;
  dimension(): number;
  /** Substituted for every token the index does not contain */
  fallbackVector(): Vector;
}

/**
 * `mean`: average of all vectors in the index.
 * `zero`: all zeros, for families that already model unknown tokens.
 */
export type FallbackMode = 'mean' | 'zero';

// ============================================================================
// IN-MEMORY INDEX
// ============================================================================

export class InMemoryEmbeddingIndex implements EmbeddingIndex {
  private readonly vectors = new Map<string, readonly number[]>();
  private readonly dim: number;
  private readonly fallback: readonly number[];

  constructor(entries: Iterable<readonly [string, readonly number[]]>, fallback: FallbackMode = 'mean') {
    let dim = -1;
    for (const [token, vector] of entries) {
      if (dim === -1) {
        dim = vector.length;
      } else if (vector.length !== dim) {
        throw new Error(`Vector for "${token}" has ${vector.length} dimensions, expected ${dim}`);
      }
      this.vectors.set(token, [...vector]);
    }
    if (dim <= 0) {
      throw new Error('Embedding index needs at least one non-empty vector');
    }

    this.dim = dim;
    this.fallback = fallback === 'zero' ? new Array<number>(dim).fill(0) : this.meanVector();
  }

  get size(): number {
    return this.vectors.size;
  }

  lookup(token: string): Vector | undefined {
    return this.vectors.get(token);
  }

  dimension(): number {
    return this.dim;
  }

  fallbackVector(): Vector {
    return this.fallback;
  }

  private meanVector(): number[] {
    const sum = new Array<number>(this.dim).fill(0);
    for (const vector of this.vectors.values()) {
      for (let i = 0; i < this.dim; i++) {
        sum[i] += vector[i];
      }
    }
    return sum.map(total => total / this.vectors.size);
  }
}

// ============================================================================
// PACKED STORE
// ============================================================================

/**
 * Rows live back to back in one Float32Array; the map only holds row
 * numbers. Filled once by the loader, read-only afterwards.
 */
export class PackedEmbeddingStore implements EmbeddingIndex {
  private readonly rows = new Map<string, number>();
  private data: Float32Array;
  private count = 0;
  private fallback: Float32Array | null = null;

  constructor(
    private readonly dim: number,
    private readonly fallbackMode: FallbackMode = 'mean',
    initialCapacity = 1024
  ) {
    if (!Number.isInteger(dim) || dim <= 0) {
      throw new Error(`Invalid embedding dimension: ${dim}`);
    }
    this.data = new Float32Array(dim * Math.max(initialCapacity, 1));
  }

  get size(): number {
    return this.count;
  }

  add(token: string, values: ArrayLike<number>): void {
    if (this.fallback) {
      throw new Error('Cannot add vectors after the store has been read');
    }
    if (values.length !== this.dim) {
      throw new Error(`Vector for "${token}" has ${values.length} dimensions, expected ${this.dim}`);
    }
    // First occurrence wins
    if (this.rows.has(token)) return;

    if ((this.count + 1) * this.dim > this.data.length) {
      const grown = new Float32Array(this.data.length * 2);
      grown.set(this.data);
      this.data = grown;
    }
    this.data.set(values, this.count * this.dim);
    this.rows.set(token, this.count);
    this.count++;
  }

  lookup(token: string): Vector | undefined {
    const row = this.rows.get(token);
    if (row === undefined) return undefined;
    return this.data.subarray(row * this.dim, (row + 1) * this.dim);
  }

  dimension(): number {
    return this.dim;
  }

  fallbackVector(): Vector {
    if (!this.fallback) {
      this.fallback = this.computeFallback();
    }
    return this.fallback;
  }

  private computeFallback(): Float32Array {
    const out = new Float32Array(this.dim);
    if (this.fallbackMode === 'zero' || this.count === 0) return out;

    // Accumulate in doubles; float32 sums drift over large vocabularies
    const sum = new Float64Array(this.dim);
    for (let row = 0; row < this.count; row++) {
      const offset = row * this.dim;
      for (let i = 0; i < this.dim; i++) {
        sum[i] += this.data[offset + i];
      }
    }
    for (let i = 0; i < this.dim; i++) {
      out[i] = sum[i] / this.count;
    }
    return out;
  }
}

// ============================================================================
// TEXT VECTOR FILES
// ============================================================================

export interface VectorLine {
  token: string;
  values: number[];
}

/**
 * Parses one `token v1 v2 ... vD` line of a GloVe / word2vec text file.
 * Returns null for blank lines.
 */
export function parseVectorLine(line: string, lineNumber: number): VectorLine | null {
  const fields = line.trim().split(/ +/);
  if (fields.length === 1 && fields[0] === '') return null;
  if (fields.length < 2) {
    throw new Error(`Line ${lineNumber}: expected a token followed by numbers`);
  }

  const [token, ...rest] = fields;
  const values = rest.map(Number);
  if (values.some(value => Number.isNaN(value))) {
    throw new Error(`Line ${lineNumber}: non-numeric vector component for "${token}"`);
  }
  return { token, values };
}

const HEADER_LINE = /^\s*\d+\s+\d+\s*$/;

/**
 * Streams a text vector file line by line. A word2vec `count dim` header on
 * the first line is skipped. Every row must have the same dimension.
 */
export async function readVectorFile(
  path: string,
  onVector: (token: string, values: number[]) => void
): Promise<{ dimension: number; count: number }> {
  const lines = createInterface({
    input: createReadStream(path, { encoding: 'utf8' }),
    crlfDelay: Infinity,
  });

  let dimension = -1;
  let count = 0;
  let lineNumber = 0;

  for await (const line of lines) {
    lineNumber++;
    if (lineNumber === 1 && HEADER_LINE.test(line)) continue;

    const parsed = parseVectorLine(line, lineNumber);
    if (!parsed) continue;

    if (dimension === -1) {
      dimension = parsed.values.length;
    } else if (parsed.values.length !== dimension) {
      throw new Error(
        `${path}:${lineNumber}: vector for "${parsed.token}" has ${parsed.values.length} dimensions, expected ${dimension}`
      );
    }

    onVector(parsed.token, parsed.values);
    count++;
  }

  if (count === 0) {
    throw new Error(`${path}: no vectors found`);
  }
  return { dimension, count };
}

export async function loadInMemoryIndex(
  path: string,
  fallback: FallbackMode = 'mean'
): Promise<InMemoryEmbeddingIndex> {
  const entries: Array<[string, number[]]> = [];
  await readVectorFile(path, (token, values) => {
    entries.push([token, values]);
  });
  return new InMemoryEmbeddingIndex(entries, fallback);
}

export async function loadPackedStore(
  path: string,
  fallback: FallbackMode = 'mean'
): Promise<PackedEmbeddingStore> {
  // Sized from the first row, so created inside the callback
  const loaded: { store: PackedEmbeddingStore | null } = { store: null };
  await readVectorFile(path, (token, values) => {
    const store = loaded.store ?? new PackedEmbeddingStore(values.length, fallback);
    store.add(token, values);
    loaded.store = store;
  });
  if (!loaded.store) {
    throw new Error(`${path}: no vectors found`);
  }
  return loaded.store;
}

// ============================================================================
// EMBEDDING CHOICES
// ============================================================================

export interface EmbeddingSource {
  /** File name under the vectors directory */
  file: string;
  /** Prepended to every token before lookup */
  prefix: string;
  fallback: FallbackMode;
  backend: 'in-memory' | 'packed';
}

export const EMBEDDING_SOURCES: Readonly<Record<EmbeddingChoice, EmbeddingSource>> = {
  GloVe: { file: 'glove-wiki-gigaword-300.txt', prefix: '', fallback: 'mean', backend: 'packed' },
  Conceptnet: { file: 'conceptnet-numberbatch-17-06-300.txt', prefix: '/c/en/', fallback: 'mean', backend: 'packed' },
  Word2Vec: { file: 'word2vec-google-news-300.txt', prefix: '', fallback: 'mean', backend: 'packed' },
  FastText: { file: 'fasttext-wiki-news-subwords-300.txt', prefix: '', fallback: 'zero', backend: 'packed' },
  sample: { file: join('sample', 'sample.txt'), prefix: '', fallback: 'mean', backend: 'in-memory' },
};

export function isEmbeddingChoice(value: string): value is EmbeddingChoice {
  return Object.prototype.hasOwnProperty.call(EMBEDDING_SOURCES, value);
}

/**
 * @throws InvalidEmbeddingChoiceError for an unknown selector
 */
export function embeddingSource(choice: string): EmbeddingSource {
  if (!isEmbeddingChoice(choice)) {
    throw new InvalidEmbeddingChoiceError(choice);
  }
  return EMBEDDING_SOURCES[choice];
}

export interface LoadedEmbedding {
  index: EmbeddingIndex;
  prefix: string;
}

export async function loadEmbedding(
  choice: string,
  options: { vectorsDir?: string; logger?: Logger } = {}
): Promise<LoadedEmbedding> {
  const source = embeddingSource(choice);
  const logger = options.logger ?? silentLogger;
  const path = join(options.vectorsDir ?? DEFAULT_VECTORS_DIR, source.file);

  logger.info(`Reading the ${source.file} word vector file...`);
  const index = source.backend === 'packed'
    ? await loadPackedStore(path, source.fallback)
    : await loadInMemoryIndex(path, source.fallback);

  return { index, prefix: source.prefix };
}
