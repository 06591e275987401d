/**
 * Sub-word Segmentation
 *
 * Splits concatenated alphanumeric runs ("geocities", "mediumlengthpath")
 * into likely English words. The segmenter is a dynamic program over a
 * frequency-ordered word list where a word's cost follows Zipf's law:
 * the word at rank r costs log((r + 1) * log(N)). A chunk of letters that
 * is not in the list costs more than the rarest listed word plus a fixed
 * amount per character, so unknown words stay whole instead of falling
 * apart into single letters. The cheapest partition of each run wins.
 */

import { readFile } from 'node:fs/promises';
import { DEFAULT_WORD_LIST_PATH } from './data-files';

// ============================================================================
// TYPES
// ============================================================================

/** Segmentation algorithm, swappable without touching the tokenizer */
export interface Segmenter {
  segment(text: string): string[];
}

/** Applied to every raw label, path segment, parameter and value */
export type WordSplitter = (text: string) => string[];

export const MIN_SPLIT_LEN = 4;

// Anything outside these characters separates runs and is dropped
const RUN_SEPARATOR = /[^a-zA-Z0-9']+/;

// Per-character price of a chunk not found in the word list
const UNKNOWN_CHAR_COST = Math.log(10);

const isDigit = (ch: string | undefined): boolean => ch !== undefined && ch >= '0' && ch <= '9';

const isLetter = (ch: string): boolean => ch !== "'" && !isDigit(ch);

// ============================================================================
// ZIPF SEGMENTER
// ============================================================================

export class ZipfSegmenter implements Segmenter {
  private readonly wordCost = new Map<string, number>();
  private readonly maxWordLength: number;
  private readonly unknownBaseCost: number;

  constructor(words: readonly string[]) {
    const logN = Math.log(Math.max(words.length, 2));
    let maxWordLength = 1;

    words.forEach((word, rank) => {
      const key = word.toLowerCase();
      if (!key || this.wordCost.has(key)) return;
      this.wordCost.set(key, Math.log((rank + 1) * logN));
      maxWordLength = Math.max(maxWordLength, key.length);
    });

    this.maxWordLength = maxWordLength;
    this.unknownBaseCost = Math.log((words.length + 1) * logN);
  }

  get vocabularySize(): number {
    return this.wordCost.size;
  }

  segment(text: string): string[] {
    return text
      .split(RUN_SEPARATOR)
      .filter(run => run.length > 0)
      .flatMap(run => this.segmentRun(run));
  }

  private segmentRun(run: string): string[] {
    // letterStart[i] is where the letters-only stretch ending at i begins
    const letterStart: number[] = [0];
    for (let i = 1; i <= run.length; i++) {
      letterStart.push(isLetter(run[i - 1]) ? letterStart[i - 1] : i);
    }

    const cost: number[] = [0];
    for (let i = 1; i <= run.length; i++) {
      cost.push(this.bestMatch(run, cost, letterStart, i).cost);
    }

    // Walk back from the end along the cheapest partition
    const out: string[] = [];
    let i = run.length;
    while (i > 0) {
      const { length } = this.bestMatch(run, cost, letterStart, i);
      const token = run.slice(i - length, i);
      let newToken = true;

      if (token !== "'" && out.length > 0) {
        const last = out[out.length - 1];
        if (last === "'s" || (isDigit(run[i - 1]) && isDigit(last[0]))) {
          out[out.length - 1] = token + last;
          newToken = false;
        }
      }

      if (newToken) {
        out.push(token);
      }
      i -= length;
    }

    return out.reverse();
  }

  /** Cheapest way to end a word at position i; ties go to the shorter word */
  private bestMatch(
    run: string,
    cost: number[],
    letterStart: number[],
    i: number
  ): { cost: number; length: number } {
    let best = { cost: Infinity, length: 1 };
    const longest = Math.max(Math.min(i, this.maxWordLength), i - letterStart[i]);

    for (let length = 1; length <= longest; length++) {
      let wordCost = length <= this.maxWordLength
        ? this.wordCost.get(run.slice(i - length, i).toLowerCase()) ?? Infinity
        : Infinity;
      if (i - length >= letterStart[i]) {
        wordCost = Math.min(wordCost, this.unknownCost(length));
      }
      const total = cost[i - length] + wordCost;
      if (total < best.cost) {
        best = { cost: total, length };
      }
    }

    return best;
  }

  private unknownCost(length: number): number {
    return this.unknownBaseCost + length * UNKNOWN_CHAR_COST;
  }
}

// ============================================================================
// WORD SPLITTER
// ============================================================================

/**
 * Wraps a segmenter with the short-token fast path: empty input yields no
 * tokens and anything up to `minSplitLength` characters is kept whole.
 */
export function createWordSplitter(
  segmenter: Segmenter,
  minSplitLength: number = MIN_SPLIT_LEN
): WordSplitter {
  return (text: string): string[] => {
    if (!text) return [];
    return text.length <= minSplitLength ? [text] : segmenter.segment(text);
  };
}

/**
 * Reads a frequency-ordered word list, one word per line, most frequent
 * first. Blank lines and `#` comments are skipped.
 */
export async function loadWordList(path: string = DEFAULT_WORD_LIST_PATH): Promise<string[]> {
  const text = await readFile(path, 'utf8');
  return text
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0 && !line.startsWith('#'));
}

export async function loadSegmenter(path?: string): Promise<ZipfSegmenter> {
  return new ZipfSegmenter(await loadWordList(path));
}
