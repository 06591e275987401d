/**
 * List helpers used across the tokenizer and featurizer.
 */

/**
 * Flattens one level of nesting
 */
export function flatten<T>(lists: ReadonlyArray<ReadonlyArray<T>>): T[] {
  const out: T[] = [];
  for (const list of lists) {
    out.push(...list);
  }
  return out;
}

/**
 * Flattens two levels of nesting, e.g. a list of (param, value) token pairs
 */
export function flattenTwice<T>(lists: ReadonlyArray<ReadonlyArray<ReadonlyArray<T>>>): T[] {
  return flatten(flatten(lists));
}

export function countMatches(text: string, pattern: RegExp): number {
  return text.match(pattern)?.length ?? 0;
}
