/**
 * Acronym Expansion
 *
 * Replaces abbreviated tokens ("cs", "nlp") with the words they stand for,
 * so the embedding lookup sees dictionary words. Expansions of several
 * words are spliced in place, shifting later tokens of the same zone.
 */

import { readFile } from 'node:fs/promises';
import * as yaml from 'yaml';
import { DEFAULT_ACRONYMS_PATH } from './data-files';
import type { ArgPair, UrlData } from '../types';

export interface AcronymTable {
  /** Expansion phrase for a lowercase abbreviation, if any */
  lookup(token: string): string | undefined;
  readonly size: number;
}

export class MapAcronymTable implements AcronymTable {
  private readonly entries: ReadonlyMap<string, string>;

  constructor(entries: Iterable<readonly [string, string]>) {
    const map = new Map<string, string>();
    for (const [abbreviation, phrase] of entries) {
      map.set(abbreviation.toLowerCase(), phrase);
    }
    this.entries = map;
  }

  get size(): number {
    return this.entries.size;
  }

  lookup(token: string): string | undefined {
    return this.entries.get(token);
  }
}

export const EMPTY_ACRONYMS: AcronymTable = new MapAcronymTable([]);

// ============================================================================
// LOADING
// ============================================================================

/**
 * Parses a YAML mapping of abbreviation to phrase. Non-string values are
 * rejected rather than coerced.
 */
export function parseAcronymTable(text: string, source = 'acronym table'): MapAcronymTable {
  const parsed: unknown = yaml.parse(text);
  if (parsed === null || parsed === undefined) {
    return new MapAcronymTable([]);
  }
  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new Error(`${source} must be a mapping of abbreviation to phrase`);
  }

  const entries: Array<[string, string]> = [];
  for (const [abbreviation, phrase] of Object.entries(parsed)) {
    if (typeof phrase !== 'string') {
      throw new Error(`${source}: expansion of "${abbreviation}" is not a string`);
    }
    entries.push([abbreviation, phrase]);
  }
  return new MapAcronymTable(entries);
}

export async function loadAcronymTable(path: string = DEFAULT_ACRONYMS_PATH): Promise<MapAcronymTable> {
  return parseAcronymTable(await readFile(path, 'utf8'), path);
}

// ============================================================================
// EXPANSION
// ============================================================================

/**
 * Lookup is case-insensitive; a miss returns the token unchanged.
 *
 * @example
 * expandToken('CS', table) // 'computer science'
 */
export function expandToken(token: string, acronyms: AcronymTable): string {
  return acronyms.lookup(token.toLowerCase()) ?? token;
}

export function expandTokens(tokens: readonly string[], acronyms: AcronymTable): string[] {
  return tokens.flatMap(token => expandToken(token, acronyms).split(/\s+/).filter(Boolean));
}

/**
 * Expands every zone except the domain ending.
 */
export function expandUrlTokens(urlData: UrlData, acronyms: AcronymTable): UrlData {
  const { subDomains, mainDomain, domainEnding } = urlData.domains;

  return {
    protocol: urlData.protocol,
    domains: {
      subDomains: expandTokens(subDomains, acronyms),
      mainDomain: expandTokens(mainDomain, acronyms),
      domainEnding,
    },
    path: expandTokens(urlData.path, acronyms),
    args: urlData.args.map(
      ([param, value]): ArgPair => [expandTokens(param, acronyms), expandTokens(value, acronyms)]
    ),
  };
}
