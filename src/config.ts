/**
 * Featurizer Configuration
 *
 * Settings come from code or from a YAML file; both go through the same
 * schema so defaults and validation are shared.
 */

import { readFile } from 'node:fs/promises';
import { dirname, isAbsolute, resolve } from 'node:path';
import * as yaml from 'yaml';
import { z } from 'zod';
import { ConfigError, errorMessage } from './lib/errors';

const capacity = z.number().int().positive();

export const FeaturizerConfigSchema = z
  .object({
    // Left as a free string: an unknown choice fails when the featurizer is built
    embedding: z.string().min(1).default('Conceptnet'),
    expandTokens: z.boolean().default(false),
    reversePath: z.boolean().default(false),
    layout: z.enum(['positional', 'sequential']).default('positional'),
    subDomainMaxLen: capacity.default(5),
    mainDomainMaxLen: capacity.default(5),
    pathMaxLen: capacity.default(10),
    argMaxLen: capacity.default(10),
    featureSet: z.enum(['basic', 'extended']).default('extended'),
    tldScoring: z.enum(['untrusted-flag', 'signed']).default('untrusted-flag'),
    untrustworthyTlds: z.array(z.string().min(1)).optional(),
    trustworthyTlds: z.array(z.string().min(1)).optional(),
    minSplitLength: capacity.default(4),
    vectorsDir: z.string().optional(),
    wordListPath: z.string().optional(),
    acronymsPath: z.string().optional(),
    verbose: z.boolean().default(true),
  })
  .strict();

export type FeaturizerConfig = z.infer<typeof FeaturizerConfigSchema>;

export type FeaturizerConfigInput = z.input<typeof FeaturizerConfigSchema>;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Fills defaults and validates.
 *
 * @throws ConfigError listing every invalid field
 */
export function resolveConfig(input: unknown = {}, source = 'options'): FeaturizerConfig {
  const result = FeaturizerConfigSchema.safeParse(input ?? {});
  if (!result.success) {
    throw new ConfigError(source, formatIssues(result.error));
  }
  return result.data;
}

export function parseConfig(text: string, source = 'config'): FeaturizerConfig {
  let document: unknown;
  try {
    document = yaml.parse(text);
  } catch (error) {
    throw new ConfigError(source, [errorMessage(error)]);
  }
  return resolveConfig(document, source);
}

const PATH_KEYS = ['vectorsDir', 'wordListPath', 'acronymsPath'] as const;

/**
 * Reads a YAML config file. Relative paths inside it are taken relative to
 * the file's directory.
 */
export async function loadConfig(path: string): Promise<FeaturizerConfig> {
  const config = parseConfig(await readFile(path, 'utf8'), path);
  const baseDir = dirname(path);

  const resolved: FeaturizerConfig = { ...config };
  for (const key of PATH_KEYS) {
    const value = config[key];
    if (value !== undefined && !isAbsolute(value)) {
      resolved[key] = resolve(baseDir, value);
    }
  }
  return resolved;
}
