/**
 * Error types raised by the featurization pipeline.
 */

export class MalformedUrlError extends Error {
  readonly url: string;

  constructor(url: string) {
    super(`Error matching url: ${url}`);
    this.name = 'MalformedUrlError';
    this.url = url;
  }
}

export class InvalidEmbeddingChoiceError extends Error {
  readonly choice: string;

  constructor(choice: string) {
    super(`${choice} is not a valid embedding choice.`);
    this.name = 'InvalidEmbeddingChoiceError';
    this.choice = choice;
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super(`Invalid featurizer config in ${source}: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/** Message of an unknown thrown value */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
