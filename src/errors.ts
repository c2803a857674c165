export class ConfigurationError extends Error {
  constructor(message: string, public readonly statusCode: number = 400) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class InputNotFoundError extends Error {
  constructor(public readonly path: string, public readonly statusCode: number = 404) {
    super(`File not found: ${path}`);
    this.name = 'InputNotFoundError';
  }
}

export class CorruptContainerError extends Error {
  constructor(message: string, public readonly statusCode: number = 422) {
    super(message);
    this.name = 'CorruptContainerError';
  }
}

export class UnknownEncodingError extends Error {
  constructor(public readonly path: string, public readonly tried: string[], public readonly statusCode: number = 415) {
    super(`Could not decode ${path} with any of: ${tried.join(', ')}`);
    this.name = 'UnknownEncodingError';
  }
}

export class WordNotFoundError extends Error {
  constructor(public readonly word: string, public readonly statusCode: number = 404) {
    super(`Word not in dictionary: ${word}`);
    this.name = 'WordNotFoundError';
  }
}

/**
 * Errors that carry an HTTP-ish status code and a user-presentable message.
 */
export type KnownError =
  | ConfigurationError
  | InputNotFoundError
  | CorruptContainerError
  | UnknownEncodingError
  | WordNotFoundError;

export function isKnownError(err: unknown): err is KnownError {
  return err instanceof ConfigurationError
    || err instanceof InputNotFoundError
    || err instanceof CorruptContainerError
    || err instanceof UnknownEncodingError
    || err instanceof WordNotFoundError;
}
