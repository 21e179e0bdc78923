import { ZodError } from 'zod';

/**
 * Error thrown when command-line flags or environment settings are invalid
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly zodError?: ZodError,
  ) {
    super(message);
    this.name = 'ConfigValidationError';
    Object.setPrototypeOf(this, ConfigValidationError.prototype);
  }

  /**
   * Creates a readable error message from a Zod validation error
   */
  static fromZodError(error: ZodError): ConfigValidationError {
    const issues = error.issues.map((issue) => {
      const path = issue.path.join('.');
      return `  - ${path}: ${issue.message}`;
    });

    const message = ['Invalid configuration:', ...issues].join('\n');
    return new ConfigValidationError(message, error);
  }
}

/**
 * Cookie file, token or subscription problems. Fatal to the whole run.
 */
export class CredentialError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CredentialError';
    Object.setPrototypeOf(this, CredentialError.prototype);
  }
}

export class HttpStatusError extends Error {
  constructor(
    public readonly url: string,
    public readonly status: number,
  ) {
    super(`HTTP ${status} for ${url}`);
    this.name = 'HttpStatusError';
    Object.setPrototypeOf(this, HttpStatusError.prototype);
  }
}

/**
 * Raised once the retry budget for a request is spent.
 */
export class FetchError extends Error {
  constructor(
    public readonly url: string,
    public readonly lastError: Error,
    public readonly attempts: number,
  ) {
    super(`Failed to fetch ${url} after ${attempts} attempts: ${lastError.message}`);
    this.name = 'FetchError';
    Object.setPrototypeOf(this, FetchError.prototype);
  }
}

/**
 * The catalog answered, but not with what an item needs (missing field,
 * unknown id, absent stream URL).
 */
export class ResolutionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ResolutionError';
    Object.setPrototypeOf(this, ResolutionError.prototype);
  }

  static fromZodError(subject: string, error: ZodError): ResolutionError {
    const issues = error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    return new ResolutionError(`Unexpected catalog response for ${subject} (${issues.join('; ')})`);
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));
