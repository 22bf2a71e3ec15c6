/**
 * Error taxonomy for the generation pipeline.
 *
 * Provider clients translate SDK failures into RetryableError or FatalError at
 * their boundary; everything upstream branches on these types only.
 */

export type ProviderName = 'claude' | 'openai' | 'gemini' | 'ollama' | 'gpt-image' | 'stub';

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class ValidationError extends Error {
  constructor(message: string, public readonly details?: unknown) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

export class GenerationAbortedError extends Error {
  constructor(message = 'Generation aborted') {
    super(message);
    this.name = 'GenerationAbortedError';
  }
}

export abstract class ProviderError extends Error {
  abstract readonly retryable: boolean;

  constructor(
    message: string,
    public readonly provider: ProviderName,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class RetryableError extends ProviderError {
  readonly retryable = true;

  constructor(
    message: string,
    provider: ProviderName,
    status?: number,
    public readonly retryAfterMs?: number,
    options?: { cause?: unknown }
  ) {
    super(message, provider, status, options);
    this.name = 'RetryableError';
  }
}

export class FatalError extends ProviderError {
  readonly retryable = false;

  constructor(message: string, provider: ProviderName, status?: number, options?: { cause?: unknown }) {
    super(message, provider, status, options);
    this.name = 'FatalError';
  }
}

// The provider no longer recognizes the conversation token
export class SessionInvalidError extends FatalError {
  constructor(message: string, provider: ProviderName, status?: number, options?: { cause?: unknown }) {
    super(message, provider, status, options);
    this.name = 'SessionInvalidError';
  }
}

export function isRetryableError(error: unknown): error is RetryableError {
  return error instanceof ProviderError && error.retryable;
}

export function isAbortError(error: unknown): boolean {
  if (error instanceof GenerationAbortedError) return true;
  return error instanceof Error && error.name === 'AbortError';
}

/**
 * Map an HTTP status from a provider into the retry taxonomy.
 * 408, 429 and 5xx are transient; every other status is fatal.
 */
export function errorFromStatus(
  provider: ProviderName,
  status: number,
  message: string,
  cause?: unknown,
  retryAfterMs?: number
): ProviderError {
  if (status === 408 || status === 429 || status >= 500) {
    return new RetryableError(message, provider, status, retryAfterMs, { cause });
  }
  return new FatalError(message, provider, status, { cause });
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return `${error.name}: ${error.message}`;
  return String(error);
}
