/**
 * Custom error classes for repository scanning
 */

/**
 * Retryable failure: network errors and server-side (5xx) responses
 */
export class TransientError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
    public readonly originalError?: unknown
  ) {
    super(message);
    this.name = "TransientError";
    Object.setPrototypeOf(this, TransientError.prototype);
  }
}

export class RateLimitError extends Error {
  constructor(
    message: string,
    public readonly resetAt?: Date
  ) {
    super(message);
    this.name = "RateLimitError";
    Object.setPrototypeOf(this, RateLimitError.prototype);
  }
}

/**
 * Non-retryable failure: bad query, authentication, malformed response
 */
export class FatalError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
    public readonly originalError?: unknown
  ) {
    super(message);
    this.name = "FatalError";
    Object.setPrototypeOf(this, FatalError.prototype);
  }
}

export class RetryExhaustedError extends Error {
  constructor(
    message: string,
    public readonly attempts: number,
    public readonly lastError: unknown
  ) {
    super(message);
    this.name = "RetryExhaustedError";
    Object.setPrototypeOf(this, RetryExhaustedError.prototype);
  }
}

export class ScanAbortedError extends Error {
  constructor(
    message: string,
    public readonly reason?: unknown
  ) {
    super(message);
    this.name = "ScanAbortedError";
    Object.setPrototypeOf(this, ScanAbortedError.prototype);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
