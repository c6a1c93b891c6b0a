import { logger as defaultLogger, type Logger } from "../logger";
import { config, MAX_ATTEMPTS_CEILING } from "../config";
import {
  FatalError,
  RateLimitError,
  RetryExhaustedError,
  ScanAbortedError,
  errorMessage,
} from "../errors";

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetryOptions {
  maxAttempts?: number;
  baseDelayMs?: number;
  maxRetryDelayMs?: number;
  rateLimitFallbackDelayMs?: number;
  maxRateLimitWaitMs?: number;
  signal?: AbortSignal;
  sleep?: Sleep;
  now?: () => number;
  logger?: Logger;
}

export type WaitKind = "backoff" | "rate-limit";

export interface RetryWait {
  attempt: number;
  kind: WaitKind;
  delayMs: number;
}

export type RetryResult<T> =
  | { ok: true; value: T; attempts: number; waits: RetryWait[] }
  | { ok: false; error: FatalError | RetryExhaustedError; attempts: number; waits: RetryWait[] };

// Added on top of the advertised reset time so the window has really rolled over
const RATE_LIMIT_BUFFER_MS = 1000;

/**
 * Wait for the given time, rejecting early when the signal aborts
 */
export const sleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new ScanAbortedError("Scan aborted", signal.reason));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new ScanAbortedError("Scan aborted during wait", signal?.reason));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);

    signal?.addEventListener("abort", onAbort, { once: true });
  });

export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.min(baseDelayMs * Math.pow(2, attempt - 1), maxDelayMs);
}

/**
 * Runs a single remote call with bounded attempts.
 *
 * Rate limits wait for the advertised reset, transient failures back off
 * exponentially and fatal errors are returned without another attempt.
 * Never throws for the operation's own failures; only an aborted signal
 * escapes as a ScanAbortedError.
 */
export class RetryController {
  private readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly maxRetryDelayMs: number;
  private readonly rateLimitFallbackDelayMs: number;
  private readonly maxRateLimitWaitMs: number;
  readonly signal?: AbortSignal;
  private readonly sleep: Sleep;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(options: RetryOptions = {}) {
    const requested =
      options.maxAttempts !== undefined && Number.isFinite(options.maxAttempts)
        ? options.maxAttempts
        : config.retry.maxAttempts;
    this.maxAttempts = Math.min(Math.max(Math.floor(requested), 1), MAX_ATTEMPTS_CEILING);
    this.baseDelayMs = options.baseDelayMs ?? config.retry.baseDelay;
    this.maxRetryDelayMs = options.maxRetryDelayMs ?? config.retry.maxRetryDelay;
    this.rateLimitFallbackDelayMs = options.rateLimitFallbackDelayMs ?? config.retry.rateLimitFallbackDelay;
    this.maxRateLimitWaitMs = options.maxRateLimitWaitMs ?? config.retry.maxRateLimitWait;
    this.signal = options.signal;
    this.sleep = options.sleep ?? sleep;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? defaultLogger;
  }

  getMaxAttempts(): number {
    return this.maxAttempts;
  }

  async execute<T>(operation: () => Promise<T>): Promise<RetryResult<T>> {
    const waits: RetryWait[] = [];
    let attempt = 0;
    let lastError: unknown;

    while (attempt < this.maxAttempts) {
      this.throwIfAborted();
      attempt++;

      try {
        const value = await operation();
        if (attempt > 1) {
          this.logger.info(`Request succeeded on attempt ${attempt}/${this.maxAttempts}`);
        }
        return { ok: true, value, attempts: attempt, waits };
      } catch (error) {
        if (error instanceof ScanAbortedError) {
          throw error;
        }

        if (error instanceof FatalError) {
          this.logger.error({ statusCode: error.statusCode }, `Fatal error, not retrying: ${error.message}`);
          return { ok: false, error, attempts: attempt, waits };
        }

        lastError = error;
        if (attempt >= this.maxAttempts) {
          break;
        }

        const wait = this.nextWait(attempt, error);
        waits.push(wait);

        if (wait.kind === "rate-limit") {
          this.logger.warn(
            `Rate limited on attempt ${attempt}/${this.maxAttempts}. Waiting ${Math.ceil(wait.delayMs / 1000)} seconds...`
          );
        } else {
          this.logger.warn(
            `Request failed on attempt ${attempt}/${this.maxAttempts}: ${errorMessage(error)}. Retrying in ${wait.delayMs}ms`
          );
        }

        await this.sleep(wait.delayMs, this.signal);
      }
    }

    this.logger.error(`Giving up after ${attempt} attempts: ${errorMessage(lastError)}`);
    return {
      ok: false,
      error: new RetryExhaustedError(
        `Request failed after ${attempt} attempts: ${errorMessage(lastError)}`,
        attempt,
        lastError
      ),
      attempts: attempt,
      waits,
    };
  }

  private nextWait(attempt: number, error: unknown): RetryWait {
    if (error instanceof RateLimitError) {
      return { attempt, kind: "rate-limit", delayMs: this.rateLimitDelay(error) };
    }
    return {
      attempt,
      kind: "backoff",
      delayMs: backoffDelay(attempt, this.baseDelayMs, this.maxRetryDelayMs),
    };
  }

  private rateLimitDelay(error: RateLimitError): number {
    if (!error.resetAt) {
      return Math.min(this.rateLimitFallbackDelayMs, this.maxRateLimitWaitMs);
    }

    const untilReset = Math.max(error.resetAt.getTime() - this.now(), 0) + RATE_LIMIT_BUFFER_MS;
    if (untilReset > this.maxRateLimitWaitMs) {
      this.logger.warn(
        `Rate limit resets at ${error.resetAt.toISOString()}, capping wait at ${this.maxRateLimitWaitMs}ms`
      );
    }
    return Math.min(untilReset, this.maxRateLimitWaitMs);
  }

  private throwIfAborted(): void {
    if (this.signal?.aborted) {
      throw new ScanAbortedError("Scan aborted", this.signal.reason);
    }
  }
}
