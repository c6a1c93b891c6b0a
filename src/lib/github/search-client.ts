import { Octokit } from "@octokit/rest";
import { componentLogger, logger as defaultLogger, type Logger } from "../logger";
import { config } from "../config";
import { FatalError, RateLimitError, ScanAbortedError, TransientError, errorMessage } from "../errors";
import type { RateLimitInfo, SearchConfig, SearchPageRequest } from "../../types/github";

/**
 * Anything able to run a single repository search request.
 * Implementations throw TransientError, RateLimitError or FatalError.
 */
export interface RepositorySearchApi {
  searchRepositories(request: SearchPageRequest): Promise<unknown>;
}

export interface SearchClientDeps {
  logger?: Logger;
  fetch?: typeof fetch;
  now?: () => number;
}

interface HttpFailure {
  status?: number;
  headers: Record<string, string>;
}

function readHttpFailure(error: unknown): HttpFailure {
  const failure: HttpFailure = { headers: {} };
  if (typeof error !== "object" || error === null) {
    return failure;
  }

  if ("status" in error && typeof error.status === "number") {
    failure.status = error.status;
  }

  if ("response" in error && typeof error.response === "object" && error.response !== null) {
    const response = error.response;
    if ("headers" in response && typeof response.headers === "object" && response.headers !== null) {
      for (const [key, value] of Object.entries(response.headers)) {
        if (typeof value === "string" || typeof value === "number") {
          failure.headers[key.toLowerCase()] = String(value);
        }
      }
    }
  }

  return failure;
}

// Secondary limits may arrive with quota left and no retry-after header
const SECONDARY_LIMIT_MESSAGE = /secondary rate limit|abuse/i;

/**
 * Map a failed request onto the retry taxonomy
 */
export function toScanError(error: unknown, now: number = Date.now()): Error {
  if (error instanceof TransientError || error instanceof RateLimitError || error instanceof FatalError) {
    return error;
  }

  const { status, headers } = readHttpFailure(error);
  const message = errorMessage(error);

  if (status === 403 || status === 429) {
    if (headers["x-ratelimit-remaining"] === "0") {
      const reset = parseInt(headers["x-ratelimit-reset"] ?? "", 10);
      const resetAt = isNaN(reset) ? undefined : new Date(reset * 1000);
      return new RateLimitError("GitHub API rate limit exceeded", resetAt);
    }

    const retryAfter = parseInt(headers["retry-after"] ?? "", 10);
    if (!isNaN(retryAfter)) {
      return new RateLimitError("GitHub secondary rate limit triggered", new Date(now + retryAfter * 1000));
    }

    if (SECONDARY_LIMIT_MESSAGE.test(message)) {
      return new RateLimitError("GitHub secondary rate limit triggered");
    }

    if (status === 429) {
      return new RateLimitError("GitHub API rate limit exceeded");
    }
  }

  if (status === undefined || status === 408 || status >= 500) {
    return new TransientError(`Request failed: ${message}`, status, error);
  }

  return new FatalError(`Request rejected: ${message}`, status, error);
}

/**
 * Thin wrapper around Octokit's repository search. Retries are left to
 * the caller; every failure leaves here already classified.
 */
export class GitHubSearchClient implements RepositorySearchApi {
  private octokit: Octokit;
  private requestTimeoutMs: number;
  private logger: Logger;
  private now: () => number;

  constructor(searchConfig: SearchConfig = {}, deps: SearchClientDeps = {}) {
    this.requestTimeoutMs = searchConfig.requestTimeoutMs || config.timeout.httpRequestTimeout;
    this.logger = deps.logger ?? defaultLogger;
    this.now = deps.now ?? Date.now;

    const token = searchConfig.githubToken || process.env.GITHUB_TOKEN;
    if (!token) {
      this.logger.warn("No GitHub token provided. API rate limits will be very restrictive.");
    }

    const octokitLogger = componentLogger("octokit", this.logger);
    this.octokit = new Octokit({
      auth: token,
      baseUrl: searchConfig.baseUrl,
      userAgent: searchConfig.userAgent ?? "repo-health-scanner",
      log: {
        debug: (message: string) => octokitLogger.debug(message),
        info: (message: string) => octokitLogger.info(message),
        warn: (message: string) => octokitLogger.warn(message),
        error: (message: string) => octokitLogger.error(message),
      },
      request: deps.fetch ? { fetch: deps.fetch } : undefined,
    });
  }

  /**
   * Check rate limit status for the search API
   */
  async checkRateLimit(): Promise<RateLimitInfo> {
    try {
      const { data } = await this.octokit.rateLimit.get({
        request: { signal: AbortSignal.timeout(this.requestTimeoutMs) },
      });
      const search = data.resources.search;

      this.logger.info({
        remaining: search.remaining,
        limit: search.limit,
        reset: new Date(search.reset * 1000).toISOString(),
      }, "GitHub API rate limit status");

      return {
        limit: search.limit,
        remaining: search.remaining,
        reset: search.reset,
        used: search.limit - search.remaining,
      };
    } catch (error) {
      this.logger.error({ error: errorMessage(error) }, "Failed to check rate limit");
      throw toScanError(error, this.now());
    }
  }

  /**
   * Fetch one page of repository search results, undecoded
   */
  async searchRepositories(request: SearchPageRequest): Promise<unknown> {
    const { query, page, perPage, sort = "stars", order = "desc", signal } = request;
    const timeout = AbortSignal.timeout(this.requestTimeoutMs);
    this.logger.debug(`Fetching page ${page} with ${perPage} results per page`);

    try {
      const response = await this.octokit.search.repos({
        q: query,
        sort,
        order,
        per_page: perPage,
        page,
        request: { signal: signal ? AbortSignal.any([signal, timeout]) : timeout },
      });
      return response.data;
    } catch (error) {
      if (signal?.aborted) {
        throw new ScanAbortedError("Scan aborted during search request", signal.reason);
      }
      const scanError = toScanError(error, this.now());
      this.logger.debug({ status: readHttpFailure(error).status }, `Search request failed: ${scanError.message}`);
      throw scanError;
    }
  }
}
