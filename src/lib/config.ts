/**
 * Centralized configuration for retries, timeouts, scanning and health thresholds
 */

import { logger } from "./logger";

/**
 * Parse an environment variable as a number with a default value
 */
export function parseEnvNumber(envVar: string | undefined, defaultValue: number): number {
  if (!envVar) return defaultValue;
  const parsed = parseInt(envVar, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

// Hard ceiling on attempts per logical request
export const MAX_ATTEMPTS_CEILING = 3;

// GitHub search returns at most 100 items per page
export const MAX_PAGE_SIZE = 100;

/**
 * Retry configuration
 */
export const retryConfig = {
  // Total attempts per request, including the first one
  maxAttempts: Math.min(
    Math.max(parseEnvNumber(process.env.MAX_RETRIES, MAX_ATTEMPTS_CEILING), 1),
    MAX_ATTEMPTS_CEILING
  ),

  // Base delay for exponential backoff in milliseconds
  baseDelay: parseEnvNumber(process.env.RETRY_BASE_DELAY, 1000),

  // Maximum backoff delay in milliseconds
  maxRetryDelay: parseEnvNumber(process.env.MAX_RETRY_DELAY, 90000),

  // Wait used when a rate limit response carries no reset time
  rateLimitFallbackDelay: parseEnvNumber(process.env.RATE_LIMIT_FALLBACK_DELAY, 60000),

  // Upper bound on any single rate limit wait
  maxRateLimitWait: parseEnvNumber(process.env.MAX_RATE_LIMIT_WAIT, 15 * 60 * 1000),
};

/**
 * Timeout configuration
 */
export const timeoutConfig = {
  // HTTP request timeout in milliseconds
  httpRequestTimeout: parseEnvNumber(process.env.HTTP_REQUEST_TIMEOUT, 30000),

  // Whole scan timeout in milliseconds, 0 disables it
  scanTimeout: parseEnvNumber(process.env.SCAN_TIMEOUT, 0),
};

/**
 * Scan configuration
 */
export const scanConfig = {
  pageSize: Math.min(Math.max(parseEnvNumber(process.env.PAGE_SIZE, MAX_PAGE_SIZE), 1), MAX_PAGE_SIZE),
  maxRecords: parseEnvNumber(process.env.MAX_REPOS, 100),
  defaultQuery: process.env.SEARCH_QUERY || "stars:>100",
};

/**
 * Health classification thresholds
 */
export const healthConfig = {
  outdatedThresholdDays: parseEnvNumber(process.env.OUTDATED_THRESHOLD_DAYS, 365),
  brokenIssuesThreshold: parseEnvNumber(process.env.BROKEN_ISSUES_THRESHOLD, 10),
  brokenThresholdDays: parseEnvNumber(process.env.BROKEN_THRESHOLD_DAYS, 180),
};

/**
 * Get all configuration as a single object
 */
export const config = {
  retry: retryConfig,
  timeout: timeoutConfig,
  scan: scanConfig,
  health: healthConfig,
};

logger.debug({ config }, "Loaded configuration");

export default config;
