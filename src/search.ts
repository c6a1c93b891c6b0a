import { GitHubSearchClient, PageFetcher, type RepositorySearchApi } from "./lib/github";
import { RetryController, type RetryOptions } from "./lib/retry/retry-controller";
import { ScanEngine, createScanRequest, type ScanResult } from "./lib/scan-engine";
import { assembleReport, summarizeReport, type ReportSummary } from "./lib/report";
import { configuredThresholds } from "./lib/health-classifier";
import { config } from "./lib/config";
import { componentLogger, logger as defaultLogger, type Logger } from "./lib/logger";
import type {
  ClassifiedRepositoryRecord,
  HealthThresholds,
  SearchConfig,
  SearchOrder,
  SearchSort,
} from "./types/github";

export interface CheckOptions {
  maxRecords?: number;
  pageSize?: number;
  sort?: SearchSort;
  order?: SearchOrder;
  thresholds?: HealthThresholds;
  retry?: RetryOptions;
  search?: SearchConfig;
  signal?: AbortSignal;
  // Clock used for classification, read once per run
  now?: () => Date;
  api?: RepositorySearchApi;
  logger?: Logger;
}

export interface CheckResult {
  report: ClassifiedRepositoryRecord[];
  summary: ReportSummary;
  scan: ScanResult;
  checkedAt: Date;
}

/**
 * Wire a scan engine over the given search API (GitHub by default)
 */
export function createScanEngine(options: CheckOptions = {}): ScanEngine {
  const log = options.logger ?? defaultLogger;
  const api = options.api ?? new GitHubSearchClient(options.search, { logger: componentLogger("search-client", log) });
  const retry = new RetryController({
    logger: componentLogger("retry", log),
    signal: options.signal,
    ...options.retry,
  });
  const fetcher = new PageFetcher(api, retry, componentLogger("page-fetcher", log));
  return new ScanEngine(fetcher, componentLogger("scan", log));
}

/**
 * Scan repositories matching the query and classify their health
 */
export async function checkRepositories(query: string, options: CheckOptions = {}): Promise<CheckResult> {
  const request = createScanRequest(
    query,
    options.maxRecords ?? config.scan.maxRecords,
    options.pageSize ?? config.scan.pageSize,
    { sort: options.sort ?? "stars", order: options.order ?? "desc" }
  );

  const scan = await createScanEngine(options).scan(request);

  const checkedAt = options.now ? options.now() : new Date();
  const report = assembleReport(scan.records, checkedAt, options.thresholds ?? configuredThresholds());

  return { report, summary: summarizeReport(report), scan, checkedAt };
}
