import { logger as defaultLogger, type Logger } from "./logger";
import { MAX_PAGE_SIZE } from "./config";
import { FatalError, RetryExhaustedError } from "./errors";
import type { PageFetcher } from "./github/page-fetcher";
import type { RawRepositoryRecord, ScanRequest } from "../types/github";

export interface ScanResult {
  records: RawRepositoryRecord[];
  totalCount: number;
  pagesFetched: number;
  partial: boolean;
  failure?: FatalError | RetryExhaustedError;
}

/**
 * Build a frozen scan request, rejecting values the search API cannot serve
 */
export function createScanRequest(
  query: string,
  maxRecords: number,
  pageSize: number = MAX_PAGE_SIZE,
  ordering: Pick<ScanRequest, "sort" | "order"> = {}
): ScanRequest {
  if (!query.trim()) {
    throw new FatalError("Search query must not be empty");
  }
  if (!Number.isInteger(maxRecords) || maxRecords < 1) {
    throw new FatalError(`Maximum record count must be a positive integer, got ${maxRecords}`);
  }
  if (!Number.isInteger(pageSize) || pageSize < 1 || pageSize > MAX_PAGE_SIZE) {
    throw new FatalError(`Page size must be an integer between 1 and ${MAX_PAGE_SIZE}, got ${pageSize}`);
  }

  return Object.freeze({ query, maxRecords, pageSize, ...ordering });
}

/**
 * Drives the page fetcher sequentially until the requested number of
 * records is collected or the result set runs out.
 */
export class ScanEngine {
  private readonly logger: Logger;

  constructor(private readonly fetcher: PageFetcher, logger?: Logger) {
    this.logger = logger ?? defaultLogger;
  }

  async scan(request: ScanRequest): Promise<ScanResult> {
    const startTime = Date.now();
    const records: RawRepositoryRecord[] = [];
    let totalCount = 0;
    let page = 1;
    let pagesFetched = 0;

    this.logger.info({ query: request.query, maxRecords: request.maxRecords }, "Starting repository scan");

    while (records.length < request.maxRecords) {
      const result = await this.fetcher.fetch(request.query, page, request.pageSize, {
        sort: request.sort,
        order: request.order,
      });

      if (!result.ok) {
        this.logger.warn(
          `Scan stopped at page ${page} after collecting ${records.length} repositories: ${result.error.message}`
        );
        return { records, totalCount, pagesFetched, partial: true, failure: result.error };
      }

      pagesFetched++;
      const { items, hasNextPage } = result.value;
      totalCount = result.value.totalCount;

      const limit = Math.min(request.maxRecords, totalCount);
      for (const item of items) {
        if (records.length >= limit) break;
        records.push(item);
      }

      if (!hasNextPage || items.length === 0 || records.length >= limit) {
        break;
      }
      page++;
    }

    const elapsed = Date.now() - startTime;
    this.logger.info(`Scan completed in ${elapsed}ms, collected ${records.length} repositories over ${pagesFetched} pages`);

    return { records, totalCount, pagesFetched, partial: false };
  }
}
