import { z } from "zod";
import { logger as defaultLogger, type Logger } from "../logger";
import { FatalError } from "../errors";
import { RetryController, type RetryResult } from "../retry/retry-controller";
import type { RepositorySearchApi } from "./search-client";
import type { PageResult, RawRepositoryRecord, SearchOrder, SearchSort } from "../../types/github";

// GitHub only serves the first 1000 results of any search
export const SEARCH_RESULT_CAP = 1000;

const repositoryItemSchema = z.object({
  full_name: z.string().min(1),
  html_url: z.string().min(1),
  description: z.string().nullable().optional(),
  stargazers_count: z.number().int().nonnegative(),
  open_issues_count: z.number().int().nonnegative(),
  pushed_at: z.string().nullable(),
  created_at: z.string(),
});

export const searchEnvelopeSchema = z.object({
  total_count: z.number().int().nonnegative(),
  incomplete_results: z.boolean().optional().default(false),
  items: z.array(repositoryItemSchema),
});

export type RepositoryItem = z.infer<typeof repositoryItemSchema>;

export function toRawRecord(item: RepositoryItem): RawRepositoryRecord {
  return Object.freeze({
    fullName: item.full_name,
    url: item.html_url,
    description: item.description ?? null,
    stars: item.stargazers_count,
    openIssues: item.open_issues_count,
    pushedAt: item.pushed_at,
    createdAt: item.created_at,
  });
}

/**
 * Decode a search response body into a page result
 */
export function decodeSearchPage(body: unknown, page: number, pageSize: number): PageResult {
  const parsed = searchEnvelopeSchema.safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join(".") || "<root>"}: ${issue.message}` : "unknown shape";
    throw new FatalError(`Malformed search response on page ${page} (${where})`);
  }

  const { total_count, incomplete_results, items } = parsed.data;
  const reachable = Math.min(total_count, SEARCH_RESULT_CAP);

  return {
    items: items.map(toRawRecord),
    totalCount: total_count,
    hasNextPage: items.length === pageSize && page * pageSize < reachable,
    incompleteResults: incomplete_results,
  };
}

export interface SearchOrdering {
  sort?: SearchSort;
  order?: SearchOrder;
}

/**
 * Fetches and decodes single search pages through the retry controller
 */
export class PageFetcher {
  private readonly logger: Logger;

  constructor(
    private readonly api: RepositorySearchApi,
    private readonly retry: RetryController,
    logger?: Logger
  ) {
    this.logger = logger ?? defaultLogger;
  }

  async fetch(
    query: string,
    page: number,
    pageSize: number,
    ordering: SearchOrdering = {}
  ): Promise<RetryResult<PageResult>> {
    const result = await this.retry.execute(async () => {
      const body = await this.api.searchRepositories({
        query,
        page,
        perPage: pageSize,
        sort: ordering.sort,
        order: ordering.order,
        signal: this.retry.signal,
      });
      return decodeSearchPage(body, page, pageSize);
    });

    if (result.ok) {
      this.logger.info(
        `Found ${result.value.totalCount} total results, fetched ${result.value.items.length} on page ${page}`
      );
      if (result.value.incompleteResults) {
        this.logger.warn(`GitHub reported incomplete results for page ${page}`);
      }
    }

    return result;
  }
}
