import { createLogger } from '../src/lib/logger';
import type { RepositorySearchApi } from '../src/lib/github';
import type { Sleep } from '../src/lib/retry/retry-controller';
import type { SearchPageRequest } from '../src/types/github';

export const silentLogger = createLogger('silent', false);

export const NOW = new Date('2026-06-01T00:00:00Z');

export function daysAgo(days: number, from: Date = NOW): string {
  return new Date(from.getTime() - days * 24 * 60 * 60 * 1000).toISOString();
}

export interface ItemOverrides {
  full_name?: string;
  description?: string | null;
  stargazers_count?: number;
  open_issues_count?: number;
  pushed_at?: string | null;
  created_at?: string;
}

export function makeItem(index: number, overrides: ItemOverrides = {}) {
  const fullName = overrides.full_name ?? `owner${index}/repo${index}`;
  return {
    full_name: fullName,
    html_url: `https://github.com/${fullName}`,
    description: overrides.description === undefined ? `Repository ${index}` : overrides.description,
    stargazers_count: overrides.stargazers_count ?? 1000 - index,
    open_issues_count: overrides.open_issues_count ?? 0,
    pushed_at: overrides.pushed_at === undefined ? daysAgo(10) : overrides.pushed_at,
    created_at: overrides.created_at ?? '2020-01-01T00:00:00Z',
  };
}

/**
 * In-memory search API serving `total` generated items, page by page.
 * Steps queued with `failNext` are consumed before serving real pages.
 */
export class FakeSearchApi implements RepositorySearchApi {
  readonly requests: SearchPageRequest[] = [];
  private readonly failures: unknown[] = [];
  private readonly pageFailures = new Map<number, unknown>();

  constructor(private readonly total: number, private readonly cap: number = 1000) {}

  failNext(...errors: unknown[]): this {
    this.failures.push(...errors);
    return this;
  }

  failOnPage(page: number, error: unknown): this {
    this.pageFailures.set(page, error);
    return this;
  }

  async searchRepositories(request: SearchPageRequest): Promise<unknown> {
    this.requests.push(request);
    if (this.failures.length > 0) {
      throw this.failures.shift();
    }
    if (this.pageFailures.has(request.page)) {
      throw this.pageFailures.get(request.page);
    }

    const start = (request.page - 1) * request.perPage;
    const end = Math.min(start + request.perPage, this.total, this.cap);
    const items: ReturnType<typeof makeItem>[] = [];
    for (let i = start; i < end; i++) {
      items.push(makeItem(i + 1));
    }
    return { total_count: this.total, incomplete_results: false, items };
  }
}

export function recordingSleep(): { sleep: Sleep; delays: number[] } {
  const delays: number[] = [];
  const sleep: Sleep = async (ms) => {
    delays.push(ms);
  };
  return { sleep, delays };
}
