/**
 * Type definitions for repository search and health reporting
 */

export interface SearchConfig {
  githubToken?: string;
  requestTimeoutMs?: number;
  baseUrl?: string;
  userAgent?: string;
}

export type SearchSort = "stars" | "forks" | "updated" | "help-wanted-issues";
export type SearchOrder = "asc" | "desc";

/**
 * Repository metadata as decoded from a search result item
 */
export interface RawRepositoryRecord {
  readonly fullName: string;
  readonly url: string;
  readonly description: string | null;
  readonly stars: number;
  readonly openIssues: number;
  readonly pushedAt: string | null;
  readonly createdAt: string;
}

/**
 * Externally visible record, one per scanned repository
 */
export interface ClassifiedRepositoryRecord {
  name: string;
  url: string;
  description: string | null;
  stars: number;
  open_issues: number;
  last_push: string | null;
  created_at: string;
  is_outdated: boolean;
  is_broken: boolean;
}

export interface ScanRequest {
  readonly query: string;
  readonly maxRecords: number;
  readonly pageSize: number;
  readonly sort?: SearchSort;
  readonly order?: SearchOrder;
}

export interface SearchPageRequest {
  query: string;
  page: number;
  perPage: number;
  sort?: SearchSort;
  order?: SearchOrder;
  signal?: AbortSignal;
}

export interface PageResult {
  items: RawRepositoryRecord[];
  totalCount: number;
  hasNextPage: boolean;
  incompleteResults: boolean;
}

export interface HealthThresholds {
  outdatedThresholdDays: number;
  brokenIssuesThreshold: number;
  brokenThresholdDays: number;
}

export interface HealthFlags {
  is_outdated: boolean;
  is_broken: boolean;
}

export interface RateLimitInfo {
  limit: number;
  remaining: number;
  reset: number;
  used: number;
}
