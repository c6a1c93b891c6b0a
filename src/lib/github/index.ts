export { GitHubSearchClient, toScanError, type RepositorySearchApi, type SearchClientDeps } from "./search-client";
export { PageFetcher, decodeSearchPage, SEARCH_RESULT_CAP, type SearchOrdering } from "./page-fetcher";
export type { RawRepositoryRecord, ClassifiedRepositoryRecord, PageResult, RateLimitInfo } from "../../types/github";
