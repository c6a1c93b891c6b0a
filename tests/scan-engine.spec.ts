import { ScanEngine, createScanRequest } from '../src/lib/scan-engine';
import { PageFetcher, type RepositorySearchApi } from '../src/lib/github';
import { RetryController } from '../src/lib/retry/retry-controller';
import { FatalError, RetryExhaustedError, ScanAbortedError, TransientError } from '../src/lib/errors';
import type { SearchPageRequest } from '../src/types/github';
import { FakeSearchApi, makeItem, recordingSleep, silentLogger } from './helpers';

function engineFor(api: RepositorySearchApi, signal?: AbortSignal) {
  const recorder = recordingSleep();
  const retry = new RetryController({ baseDelayMs: 10, sleep: recorder.sleep, logger: silentLogger, signal });
  return new ScanEngine(new PageFetcher(api, retry, silentLogger), silentLogger);
}

describe('ScanEngine', () => {
  it('stops at the reported total without requesting a third page', async () => {
    const api = new FakeSearchApi(180);

    const result = await engineFor(api).scan(createScanRequest('stars:>100', 250, 100));

    expect(result.records).toHaveLength(180);
    expect(result.totalCount).toBe(180);
    expect(result.partial).toBe(false);
    expect(result.pagesFetched).toBe(2);
    expect(api.requests.map((r) => r.page)).toEqual([1, 2]);
  });

  it('truncates the final page at the maximum record count', async () => {
    const api = new FakeSearchApi(1_000);

    const result = await engineFor(api).scan(createScanRequest('q', 150, 100));

    expect(result.records).toHaveLength(150);
    expect(result.records[149]?.fullName).toBe('owner150/repo150');
    expect(api.requests).toHaveLength(2);
  });

  it('fetches a single page when it already satisfies the request', async () => {
    const api = new FakeSearchApi(1_000);

    const result = await engineFor(api).scan(createScanRequest('q', 100, 100));

    expect(result.records).toHaveLength(100);
    expect(api.requests).toHaveLength(1);
  });

  it('preserves fetch order across pages', async () => {
    const api = new FakeSearchApi(7);

    const result = await engineFor(api).scan(createScanRequest('q', 10, 3));

    expect(result.records.map((r) => r.fullName)).toEqual([
      'owner1/repo1',
      'owner2/repo2',
      'owner3/repo3',
      'owner4/repo4',
      'owner5/repo5',
      'owner6/repo6',
      'owner7/repo7',
    ]);
    expect(api.requests.map((r) => r.page)).toEqual([1, 2, 3]);
  });

  it('passes the requested ordering through to every page', async () => {
    const api = new FakeSearchApi(4);

    await engineFor(api).scan(createScanRequest('q', 4, 2, { sort: 'updated', order: 'asc' }));

    expect(api.requests.map((r) => [r.sort, r.order])).toEqual([
      ['updated', 'asc'],
      ['updated', 'asc'],
    ]);
  });

  it('returns an empty, complete result when nothing matches', async () => {
    const api = new FakeSearchApi(0);

    const result = await engineFor(api).scan(createScanRequest('q', 50, 100));

    expect(result).toEqual({ records: [], totalCount: 0, pagesFetched: 1, partial: false });
  });

  it('never returns more records than the reported total', async () => {
    const api: RepositorySearchApi = {
      searchRepositories: async () => ({
        total_count: 2,
        items: [makeItem(1), makeItem(2), makeItem(3)],
      }),
    };

    const result = await engineFor(api).scan(createScanRequest('q', 10, 3));

    expect(result.records.map((r) => r.fullName)).toEqual(['owner1/repo1', 'owner2/repo2']);
  });

  it('keeps collected records when a later page fails fatally', async () => {
    const api = new FakeSearchApi(500);
    const serve = api.searchRepositories.bind(api);
    jest.spyOn(api, 'searchRepositories').mockImplementation(async (request: SearchPageRequest) => {
      if (request.page === 2) {
        throw new FatalError('Request rejected: Validation Failed', 422);
      }
      return serve(request);
    });

    const result = await engineFor(api).scan(createScanRequest('q', 300, 100));

    expect(result.partial).toBe(true);
    expect(result.records).toHaveLength(100);
    expect(result.pagesFetched).toBe(1);
    expect(result.failure).toBeInstanceOf(FatalError);
  });

  it('keeps collected records when retries run out', async () => {
    const api = new FakeSearchApi(500);
    const serve = api.searchRepositories.bind(api);
    jest.spyOn(api, 'searchRepositories').mockImplementation(async (request: SearchPageRequest) => {
      if (request.page === 3) {
        throw new TransientError('Request failed: Bad Gateway', 502);
      }
      return serve(request);
    });

    const result = await engineFor(api).scan(createScanRequest('q', 300, 100));

    expect(result.partial).toBe(true);
    expect(result.records).toHaveLength(200);
    expect(result.failure).toBeInstanceOf(RetryExhaustedError);
    // three attempts at page 3 after one request each for pages 1 and 2
    expect(api.searchRepositories).toHaveBeenCalledTimes(5);
  });

  it('propagates an abort instead of returning a partial result', async () => {
    const abort = new AbortController();
    abort.abort();

    await expect(engineFor(new FakeSearchApi(10), abort.signal).scan(createScanRequest('q', 5, 5))).rejects.toBeInstanceOf(
      ScanAbortedError
    );
  });
});

describe('createScanRequest', () => {
  it('builds a frozen request', () => {
    const request = createScanRequest('language:go', 25, 10);
    expect(request).toEqual({ query: 'language:go', maxRecords: 25, pageSize: 10 });
    expect(Object.isFrozen(request)).toBe(true);
  });

  it('rejects values the search API cannot serve', () => {
    expect(() => createScanRequest('  ', 10)).toThrow(FatalError);
    expect(() => createScanRequest('q', 0)).toThrow('Maximum record count must be a positive integer, got 0');
    expect(() => createScanRequest('q', 2.5)).toThrow(FatalError);
    expect(() => createScanRequest('q', 10, 101)).toThrow('Page size must be an integer between 1 and 100, got 101');
  });
});
