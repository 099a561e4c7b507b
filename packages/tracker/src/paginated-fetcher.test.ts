import { describe, it, expect, vi } from 'vitest'
import { PaginatedFetcher, clampPageSize, type FetchProgress, type FetchState } from './paginated-fetcher.js'
import type { SearchRequest, SearchTransport } from './search-client.js'
import type { RawIssue, SearchResponse } from './issue.js'
import { TokenBucket } from './rate-limiter.js'
import { CancellationSource } from './cancellation.js'
import { CancelledError, TrackerApiError } from './errors.js'

function makeIssues(count: number): RawIssue[] {
  return Array.from({ length: count }, (_, i) => ({ key: `PROJ-${i + 1}`, fields: {} }))
}

/**
 * Serves slices of a fixed record set; `failures` maps a 1-based request
 * number to the error that request throws.
 */
class FakeTransport implements SearchTransport {
  readonly requests: SearchRequest[] = []

  constructor(
    private readonly records: RawIssue[],
    private readonly failures: Map<number, Error> = new Map()
  ) {}

  async search(request: SearchRequest): Promise<SearchResponse> {
    this.requests.push(request)
    const failure = this.failures.get(this.requests.length)
    if (failure) throw failure
    return {
      startAt: request.startAt,
      maxResults: request.maxResults,
      total: this.records.length,
      issues: this.records.slice(request.startAt, request.startAt + request.maxResults),
    }
  }
}

const FAST_RETRY = { initialDelayMs: 1, maxDelayMs: 1 }

describe('clampPageSize', () => {
  it('bounds the page size to the per-call maximum', () => {
    expect(clampPageSize(undefined)).toBe(1000)
    expect(clampPageSize(5000)).toBe(1000)
    expect(clampPageSize(0)).toBe(1)
    expect(clampPageSize(250.7)).toBe(250)
  })
})

describe('PaginatedFetcher', () => {
  // ========================================================================
  // Page iteration
  // ========================================================================

  it('fetches 250 records in a single page', async () => {
    const transport = new FakeTransport(makeIssues(250))
    const fetcher = new PaginatedFetcher({ transport })

    const result = await fetcher.fetchAll({ jql: 'project = X', pageSize: 1000 })

    expect(result.status).toBe('done')
    expect(result.issues).toHaveLength(250)
    expect(result.pages).toBe(1)
    expect(result.total).toBe(250)
    expect(transport.requests).toHaveLength(1)
    expect(transport.requests[0]).toMatchObject({ jql: 'project = X', startAt: 0, maxResults: 1000 })
  })

  it('walks offsets until the reported total is reached', async () => {
    const transport = new FakeTransport(makeIssues(2500))
    const fetcher = new PaginatedFetcher({ transport })

    const result = await fetcher.fetchAll({ jql: 'project = X' })

    expect(result.issues).toHaveLength(2500)
    expect(transport.requests.map((r) => r.startAt)).toEqual([0, 1000, 2000])
  })

  it('stops on a full last page when startAt + returned reaches the total', async () => {
    const transport = new FakeTransport(makeIssues(200))
    const fetcher = new PaginatedFetcher({ transport })

    const result = await fetcher.fetchAll({ jql: 'project = X', pageSize: 100 })

    expect(result.issues).toHaveLength(200)
    expect(transport.requests).toHaveLength(2)
  })

  it('never requests more than the per-call maximum', async () => {
    const transport = new FakeTransport(makeIssues(10))
    const fetcher = new PaginatedFetcher({ transport })

    await fetcher.fetchAll({ jql: 'project = X', pageSize: 5000 })

    expect(transport.requests[0].maxResults).toBe(1000)
  })

  it('honors a hard limit', async () => {
    const transport = new FakeTransport(makeIssues(500))
    const fetcher = new PaginatedFetcher({ transport })

    const result = await fetcher.fetchAll({ jql: 'project = X', pageSize: 100, limit: 250 })

    expect(result.status).toBe('done')
    expect(result.issues).toHaveLength(250)
    expect(transport.requests.map((r) => r.maxResults)).toEqual([100, 100, 50])
  })

  it('passes fields and expand through', async () => {
    const transport = new FakeTransport(makeIssues(1))
    const fetcher = new PaginatedFetcher({ transport })

    await fetcher.fetchAll({ jql: 'project = X', fields: ['key', 'status'], expand: ['changelog'] })

    expect(transport.requests[0]).toMatchObject({ fields: ['key', 'status'], expand: ['changelog'] })
  })

  // ========================================================================
  // Progress & state
  // ========================================================================

  it('reports progress after every page', async () => {
    const progress: FetchProgress[] = []
    const fetcher = new PaginatedFetcher({
      transport: new FakeTransport(makeIssues(250)),
      onProgress: (p) => {
        progress.push(p)
      },
    })

    await fetcher.fetchAll({ jql: 'project = X', pageSize: 100 })

    expect(progress).toEqual([
      { fetched: 100, total: 250, page: 1 },
      { fetched: 200, total: 250, page: 2 },
      { fetched: 250, total: 250, page: 3 },
    ])
  })

  it('walks the state machine', async () => {
    const states: FetchState[] = []
    const fetcher = new PaginatedFetcher({
      transport: new FakeTransport(makeIssues(3)),
      onStateChange: (state) => states.push(state),
    })

    await fetcher.fetchAll({ jql: 'project = X' })

    expect(states).toEqual(['idle', 'requesting', 'page_received', 'done'])
    expect(fetcher.state).toBe('done')
  })

  it('keeps going when the progress callback throws', async () => {
    const fetcher = new PaginatedFetcher({
      transport: new FakeTransport(makeIssues(150)),
      onProgress: () => {
        throw new Error('progress store unavailable')
      },
    })

    const result = await fetcher.fetchAll({ jql: 'project = X', pageSize: 100 })

    expect(result.status).toBe('done')
    expect(result.issues).toHaveLength(150)
  })

  // ========================================================================
  // Failures
  // ========================================================================

  it('returns partial results when a page is rejected', async () => {
    const transport = new FakeTransport(
      makeIssues(300),
      new Map([[2, new TrackerApiError('bad request', 400)]])
    )
    const fetcher = new PaginatedFetcher({ transport, retry: FAST_RETRY })

    const result = await fetcher.fetchAll({ jql: 'project = X', pageSize: 100 })

    expect(result.status).toBe('failed')
    expect(result.issues).toHaveLength(100)
    expect(result.error).toBeInstanceOf(TrackerApiError)
    expect(transport.requests).toHaveLength(2)
  })

  it('retries transient page failures', async () => {
    const transport = new FakeTransport(
      makeIssues(300),
      new Map([[2, new TrackerApiError('unavailable', 503)]])
    )
    const fetcher = new PaginatedFetcher({ transport, retry: FAST_RETRY })

    const result = await fetcher.fetchAll({ jql: 'project = X', pageSize: 100 })

    expect(result.status).toBe('done')
    expect(result.issues).toHaveLength(300)
    expect(transport.requests.map((r) => r.startAt)).toEqual([0, 100, 100, 200])
  })

  it('fails with partial results once retries are exhausted', async () => {
    const failures = new Map<number, Error>()
    for (let n = 2; n <= 4; n++) failures.set(n, new TrackerApiError('unavailable', 502))
    const transport = new FakeTransport(makeIssues(300), failures)
    const fetcher = new PaginatedFetcher({ transport, retry: { ...FAST_RETRY, maxAttempts: 3 } })

    const result = await fetcher.fetchAll({ jql: 'project = X', pageSize: 100 })

    expect(result.status).toBe('failed')
    expect(result.issues).toHaveLength(100)
    expect(transport.requests).toHaveLength(4)
  })

  // ========================================================================
  // Cancellation
  // ========================================================================

  it('stops after the in-flight page when cancelled mid-pagination', async () => {
    const transport = new FakeTransport(makeIssues(500))
    const source = new CancellationSource()
    const fetcher = new PaginatedFetcher({
      transport,
      onProgress: ({ page }) => {
        if (page === 2) source.cancel()
      },
    })

    const result = await fetcher.fetchAll({ jql: 'project = X', pageSize: 100 }, source)

    expect(result.status).toBe('cancelled')
    expect(result.issues).toHaveLength(200)
    expect(result.error).toBeInstanceOf(CancelledError)
    expect(transport.requests).toHaveLength(2)
    expect(fetcher.state).toBe('cancelled')
  })

  it('does not issue a request when already cancelled', async () => {
    const transport = new FakeTransport(makeIssues(10))
    const source = new CancellationSource()
    source.cancel()
    const fetcher = new PaginatedFetcher({ transport })

    const result = await fetcher.fetchAll({ jql: 'project = X' }, source)

    expect(result).toMatchObject({ status: 'cancelled', issues: [], total: null, pages: 0 })
    expect(transport.requests).toHaveLength(0)
  })

  // ========================================================================
  // Rate limiting & counting
  // ========================================================================

  it('takes one token per request from the shared bucket', async () => {
    const rateLimiter = new TokenBucket({ maxTokens: 10, refillRate: 1 })
    const fetcher = new PaginatedFetcher({ transport: new FakeTransport(makeIssues(300)), rateLimiter })

    await fetcher.fetchAll({ jql: 'project = X', pageSize: 100 })

    expect(rateLimiter.availableTokens).toBe(7)
  })

  it('penalizes the bucket when the tracker sends Retry-After', async () => {
    vi.useFakeTimers()
    try {
      const rateLimiter = new TokenBucket({ maxTokens: 10, refillRate: 1 })
      const penalize = vi.spyOn(rateLimiter, 'penalize')
      const transport = new FakeTransport(
        makeIssues(5),
        new Map([[1, new TrackerApiError('slow down', 429, undefined, 2000)]])
      )
      const fetcher = new PaginatedFetcher({ transport, rateLimiter })

      const promise = fetcher.fetchAll({ jql: 'project = X' })
      await vi.runAllTimersAsync()
      const result = await promise

      expect(penalize).toHaveBeenCalledWith(2)
      expect(result.status).toBe('done')
      expect(result.issues).toHaveLength(5)
    } finally {
      vi.useRealTimers()
    }
  })

  it('counts matches with a zero-size request', async () => {
    const transport = new FakeTransport(makeIssues(250))
    const fetcher = new PaginatedFetcher({ transport })

    const outcome = await fetcher.countMatches('project = X')

    expect(outcome).toEqual({ success: true, result: 250, attempts: 1 })
    expect(transport.requests[0]).toMatchObject({ startAt: 0, maxResults: 0 })
  })
})
