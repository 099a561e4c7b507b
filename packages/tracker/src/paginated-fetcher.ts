/**
 * Paginated Fetcher
 *
 * Drives offset-based pagination against the search endpoint:
 *
 *   idle → requesting → (page_received → requesting)* → done | failed | cancelled
 *
 * Every request first takes a token from the shared bucket and goes through
 * the retry executor. The cancellation token is polled before each request;
 * an in-flight request always finishes. Whatever was fetched before a
 * failure or cancellation is handed back with the terminal status so the
 * caller decides whether to use it.
 */

import type { CancellationToken } from './cancellation.js'
import { CancelledError, describeError, isRetryableError } from './errors.js'
import type { RawIssue, SearchResponse } from './issue.js'
import { createLogger, type Logger } from './logger.js'
import { extractRetryAfterMs, type TokenBucket } from './rate-limiter.js'
import { executeWithRetry, type RetryConfig, type RetryOutcome } from './retry.js'
import { MAX_PAGE_SIZE, type SearchRequest, type SearchTransport } from './search-client.js'

// ── Types ──────────────────────────────────────────────────────────────────

export type FetchState =
  | 'idle'
  | 'requesting'
  | 'page_received'
  | 'done'
  | 'failed'
  | 'cancelled'

export type TerminalFetchState = Extract<FetchState, 'done' | 'failed' | 'cancelled'>

export interface PaginatedQuery {
  jql: string
  fields?: string[]
  expand?: string[]
  /** Records per request, clamped to [1, 1000] (default: 1000) */
  pageSize?: number
  /** Stop once this many records have been collected */
  limit?: number
}

export interface FetchProgress {
  /** Records collected so far */
  fetched: number
  /** Total reported by the first page */
  total: number
  /** Pages received so far */
  page: number
}

export interface PaginatedResult {
  status: TerminalFetchState
  issues: RawIssue[]
  /** Total reported by the server, null if no page arrived */
  total: number | null
  pages: number
  error?: Error
}

export interface PaginatedFetcherOptions {
  transport: SearchTransport
  /** Shared bucket; every request takes one token */
  rateLimiter?: TokenBucket
  retry?: RetryConfig
  logger?: Logger
  onProgress?: (progress: FetchProgress) => void | Promise<void>
  onStateChange?: (state: FetchState) => void
}

// ── Implementation ─────────────────────────────────────────────────────────

export function clampPageSize(pageSize: number | undefined): number {
  if (pageSize === undefined || !Number.isFinite(pageSize)) return MAX_PAGE_SIZE
  return Math.min(MAX_PAGE_SIZE, Math.max(1, Math.floor(pageSize)))
}

export class PaginatedFetcher {
  private readonly transport: SearchTransport
  private readonly rateLimiter?: TokenBucket
  private readonly retry?: RetryConfig
  private readonly log: Logger
  private readonly onProgress?: (progress: FetchProgress) => void | Promise<void>
  private readonly onStateChange?: (state: FetchState) => void
  private _state: FetchState = 'idle'

  constructor(options: PaginatedFetcherOptions) {
    this.transport = options.transport
    this.rateLimiter = options.rateLimiter
    this.retry = options.retry
    this.log = options.logger ?? createLogger('paginated-fetcher')
    this.onProgress = options.onProgress
    this.onStateChange = options.onStateChange
  }

  get state(): FetchState {
    return this._state
  }

  private transition(next: FetchState): void {
    this._state = next
    this.onStateChange?.(next)
  }

  /**
   * Fetch every page of a query.
   */
  async fetchAll(
    query: PaginatedQuery,
    cancellation?: CancellationToken
  ): Promise<PaginatedResult> {
    const pageSize = clampPageSize(query.pageSize)
    const limit = query.limit !== undefined && query.limit > 0 ? query.limit : undefined
    const issues: RawIssue[] = []
    let total: number | null = null
    let pages = 0
    let startAt = 0

    this.transition('idle')

    const finish = (status: TerminalFetchState, error?: Error): PaginatedResult => {
      this.transition(status)
      return { status, issues, total, pages, ...(error ? { error } : {}) }
    }

    for (;;) {
      if (cancellation && (await cancellation.isCancelled())) {
        this.log.info('Fetch cancelled', { fetched: issues.length, page: pages })
        return finish('cancelled', new CancelledError())
      }

      const remaining = limit !== undefined ? limit - issues.length : pageSize
      const maxResults = Math.min(pageSize, remaining)

      this.transition('requesting')
      const outcome = await this.request(
        {
          jql: query.jql,
          startAt,
          maxResults,
          ...(query.fields ? { fields: query.fields } : {}),
          ...(query.expand ? { expand: query.expand } : {}),
        },
        cancellation
      )

      if (!outcome.success) {
        if (outcome.error instanceof CancelledError) {
          return finish('cancelled', outcome.error)
        }
        this.log.error('Page request failed', {
          page: pages + 1,
          startAt,
          attempts: outcome.attempts,
          fetched: issues.length,
          error: outcome.error,
        })
        return finish('failed', outcome.error)
      }

      const page = outcome.result
      pages++
      if (total === null) {
        total = page.total
      }
      issues.push(...page.issues)
      this.transition('page_received')

      this.log.debug('Page received', {
        page: pages,
        startAt,
        returned: page.issues.length,
        total,
      })

      const progressTotal = limit !== undefined ? Math.min(total, limit) : total
      try {
        await this.onProgress?.({ fetched: issues.length, total: progressTotal, page: pages })
      } catch (error) {
        this.log.warn('Progress callback failed', { error })
      }

      const returned = page.issues.length
      if (returned < maxResults) break
      if (startAt + returned >= total) break
      if (limit !== undefined && issues.length >= limit) break

      startAt += returned
    }

    this.log.info('Fetch complete', { fetched: issues.length, total, pages })
    return finish('done')
  }

  /**
   * Ask only for the number of matching records (maxResults = 0).
   */
  async countMatches(jql: string, cancellation?: CancellationToken): Promise<RetryOutcome<number>> {
    const outcome = await this.request({ jql, startAt: 0, maxResults: 0, fields: ['key'] }, cancellation)
    if (!outcome.success) {
      this.log.warn('Count request failed', { error: describeError(outcome.error) })
      return outcome
    }
    return { success: true, result: outcome.result.total, attempts: outcome.attempts }
  }

  private async request(
    request: SearchRequest,
    cancellation?: CancellationToken
  ): Promise<RetryOutcome<SearchResponse>> {
    const limiter = this.rateLimiter
    return executeWithRetry(
      async () => {
        if (limiter) {
          const admitted = await limiter.waitAndConsume(1, cancellation)
          if (!admitted) throw new CancelledError()
        }
        return this.transport.search(request)
      },
      {
        config: this.retry,
        cancellation,
        shouldRetry: (error) =>
          !(error instanceof CancelledError) && isRetryableError(error),
        getRetryAfterMs: extractRetryAfterMs,
        onRateLimited: (retryAfterMs) => {
          const seconds = retryAfterMs / 1000
          this.log.warn(`Rate limited by tracker API, backing off ${seconds}s`)
          limiter?.penalize(seconds)
        },
        onRetry: ({ attempt, maxAttempts, delay, lastError }) => {
          this.log.warn(`Retry attempt ${attempt + 1}/${maxAttempts - 1}, waiting ${delay}ms`, {
            startAt: request.startAt,
            error: describeError(lastError),
          })
        },
      }
    )
  }
}
