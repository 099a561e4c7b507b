/**
 * Changelog Sync
 *
 * Status histories come from a second search with `expand=changelog`.
 * Those payloads are heavy, so the search is narrowed to completed issues,
 * uses small pages, asks for the status field only, and is cached under its
 * own key next to the issue records.
 */

import {
  andClauses,
  buildMembershipClause,
  createLogger,
  splitOrderBy,
  toIssueHistory,
  type CancellationToken,
  type IssueHistory,
  type Logger,
  type PaginatedFetcher,
  type TerminalFetchState,
} from '@issuesync/tracker'
import { computeConfigHash, generateCacheKey } from '../cache/cache-key.js'
import type { CacheStore } from '../cache/cache-store.js'
import {
  DEFAULT_CACHE_MAX_AGE_MS,
  DEFAULT_CHANGELOG_PAGE_SIZE,
  DEFAULT_COMPLETION_STATUSES,
} from '../config/sync-config.js'

// ── Types ──────────────────────────────────────────────────────────────────

export const CHANGELOG_CACHE_SCOPE = 'changelog'
export const CHANGELOG_FIELDS = ['status']

export interface ChangelogRequest {
  /** The sync's base query */
  jql: string
  timeWindow?: string
  /** Drop the cached histories and fetch them again */
  forceRefresh?: boolean
}

export interface ChangelogResult {
  status: TerminalFetchState
  histories: IssueHistory[]
  source: 'cache' | 'fetch'
  /** Query the histories were fetched with */
  jql: string
  error?: Error
}

export interface ChangelogSyncOptions {
  fetcher: PaginatedFetcher
  cache: CacheStore<IssueHistory>
  completionStatuses?: string[]
  pageSize?: number
  maxAgeMs?: number
  logger?: Logger
}

// ── Helpers ────────────────────────────────────────────────────────────────

/**
 * The base query restricted to completed issues. A trailing ORDER BY stays
 * at the end.
 */
export function buildChangelogQuery(jql: string, completionStatuses: readonly string[]): string {
  const { filter, orderBy } = splitOrderBy(jql)
  const filtered = andClauses(filter, buildMembershipClause('status', completionStatuses))
  return orderBy ? `${filtered} ${orderBy}` : filtered
}

export function changelogCacheKey(jql: string, timeWindow?: string): string {
  return generateCacheKey({ jql, ...(timeWindow !== undefined ? { timeWindow } : {}), scope: CHANGELOG_CACHE_SCOPE })
}

// ── Sync ───────────────────────────────────────────────────────────────────

export class ChangelogSync {
  private readonly fetcher: PaginatedFetcher
  private readonly cache: CacheStore<IssueHistory>
  private readonly completionStatuses: string[]
  private readonly pageSize: number
  private readonly maxAgeMs: number
  private readonly configHash = computeConfigHash()
  private readonly log: Logger

  constructor(options: ChangelogSyncOptions) {
    this.fetcher = options.fetcher
    this.cache = options.cache
    this.completionStatuses = options.completionStatuses ?? DEFAULT_COMPLETION_STATUSES
    this.pageSize = options.pageSize ?? DEFAULT_CHANGELOG_PAGE_SIZE
    this.maxAgeMs = options.maxAgeMs ?? DEFAULT_CACHE_MAX_AGE_MS
    this.log = options.logger ?? createLogger('changelog')
  }

  async load(request: ChangelogRequest, cancellation?: CancellationToken): Promise<ChangelogResult> {
    const jql = buildChangelogQuery(request.jql, this.completionStatuses)
    const key = changelogCacheKey(jql, request.timeWindow)

    if (request.forceRefresh) {
      this.cache.invalidate(key)
    } else {
      const lookup = this.cache.get(key, this.configHash, this.maxAgeMs)
      if (lookup.valid) {
        this.log.info('Serving cached changelogs', { histories: lookup.entry.data.length })
        return { status: 'done', histories: lookup.entry.data, source: 'cache', jql }
      }
      this.log.debug('Changelog cache miss', { reason: lookup.reason })
    }

    this.log.info('Fetching changelogs', { jql })
    const result = await this.fetcher.fetchAll(
      { jql, fields: CHANGELOG_FIELDS, expand: ['changelog'], pageSize: this.pageSize },
      cancellation
    )
    const histories = result.issues.map(toIssueHistory)

    // Partial histories are returned but never cached
    if (result.status === 'done') {
      this.cache.put(key, histories, this.configHash, jql)
    }
    return {
      status: result.status,
      histories,
      source: 'fetch',
      jql,
      ...(result.error ? { error: result.error } : {}),
    }
  }
}
