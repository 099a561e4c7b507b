/**
 * Delta Sync
 *
 * Refreshes a cached record set by fetching only records updated since the
 * last successful sync and merging them in by key. Deletions upstream are
 * not detected: records are overwritten or appended, never removed.
 *
 * Delta sync is an optimization. Every failure mode resolves to a
 * `fallback` outcome and the caller performs a full fetch instead.
 */

import {
  createLogger,
  describeError,
  formatJqlDateTime,
  normalizeIssue,
  type CancellationToken,
  type IssueRecord,
  type Logger,
  type PaginatedFetcher,
} from '@issuesync/tracker'
import {
  DEFAULT_COUNT_DRIFT_MIN,
  DEFAULT_COUNT_DRIFT_RATIO,
  DEFAULT_DELTA_CHANGE_THRESHOLD,
} from '../config/sync-config.js'

// ── Types ──────────────────────────────────────────────────────────────────

export type DeltaFallbackReason =
  | 'no_cache'
  | 'count_drift'
  | 'fetch_failed'
  | 'cancelled'
  | 'too_many_changes'

export type DeltaOutcome =
  | { kind: 'applied'; issues: IssueRecord[]; changedKeys: string[]; deltaJql: string }
  | { kind: 'fallback'; reason: DeltaFallbackReason; message: string }

export interface DeltaRequest {
  jql: string
  cached: IssueRecord[]
  /** When the cached set was last synchronized */
  lastSync: Date
  fields?: string[]
  pageSize?: number
  fieldMappings?: Record<string, string>
}

export interface DeltaSyncOptions {
  fetcher: PaginatedFetcher
  /** Delta larger than this share of the cached set is not trusted (default: 0.2) */
  changeThreshold?: number
  /** Count drift tolerance as a share of the cached count (default: 0.05) */
  countDriftRatio?: number
  /** Count drift tolerance floor (default: 5) */
  countDriftMin?: number
  /** Compare live and cached counts before the delta query (default: true) */
  checkCount?: boolean
  logger?: Logger
}

// ── Query & merge ──────────────────────────────────────────────────────────

/** Offset added to the last sync time so its own records are not re-fetched */
export const DELTA_OFFSET_MS = 1000

/**
 * `(<jql>) AND updated >= 'YYYY-MM-DD HH:mm'` for lastSync + 1 second, UTC.
 */
export function buildDeltaQuery(jql: string, lastSync: Date): string {
  const since = new Date(lastSync.getTime() + DELTA_OFFSET_MS)
  return `(${jql}) AND updated >= '${formatJqlDateTime(since)}'`
}

/**
 * Merge changed records into a cached set by key.
 * Matching keys are replaced in place; new keys are appended in delta order.
 */
export function mergeIssues(
  cached: readonly IssueRecord[],
  delta: readonly IssueRecord[]
): { issues: IssueRecord[]; changedKeys: string[] } {
  const issues = [...cached]
  const indexByKey = new Map<string, number>()
  issues.forEach((issue, index) => indexByKey.set(issue.key, index))

  const changedKeys: string[] = []
  const seen = new Set<string>()

  for (const record of delta) {
    const index = indexByKey.get(record.key)
    if (index === undefined) {
      indexByKey.set(record.key, issues.length)
      issues.push(record)
    } else {
      issues[index] = record
    }
    if (!seen.has(record.key)) {
      seen.add(record.key)
      changedKeys.push(record.key)
    }
  }

  return { issues, changedKeys }
}

/**
 * True when the live count moved further from the cached count than the
 * tolerance allows: `|live - cached| > max(cached * ratio, min)`.
 */
export function hasCountDrift(
  cachedCount: number,
  liveCount: number,
  ratio = DEFAULT_COUNT_DRIFT_RATIO,
  min = DEFAULT_COUNT_DRIFT_MIN
): boolean {
  const tolerance = Math.max(cachedCount * ratio, min)
  return Math.abs(liveCount - cachedCount) > tolerance
}

// ── Engine ─────────────────────────────────────────────────────────────────

export class DeltaSyncEngine {
  private readonly fetcher: PaginatedFetcher
  private readonly changeThreshold: number
  private readonly countDriftRatio: number
  private readonly countDriftMin: number
  private readonly checkCount: boolean
  private readonly log: Logger

  constructor(options: DeltaSyncOptions) {
    this.fetcher = options.fetcher
    this.changeThreshold = options.changeThreshold ?? DEFAULT_DELTA_CHANGE_THRESHOLD
    this.countDriftRatio = options.countDriftRatio ?? DEFAULT_COUNT_DRIFT_RATIO
    this.countDriftMin = options.countDriftMin ?? DEFAULT_COUNT_DRIFT_MIN
    this.checkCount = options.checkCount ?? true
    this.log = options.logger ?? createLogger('delta-sync')
  }

  async tryDelta(request: DeltaRequest, cancellation?: CancellationToken): Promise<DeltaOutcome> {
    const { cached } = request
    if (cached.length === 0) {
      return fallback('no_cache', 'No cached records to refresh')
    }

    if (this.checkCount) {
      const count = await this.fetcher.countMatches(request.jql, cancellation)
      if (count.success && hasCountDrift(cached.length, count.result, this.countDriftRatio, this.countDriftMin)) {
        this.log.info('Live count drifted from cache, full fetch required', {
          cached: cached.length,
          live: count.result,
        })
        return fallback('count_drift', `Live count ${count.result} differs from cached ${cached.length}`)
      }
    }

    const deltaJql = buildDeltaQuery(request.jql, request.lastSync)
    this.log.info('Fetching changed records', { jql: deltaJql })

    const result = await this.fetcher.fetchAll(
      {
        jql: deltaJql,
        ...(request.fields ? { fields: request.fields } : {}),
        ...(request.pageSize !== undefined ? { pageSize: request.pageSize } : {}),
      },
      cancellation
    )

    if (result.status === 'cancelled') {
      return fallback('cancelled', 'Delta fetch cancelled')
    }
    if (result.status === 'failed') {
      const message = result.error ? describeError(result.error) : 'unknown error'
      this.log.warn('Delta fetch failed, falling back to full fetch', { error: message })
      return fallback('fetch_failed', `Delta fetch failed: ${message}`)
    }

    const limit = cached.length * this.changeThreshold
    if (result.issues.length > limit) {
      this.log.info('Delta too large to trust, full fetch required', {
        changed: result.issues.length,
        cached: cached.length,
        threshold: this.changeThreshold,
      })
      return fallback(
        'too_many_changes',
        `${result.issues.length} changed records exceed ${Math.round(this.changeThreshold * 100)}% of ${cached.length} cached`
      )
    }

    const delta = result.issues.map((raw) => normalizeIssue(raw, request.fieldMappings))
    const merged = mergeIssues(cached, delta)
    this.log.info('Delta merged', { changed: merged.changedKeys.length, total: merged.issues.length })

    return { kind: 'applied', deltaJql, ...merged }
  }
}

function fallback(reason: DeltaFallbackReason, message: string): DeltaOutcome {
  return { kind: 'fallback', reason, message }
}
