/**
 * Two-Phase Correlated Fetch
 *
 * Phase 1 fetches the primary set with the caller's query. The release
 * names (fixVersions) found on those records become the filter for phase 2,
 * which fetches only the secondary-category records (e.g. operational tasks
 * in other projects) linked to the same releases.
 *
 * Phase 2 never fails the sync: when it errors, the primary records are
 * returned alone and the degradation is logged. A completed phase 1 is
 * never rolled back.
 */

import {
  andClauses,
  buildMembershipClause,
  createLogger,
  describeError,
  mentionsToken,
  normalizeIssue,
  type CancellationToken,
  type IssueRecord,
  type Logger,
  type PaginatedFetcher,
  type TerminalFetchState,
} from '@issuesync/tracker'
import { DEFAULT_MAX_CORRELATION_VALUES } from '../config/sync-config.js'

// ── Types ──────────────────────────────────────────────────────────────────

export type SecondaryPhaseStatus = 'not_applicable' | 'skipped' | 'completed' | 'failed' | 'cancelled'

export interface TwoPhaseOptions {
  fetcher: PaginatedFetcher
  secondaryProjects: string[]
  secondaryIssueTypes: string[]
  /**
   * Report phase 2 as skipped when no correlation values are found
   * (default: true). Otherwise it completes with no secondary records.
   */
  skipWhenEmpty?: boolean
  /** Log a warning above this many correlation values (default: 500) */
  maxCorrelationValues?: number
  logger?: Logger
}

export interface TwoPhaseRequest {
  jql: string
  fields?: string[]
  pageSize?: number
  limit?: number
  fieldMappings?: Record<string, string>
}

export interface TwoPhaseResult {
  /** Outcome of phase 1, or cancelled when phase 2 was cancelled */
  status: TerminalFetchState
  issues: IssueRecord[]
  primaryCount: number
  secondaryCount: number
  secondary: SecondaryPhaseStatus
  correlationValues: string[]
  error?: Error
}

// ── Helpers ────────────────────────────────────────────────────────────────

/**
 * Sorted, unique, trimmed release names carried by the records.
 */
export function collectCorrelationValues(records: readonly IssueRecord[]): string[] {
  const values = new Set<string>()
  for (const record of records) {
    for (const version of record.fixVersions) {
      const name = version.name.trim()
      if (name) values.add(name)
    }
  }
  return [...values].sort()
}

/**
 * Secondary query: project clause AND issue type clause AND release clause.
 * Null without correlation values, since no secondary record can match.
 */
export function buildSecondaryQuery(
  projects: readonly string[],
  issueTypes: readonly string[],
  correlationValues: readonly string[]
): string | null {
  if (correlationValues.length === 0) return null
  return andClauses(
    buildMembershipClause('project', projects),
    buildMembershipClause('issuetype', issueTypes),
    buildMembershipClause('fixVersion', correlationValues)
  )
}

/**
 * Two-phase applies when both category lists are configured and the base
 * query does not already select the secondary projects itself.
 */
export function shouldUseTwoPhase(
  jql: string,
  projects: readonly string[],
  issueTypes: readonly string[]
): boolean {
  if (projects.length === 0 || issueTypes.length === 0) return false
  return !projects.some((project) => mentionsToken(jql, project))
}

// ── Correlator ─────────────────────────────────────────────────────────────

export class TwoPhaseCorrelator {
  private readonly fetcher: PaginatedFetcher
  private readonly projects: string[]
  private readonly issueTypes: string[]
  private readonly skipWhenEmpty: boolean
  private readonly maxCorrelationValues: number
  private readonly log: Logger

  constructor(options: TwoPhaseOptions) {
    this.fetcher = options.fetcher
    this.projects = options.secondaryProjects
    this.issueTypes = options.secondaryIssueTypes
    this.skipWhenEmpty = options.skipWhenEmpty ?? true
    this.maxCorrelationValues = options.maxCorrelationValues ?? DEFAULT_MAX_CORRELATION_VALUES
    this.log = options.logger ?? createLogger('two-phase')
  }

  appliesTo(jql: string): boolean {
    return shouldUseTwoPhase(jql, this.projects, this.issueTypes)
  }

  async fetch(request: TwoPhaseRequest, cancellation?: CancellationToken): Promise<TwoPhaseResult> {
    const baseQuery = {
      ...(request.fields ? { fields: request.fields } : {}),
      ...(request.pageSize !== undefined ? { pageSize: request.pageSize } : {}),
    }

    // Phase 1
    this.log.info('Phase 1: fetching primary records', { jql: request.jql })
    const primaryResult = await this.fetcher.fetchAll(
      { jql: request.jql, ...baseQuery, ...(request.limit !== undefined ? { limit: request.limit } : {}) },
      cancellation
    )
    const primary = primaryResult.issues.map((raw) => normalizeIssue(raw, request.fieldMappings))

    const result = (
      secondary: SecondaryPhaseStatus,
      correlationValues: string[],
      secondaryIssues: IssueRecord[] = []
    ): TwoPhaseResult => ({
      status: primaryResult.status,
      issues: [...primary, ...secondaryIssues],
      primaryCount: primary.length,
      secondaryCount: secondaryIssues.length,
      secondary,
      correlationValues,
      ...(primaryResult.error ? { error: primaryResult.error } : {}),
    })

    if (primaryResult.status !== 'done') {
      return result('not_applicable', [])
    }

    // Phase 2
    const correlationValues = collectCorrelationValues(primary)
    const secondaryJql = buildSecondaryQuery(this.projects, this.issueTypes, correlationValues)
    if (secondaryJql === null) {
      this.log.info('No correlation values on primary records, nothing to fetch in phase 2')
      return result(this.skipWhenEmpty ? 'skipped' : 'completed', correlationValues)
    }
    if (correlationValues.length > this.maxCorrelationValues) {
      this.log.warn('Large correlation set, secondary query may be slow', {
        values: correlationValues.length,
        max: this.maxCorrelationValues,
      })
    }

    this.log.info('Phase 2: fetching correlated secondary records', {
      jql: secondaryJql,
      values: correlationValues.length,
    })

    const secondaryResult = await this.fetcher.fetchAll({ jql: secondaryJql, ...baseQuery }, cancellation)

    if (secondaryResult.status === 'cancelled') {
      return { ...result('cancelled', correlationValues), status: 'cancelled' }
    }
    if (secondaryResult.status === 'failed') {
      this.log.warn('Phase 2 failed, returning primary records only', {
        error: secondaryResult.error ? describeError(secondaryResult.error) : undefined,
        primary: primary.length,
      })
      return result('failed', correlationValues)
    }

    const primaryKeys = new Set(primary.map((issue) => issue.key))
    const secondaryIssues = secondaryResult.issues
      .filter((raw) => !primaryKeys.has(raw.key))
      .map((raw) => normalizeIssue(raw, request.fieldMappings))

    this.log.info('Two-phase fetch complete', {
      primary: primary.length,
      secondary: secondaryIssues.length,
    })
    return result('completed', correlationValues, secondaryIssues)
  }
}
