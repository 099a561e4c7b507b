/**
 * Sync Engine
 *
 * Orchestrates one sync task end to end:
 *
 *   start task → cache lookup → delta refresh | full fetch (| two-phase)
 *              → cache write (→ changelogs) → complete | fail
 *
 * startSync() returns as soon as the task is registered; the work runs as a
 * detached promise exposed as `done`, which never rejects. Callers follow
 * progress through getTaskState() and stop the run with cancel().
 */

import { randomUUID } from 'crypto'
import {
  ConfigInvalidError,
  DEFAULT_RETRY_CONFIG,
  IssueHistorySchema,
  IssueRecordSchema,
  PaginatedFetcher,
  TokenBucket,
  TrackerSearchClient,
  buildFieldList,
  createLogger,
  describeError,
  normalizeIssue,
  type CancellationToken,
  type IssueHistory,
  type IssueRecord,
  type Logger,
  type RetryConfig,
  type SearchTransport,
} from '@issuesync/tracker'
import { computeConfigHash, generateCacheKey } from '../cache/cache-key.js'
import { CacheStore, type CacheEntry } from '../cache/cache-store.js'
import {
  QueryTextSchema,
  isTwoPhaseConfigured,
  searchEndpointFor,
  type SyncConfig,
} from '../config/sync-config.js'
import { TaskProgressTracker, type TaskState } from '../progress/task-progress.js'
import { ChangelogSync, type ChangelogResult } from './changelog.js'
import { DeltaSyncEngine } from './delta-sync.js'
import { TwoPhaseCorrelator } from './two-phase.js'

// ── Types ──────────────────────────────────────────────────────────────────

export type FetchSource = 'cache' | 'delta' | 'full'

export interface FetchResult {
  success: boolean
  issues: IssueRecord[]
  changedKeys: string[]
  source: FetchSource
  message?: string
  /** Status histories of completed issues, when requested */
  histories?: IssueHistory[]
}

export interface StartSyncOptions {
  /** Drop the cached entry and fetch everything */
  forceRefresh?: boolean
  /** Overrides the configured field mappings for this run */
  fieldMappings?: Record<string, string>
  /** Overrides the configured time window label for this run */
  timeWindow?: string
  /** Overrides the configured record cap for this run */
  limit?: number
  /** Also load status histories (default: changelog.enabled) */
  includeChangelog?: boolean
  taskId?: string
  taskName?: string
}

export interface StartSyncResult {
  started: boolean
  taskId: string
  /** Why the task did not start */
  reason?: string
  /** Settles with the outcome of the run; never rejects */
  done?: Promise<FetchResult>
}

export interface SyncEngineOptions {
  config: SyncConfig
  /** Search transport (default: HTTP client for the configured endpoint) */
  transport?: SearchTransport
  /** fetch implementation for the default transport */
  fetch?: typeof fetch
  logger?: Logger
  /** Clock for cache and task state, for tests */
  now?: () => number
}

interface RunPlan {
  taskId: string
  jql: string
  fieldMappings: Record<string, string>
  fields: string[]
  limit?: number
  timeWindow: string
  cacheKey: string
  configHash: string
  forceRefresh: boolean
  includeChangelog: boolean
}

// ── Engine ─────────────────────────────────────────────────────────────────

export class SyncEngine {
  readonly config: SyncConfig
  readonly cache: CacheStore
  readonly changelogCache: CacheStore<IssueHistory>
  readonly tracker: TaskProgressTracker
  private readonly transport: SearchTransport
  private readonly rateLimiter: TokenBucket
  private readonly retry: RetryConfig
  private readonly log: Logger

  constructor(options: SyncEngineOptions) {
    this.config = options.config
    this.log = options.logger ?? createLogger('sync-engine')

    this.transport =
      options.transport ??
      new TrackerSearchClient({
        endpoint: searchEndpointFor(options.config),
        method: options.config.method,
        timeoutMs: options.config.requestTimeoutMs,
        ...(options.config.token ? { token: options.config.token } : {}),
        ...(options.fetch ? { fetch: options.fetch } : {}),
      })

    this.rateLimiter = new TokenBucket(options.config.rateLimit)
    this.retry = { ...DEFAULT_RETRY_CONFIG, ...options.config.retry }

    this.cache = new CacheStore({
      dir: options.config.cache.dir,
      schema: IssueRecordSchema,
      maxBytes: options.config.cache.maxBytes,
      logger: this.log.child({ component: 'cache' }),
      ...(options.now ? { now: options.now } : {}),
    })
    this.changelogCache = new CacheStore({
      dir: options.config.cache.dir,
      schema: IssueHistorySchema,
      maxBytes: options.config.cache.maxBytes,
      logger: this.log.child({ component: 'changelog-cache' }),
      ...(options.now ? { now: options.now } : {}),
    })

    this.tracker = new TaskProgressTracker({
      stateDir: options.config.stateDir,
      orphanTimeoutMs: options.config.orphanTimeoutMs,
      displayWindowMs: options.config.displayWindowMs,
      logger: this.log.child({ component: 'task-progress' }),
      ...(options.now ? { now: options.now } : {}),
    })
  }

  /**
   * Register a sync task and run it in the background.
   * Invalid input and a busy tracker are reported without starting.
   */
  async startSync(query: string, options: StartSyncOptions = {}): Promise<StartSyncResult> {
    const taskId = options.taskId ?? randomUUID()

    const parsedQuery = QueryTextSchema.safeParse(query)
    if (!parsedQuery.success) {
      const error = new ConfigInvalidError(
        `Invalid query: ${parsedQuery.error.issues[0]?.message ?? 'unknown'}`
      )
      this.log.warn('Sync not started', { taskId, error })
      return { started: false, taskId, reason: error.message }
    }

    const plan = this.plan(taskId, parsedQuery.data, options)
    const started = await this.tracker.start(taskId, options.taskName ?? 'Issue sync', {
      jql: plan.jql,
      cacheKey: plan.cacheKey,
    })
    if (!started) {
      return { started: false, taskId, reason: 'Another sync task is already in progress' }
    }

    const done = this.run(plan).catch((error: unknown) => this.failRun(plan, error))
    return { started: true, taskId, done }
  }

  /**
   * Request cancellation of the running task.
   */
  async cancel(): Promise<boolean> {
    return this.tracker.cancel()
  }

  async getTaskState(): Promise<TaskState> {
    return this.tracker.getState()
  }

  private plan(taskId: string, jql: string, options: StartSyncOptions): RunPlan {
    const fieldMappings = options.fieldMappings ?? this.config.fieldMappings
    const limit = options.limit ?? this.config.limit
    const timeWindow = options.timeWindow ?? this.config.timeWindow
    return {
      taskId,
      jql,
      fieldMappings,
      fields: buildFieldList(fieldMappings),
      ...(limit !== undefined ? { limit } : {}),
      timeWindow,
      cacheKey: generateCacheKey({ jql, fieldMappings, timeWindow }),
      configHash: computeConfigHash(fieldMappings),
      forceRefresh: options.forceRefresh ?? false,
      includeChangelog: options.includeChangelog ?? this.config.changelog.enabled,
    }
  }

  private createFetcher(log: Logger, noun = 'issues'): PaginatedFetcher {
    return new PaginatedFetcher({
      transport: this.transport,
      rateLimiter: this.rateLimiter,
      retry: this.retry,
      logger: log,
      onProgress: async ({ fetched, total }) => {
        await this.tracker.updateProgress('fetch', fetched, total, `Fetched ${fetched} of ${total} ${noun}`)
      },
    })
  }

  // ── Run ──────────────────────────────────────────────────────────────────

  private async run(plan: RunPlan): Promise<FetchResult> {
    const log = this.log.child({ taskId: plan.taskId, cacheKey: plan.cacheKey })
    const cancellation = this.tracker.cancellationToken()
    const fetcher = this.createFetcher(log)

    if (plan.forceRefresh) {
      this.cache.invalidate(plan.cacheKey)
      log.info('Forced refresh, cache entry dropped')
    } else {
      const cached = this.lookupCache(plan, log)

      if (cached?.fresh && !this.config.delta.enabled) {
        log.info('Serving cached records', { records: cached.entry.data.length })
        return this.finish(plan, 'cache', cached.entry.data, [], false)
      }

      if (cached && this.config.delta.enabled) {
        // A two-phase cache holds secondary records the primary count never sees
        const twoPhase = this.correlatorFor(plan, fetcher, log) !== null
        const delta = await new DeltaSyncEngine({
          fetcher,
          checkCount: !twoPhase,
          changeThreshold: this.config.delta.changeThreshold,
          countDriftRatio: this.config.delta.countDriftRatio,
          countDriftMin: this.config.delta.countDriftMin,
          logger: log,
        }).tryDelta(
          {
            jql: plan.jql,
            cached: cached.entry.data,
            lastSync: cached.entry.timestamp,
            fields: plan.fields,
            pageSize: this.config.pageSize,
            fieldMappings: plan.fieldMappings,
          },
          cancellation
        )

        if (delta.kind === 'applied') {
          return this.finish(plan, 'delta', delta.issues, delta.changedKeys, true)
        }
        if (delta.reason === 'cancelled') {
          return this.cancelled(plan, 'delta', [])
        }
        log.info('Delta refresh not applied, running full fetch', { reason: delta.reason })
      }
    }

    return this.fullFetch(plan, fetcher, cancellation, log)
  }

  /**
   * A fresh entry, or an expired one whose configuration still matches
   * (delta refresh can bring it up to date). Null otherwise.
   */
  private lookupCache(plan: RunPlan, log: Logger): { entry: CacheEntry; fresh: boolean } | null {
    const lookup = this.cache.get(plan.cacheKey, plan.configHash, this.config.cache.maxAgeMs)
    if (lookup.valid) {
      return { entry: lookup.entry, fresh: true }
    }
    log.debug('Cache miss', { reason: lookup.reason })
    if (lookup.reason === 'expired') {
      const entry = this.cache.peek(plan.cacheKey)
      return entry ? { entry, fresh: false } : null
    }
    return null
  }

  /**
   * The correlator for a query that two-phase fetching applies to, or null.
   */
  private correlatorFor(plan: RunPlan, fetcher: PaginatedFetcher, log: Logger): TwoPhaseCorrelator | null {
    if (!isTwoPhaseConfigured(this.config)) return null
    const correlator = new TwoPhaseCorrelator({
      fetcher,
      ...this.config.twoPhase,
      logger: log,
    })
    return correlator.appliesTo(plan.jql) ? correlator : null
  }

  private async fullFetch(
    plan: RunPlan,
    fetcher: PaginatedFetcher,
    cancellation: CancellationToken,
    log: Logger
  ): Promise<FetchResult> {
    const correlator = this.correlatorFor(plan, fetcher, log)
    if (correlator) {
      const result = await correlator.fetch(
        {
          jql: plan.jql,
          fields: plan.fields,
          pageSize: this.config.pageSize,
          fieldMappings: plan.fieldMappings,
          ...(plan.limit !== undefined ? { limit: plan.limit } : {}),
        },
        cancellation
      )
      if (result.status === 'cancelled') {
        return this.cancelled(plan, 'full', result.issues)
      }
      if (result.status === 'failed') {
        return this.failed(plan, result.issues, result.error)
      }
      return this.finish(plan, 'full', result.issues, result.issues.map((issue) => issue.key), true)
    }

    const result = await fetcher.fetchAll(
      {
        jql: plan.jql,
        fields: plan.fields,
        pageSize: this.config.pageSize,
        ...(plan.limit !== undefined ? { limit: plan.limit } : {}),
      },
      cancellation
    )
    const issues = result.issues.map((raw) => normalizeIssue(raw, plan.fieldMappings))

    if (result.status === 'cancelled') {
      return this.cancelled(plan, 'full', issues)
    }
    if (result.status === 'failed') {
      return this.failed(plan, issues, result.error)
    }
    return this.finish(plan, 'full', issues, issues.map((issue) => issue.key), true)
  }

  // ── Outcomes ─────────────────────────────────────────────────────────────

  private async finish(
    plan: RunPlan,
    source: FetchSource,
    issues: IssueRecord[],
    changedKeys: string[],
    writeCache: boolean
  ): Promise<FetchResult> {
    if (writeCache) {
      this.cache.put(plan.cacheKey, issues, plan.configHash, plan.jql)
    }

    let histories: IssueHistory[] | undefined
    if (plan.includeChangelog) {
      const changelog = await this.loadChangelog(plan)
      if (changelog.status === 'cancelled') {
        return this.cancelled(plan, source, issues)
      }
      if (changelog.status === 'done') {
        histories = changelog.histories
      }
    }

    const message =
      `Synced ${issues.length} issues (${source}, ${changedKeys.length} changed)` +
      (histories ? `, ${histories.length} changelogs` : '')
    await this.tracker.updateProgress('calculate', issues.length, issues.length, message)
    await this.tracker.complete(message, {
      source,
      records: issues.length,
      changed: changedKeys.length,
      ...(histories ? { histories: histories.length } : {}),
    })
    return { success: true, issues, changedKeys, source, message, ...(histories ? { histories } : {}) }
  }

  /**
   * Status histories for the synced query. A failed fetch only costs the
   * histories; the synced records stand.
   */
  private async loadChangelog(plan: RunPlan): Promise<ChangelogResult> {
    const log = this.log.child({ taskId: plan.taskId })
    const result = await new ChangelogSync({
      fetcher: this.createFetcher(log, 'changelogs'),
      cache: this.changelogCache,
      completionStatuses: this.config.changelog.completionStatuses,
      pageSize: this.config.changelog.pageSize,
      maxAgeMs: this.config.cache.maxAgeMs,
      logger: log,
    }).load(
      { jql: plan.jql, timeWindow: plan.timeWindow, forceRefresh: plan.forceRefresh },
      this.tracker.cancellationToken()
    )
    if (result.status === 'failed') {
      log.warn('Changelog fetch failed, continuing without histories', {
        error: result.error ? describeError(result.error) : undefined,
        partial: result.histories.length,
      })
    }
    return result
  }

  private async cancelled(plan: RunPlan, source: FetchSource, issues: IssueRecord[]): Promise<FetchResult> {
    const message = `Sync cancelled after fetching ${issues.length} issues`
    this.log.info(message, { taskId: plan.taskId })
    await this.tracker.fail(message)
    return { success: false, issues, changedKeys: [], source, message }
  }

  private async failed(plan: RunPlan, issues: IssueRecord[], error?: Error): Promise<FetchResult> {
    const message = `Sync failed: ${error ? describeError(error) : 'unknown error'}`
    await this.tracker.fail(message)
    return { success: false, issues, changedKeys: [], source: 'full', message }
  }

  /**
   * Last resort for unexpected errors (e.g. an unwritable cache directory)
   */
  private async failRun(plan: RunPlan, error: unknown): Promise<FetchResult> {
    this.log.error('Sync task crashed', { taskId: plan.taskId, error })
    const message = `Sync failed: ${describeError(error)}`
    try {
      await this.tracker.fail(message)
    } catch (writeError) {
      this.log.error('Could not record task failure', { taskId: plan.taskId, error: writeError })
    }
    return { success: false, issues: [], changedKeys: [], source: 'full', message }
  }
}
