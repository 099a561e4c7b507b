import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { existsSync, mkdtempSync, rmSync } from 'fs'
import { join } from 'path'
import { tmpdir } from 'os'
import { TrackerApiError, type RawIssue } from '@issuesync/tracker'
import { FakeSearchTransport, page, rawIssues, type SearchHandler } from '../__tests__/fake-transport.js'
import { generateCacheKey } from '../cache/cache-key.js'
import { validateSyncConfig, type SyncConfigInput } from '../config/sync-config.js'
import { SyncEngine, type StartSyncResult } from './sync-engine.js'

const HOUR = 60 * 60 * 1000
const T0 = Date.parse('2026-03-01T12:00:00.000Z')
const DELTA_JQL = "(project = ABC) AND updated >= '2026-03-01 12:00'"

describe('SyncEngine', () => {
  let tmpDir: string
  let now: number

  function engine(handler: SearchHandler, overrides: Partial<SyncConfigInput> = {}) {
    const transport = new FakeSearchTransport(handler)
    const config = validateSyncConfig({
      baseUrl: 'https://tracker.example.com',
      jql: 'project = ABC',
      cache: { dir: join(tmpDir, 'cache') },
      stateDir: tmpDir,
      retry: { maxAttempts: 2, initialDelayMs: 1, maxDelayMs: 1 },
      ...overrides,
    })
    return { transport, engine: new SyncEngine({ config, transport, now: () => now }) }
  }

  /**
   * Serves `records` for the base query, answers count requests with
   * `liveCount` and delta queries with `changed`.
   */
  function tracker(records: RawIssue[], changed: RawIssue[] = [], liveCount = records.length): SearchHandler {
    return (request) => {
      if (request.maxResults === 0) return { startAt: 0, total: liveCount, issues: [] }
      if (request.jql.includes('updated >=')) return page(changed, request)
      return page(records, request)
    }
  }

  async function settle(result: StartSyncResult) {
    expect(result.started).toBe(true)
    if (!result.done) throw new Error('sync did not start')
    return result.done
  }

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), 'issuesync-engine-'))
    now = T0
  })

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true })
  })

  // ========================================================================
  // Full fetch
  // ========================================================================

  it('fetches 250 records in a single page', async () => {
    const { transport, engine: e } = engine(tracker(rawIssues(250)))

    const result = await settle(await e.startSync('project = ABC'))

    expect(result.success).toBe(true)
    expect(result.source).toBe('full')
    expect(result.issues).toHaveLength(250)
    expect(result.changedKeys).toHaveLength(250)
    expect(transport.requests).toHaveLength(1)
    expect(transport.requests[0]?.maxResults).toBe(1000)
    expect(transport.requests[0]?.fields).toContain('fixVersions')

    const state = await e.getTaskState()
    expect(state.status).toBe('complete')
    expect(state.message).toBe('Synced 250 issues (full, 250 changed)')
    expect(state.fetch_progress.percent).toBe(100)
  })

  it('reads as idle before any sync', async () => {
    const { engine: e } = engine(tracker([]))
    expect((await e.getTaskState()).status).toBe('idle')
  })

  it('copies mapped fields into each record', async () => {
    const records = rawIssues(1, 'ABC', () => ({ customfield_10002: 5 }))
    const { transport, engine: e } = engine(tracker(records), {
      fieldMappings: { storyPoints: 'customfield_10002' },
    })

    const result = await settle(await e.startSync('project = ABC'))

    expect(result.issues[0]?.customFields).toEqual({ customfield_10002: 5 })
    expect(transport.requests[0]?.fields?.at(-1)).toBe('customfield_10002')
  })

  it('reports a failed fetch', async () => {
    const { engine: e } = engine(() => {
      throw new TrackerApiError('Unauthorized', 401)
    })

    const result = await settle(await e.startSync('project = ABC'))

    expect(result).toEqual({
      success: false,
      issues: [],
      changedKeys: [],
      source: 'full',
      message: 'Sync failed: Tracker API returned HTTP 401: Unauthorized',
    })
    const state = await e.getTaskState()
    expect(state.status).toBe('error')
    expect(state.message).toBe('Sync failed: Tracker API returned HTTP 401: Unauthorized')
  })

  // ========================================================================
  // Cache & delta
  // ========================================================================

  it('refreshes a cached set with an empty delta', async () => {
    const records = rawIssues(100)
    const first = engine(tracker(records))
    const initial = await settle(await first.engine.startSync('project = ABC'))

    now = T0 + HOUR
    const second = engine(tracker(records, [], 100))
    const result = await settle(await second.engine.startSync('project = ABC'))

    expect(result.success).toBe(true)
    expect(result.source).toBe('delta')
    expect(result.changedKeys).toEqual([])
    expect(result.issues).toEqual(initial.issues)
    expect(second.transport.queries).toEqual(['project = ABC', DELTA_JQL])
    expect((await second.engine.getTaskState()).status).toBe('complete')
  })

  it('merges changed records into the cached set', async () => {
    const records = rawIssues(100)
    await settle(await engine(tracker(records)).engine.startSync('project = ABC'))

    now = T0 + HOUR
    const changed = [{ key: 'ABC-7', fields: { summary: 'edited' } }]
    const { engine: e } = engine(tracker(records, changed))
    const result = await settle(await e.startSync('project = ABC'))

    expect(result.source).toBe('delta')
    expect(result.changedKeys).toEqual(['ABC-7'])
    expect(result.issues[6]?.summary).toBe('edited')

    const cached = e.cache.peek(generateCacheKey({ jql: 'project = ABC' }))
    expect(cached?.data[6]?.summary).toBe('edited')
    expect(cached?.timestamp.toISOString()).toBe('2026-03-01T13:00:00.000Z')
  })

  it('runs a full fetch when the live count drifted', async () => {
    await settle(await engine(tracker(rawIssues(100))).engine.startSync('project = ABC'))

    now = T0 + HOUR
    const { transport, engine: e } = engine(tracker(rawIssues(110)))
    const result = await settle(await e.startSync('project = ABC'))

    expect(result.source).toBe('full')
    expect(result.issues).toHaveLength(110)
    expect(transport.queries).toEqual(['project = ABC', 'project = ABC'])
    expect(transport.requests[0]?.maxResults).toBe(0)
  })

  it('serves a fresh cache directly when delta sync is disabled', async () => {
    await settle(await engine(tracker(rawIssues(10))).engine.startSync('project = ABC'))

    now = T0 + HOUR
    const { transport, engine: e } = engine(tracker(rawIssues(10)), { delta: { enabled: false } })
    const result = await settle(await e.startSync('project = ABC'))

    expect(result.source).toBe('cache')
    expect(result.issues).toHaveLength(10)
    expect(result.changedKeys).toEqual([])
    expect(transport.requests).toHaveLength(0)
  })

  it('drops the cache on a forced refresh', async () => {
    await settle(await engine(tracker(rawIssues(10))).engine.startSync('project = ABC'))

    const { transport, engine: e } = engine(tracker(rawIssues(10)))
    const result = await settle(await e.startSync('project = ABC', { forceRefresh: true }))

    expect(result.source).toBe('full')
    expect(transport.queries).toEqual(['project = ABC'])
  })

  it('keys the cache by field mappings', async () => {
    await settle(await engine(tracker(rawIssues(10))).engine.startSync('project = ABC'))

    const { transport, engine: e } = engine(tracker(rawIssues(10)))
    const result = await settle(
      await e.startSync('project = ABC', { fieldMappings: { team: 'customfield_10010' } })
    )

    expect(result.source).toBe('full')
    expect(transport.requests).toHaveLength(1)
  })

  // ========================================================================
  // Two-phase
  // ========================================================================

  it('skips the secondary fetch when primary records carry no releases', async () => {
    const { transport, engine: e } = engine(tracker(rawIssues(5)), {
      twoPhase: { secondaryProjects: ['OPS'], secondaryIssueTypes: ['Task'] },
    })

    const result = await settle(await e.startSync('project = ABC'))

    expect(result.success).toBe(true)
    expect(result.issues).toHaveLength(5)
    expect(transport.queries).toEqual(['project = ABC'])
  })

  it('adds correlated secondary records', async () => {
    const primary = rawIssues(2, 'ABC', () => ({ fixVersions: [{ name: '1.0' }] }))
    const { transport, engine: e } = engine(
      (request) =>
        request.jql === 'project = ABC' ? page(primary, request) : page(rawIssues(3, 'OPS'), request),
      { twoPhase: { secondaryProjects: ['OPS'], secondaryIssueTypes: ['Task'] } }
    )

    const result = await settle(await e.startSync('project = ABC'))

    expect(result.issues.map((r) => r.key)).toEqual(['ABC-1', 'ABC-2', 'OPS-1', 'OPS-2', 'OPS-3'])
    expect(transport.queries).toEqual([
      'project = ABC',
      '(project = "OPS") AND (issuetype = "Task") AND (fixVersion = "1.0")',
    ])
  })

  it('refreshes a two-phase cache by delta without a count check', async () => {
    const twoPhase = { twoPhase: { secondaryProjects: ['OPS'], secondaryIssueTypes: ['Task'] } }
    const primary = rawIssues(20, 'ABC', () => ({ fixVersions: [{ name: '1.0' }] }))
    const secondary = rawIssues(20, 'OPS')
    const handler: SearchHandler = (request) => {
      if (request.maxResults === 0) return { startAt: 0, total: primary.length, issues: [] }
      if (request.jql.includes('updated >=')) return page([], request)
      return request.jql === 'project = ABC' ? page(primary, request) : page(secondary, request)
    }
    const initial = await settle(await engine(handler, twoPhase).engine.startSync('project = ABC'))
    expect(initial.issues).toHaveLength(40)

    now = T0 + HOUR
    const { transport, engine: e } = engine(handler, twoPhase)
    const result = await settle(await e.startSync('project = ABC'))

    expect(result.source).toBe('delta')
    expect(result.issues).toHaveLength(40)
    expect(transport.queries).toEqual([DELTA_JQL])
  })

  // ========================================================================
  // Changelogs
  // ========================================================================

  it('loads status histories of completed issues when asked', async () => {
    const { transport, engine: e } = engine((request) =>
      request.expand
        ? page([{ key: 'ABC-2', fields: {}, changelog: { histories: [] } }], request)
        : page(rawIssues(3), request)
    )

    const result = await settle(await e.startSync('project = ABC', { includeChangelog: true }))

    expect(result.success).toBe(true)
    expect(result.histories).toEqual([{ key: 'ABC-2', transitions: [] }])
    expect(result.message).toBe('Synced 3 issues (full, 3 changed), 1 changelogs')
    expect(transport.queries).toEqual([
      'project = ABC',
      '(project = ABC) AND (status in ("Done", "Resolved", "Closed"))',
    ])
    expect(transport.requests[1]?.expand).toEqual(['changelog'])
  })

  it('keeps the synced records when the changelog fetch fails', async () => {
    const { engine: e } = engine(
      (request) => {
        if (request.expand) throw new TrackerApiError('bad query', 400)
        return page(rawIssues(3), request)
      },
      { changelog: { enabled: true } }
    )

    const result = await settle(await e.startSync('project = ABC'))

    expect(result.success).toBe(true)
    expect(result.issues).toHaveLength(3)
    expect(result.histories).toBeUndefined()
    expect(result.message).toBe('Synced 3 issues (full, 3 changed)')
    expect((await e.getTaskState()).status).toBe('complete')
  })

  it('does not fetch changelogs by default', async () => {
    const { transport, engine: e } = engine(tracker(rawIssues(3)))

    const result = await settle(await e.startSync('project = ABC'))

    expect(result.histories).toBeUndefined()
    expect(transport.queries).toEqual(['project = ABC'])
  })

  // ========================================================================
  // Task lifecycle
  // ========================================================================

  it('stops after the page during which cancellation was requested', async () => {
    const records = rawIssues(500)
    let e: SyncEngine | undefined
    const setup = engine(
      async (request, call) => {
        if (call === 2) await e?.cancel()
        return page(records, request)
      },
      { pageSize: 100 }
    )
    e = setup.engine

    const result = await settle(await e.startSync('project = ABC'))

    expect(result.success).toBe(false)
    expect(result.issues).toHaveLength(200)
    expect(result.message).toBe('Sync cancelled after fetching 200 issues')
    expect(setup.transport.requests).toHaveLength(2)

    const state = await e.getTaskState()
    expect(state.status).toBe('error')
    expect(state.cancelled).toBe(true)
    expect(state.message).toBe('Sync cancelled after fetching 200 issues')
    expect(state.ui_state.operation_in_progress).toBe(false)
  })

  it('refuses a second sync while one is running', async () => {
    let release: () => void = () => {}
    const gate = new Promise<void>((resolve) => {
      release = resolve
    })
    const { engine: e } = engine(async (request) => {
      await gate
      return page(rawIssues(1), request)
    })

    const first = await e.startSync('project = ABC', { taskId: 'task-1' })
    const second = await e.startSync('project = ABC', { taskId: 'task-2' })

    expect(second).toEqual({
      started: false,
      taskId: 'task-2',
      reason: 'Another sync task is already in progress',
    })
    expect((await e.getTaskState()).task_id).toBe('task-1')

    release()
    const result = await settle(first)
    expect(result.success).toBe(true)
  })

  it('rejects an invalid query before any request', async () => {
    const { transport, engine: e } = engine(tracker([]))

    const result = await e.startSync('ab', { taskId: 'task-1' })

    expect(result).toEqual({
      started: false,
      taskId: 'task-1',
      reason: 'Invalid query: Query must be at least 5 characters',
    })
    expect(transport.requests).toHaveLength(0)
    expect(existsSync(join(tmpDir, 'task_progress.json'))).toBe(false)
  })

  it('has nothing to cancel when idle', async () => {
    const { engine: e } = engine(tracker([]))
    expect(await e.cancel()).toBe(false)
  })

  // ========================================================================
  // Default transport
  // ========================================================================

  it('queries the configured endpoint with the bearer token', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(
      new Response(JSON.stringify({ startAt: 0, total: 1, issues: [{ key: 'ABC-1', fields: {} }] }), {
        status: 200,
        headers: { 'Content-Type': 'application/json' },
      })
    )
    const config = validateSyncConfig({
      baseUrl: 'https://tracker.example.com',
      token: 'test-secret',
      jql: 'project = ABC',
      cache: { dir: join(tmpDir, 'cache') },
      stateDir: tmpDir,
    })
    const e = new SyncEngine({ config, fetch: fetchMock, now: () => now })

    const result = await settle(await e.startSync('project = ABC'))

    expect(result.issues.map((r) => r.key)).toEqual(['ABC-1'])
    const [input, init] = fetchMock.mock.calls[0] ?? []
    expect(String(input)).toMatch(/^https:\/\/tracker\.example\.com\/rest\/api\/2\/search\?jql=project\+%3D\+ABC&/)
    expect(init?.headers).toMatchObject({ Authorization: 'Bearer test-secret' })
  })
})
