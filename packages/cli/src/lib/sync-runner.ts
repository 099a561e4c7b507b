/**
 * Sync Runner -- Programmatic API for the sync CLI.
 *
 * Exports `runSync()` so a sync can be started from code without going
 * through process.argv / process.env / process.exit.
 */

import {
  SyncEngine,
  loadSyncConfig,
  type FetchResult,
  type TaskState,
} from '@issuesync/core'
import type { SearchTransport } from '@issuesync/tracker'

// ---------------------------------------------------------------------------
// Public types
// ---------------------------------------------------------------------------

export interface SyncRunnerConfig {
  /** Path to the YAML sync config */
  configPath: string
  /** Query override (default: the config's jql) */
  jql?: string
  /** Drop the cached entry and fetch everything (default: false) */
  full?: boolean
  /** Load status histories too (default: the config's changelog.enabled) */
  changelog?: boolean
  /** Environment for `${NAME}` references in the config (default: process.env) */
  env?: NodeJS.ProcessEnv
  /** Search transport override, mainly for tests */
  transport?: SearchTransport
  /** fetch implementation for the default transport */
  fetch?: typeof fetch
  /** Cancels the sync when aborted */
  signal?: AbortSignal
  /** Task state poll interval while the sync runs (default: 1000) */
  pollIntervalMs?: number
  /** Called with each polled task state */
  onProgress?: (state: TaskState) => void
}

export interface SyncRunnerResult {
  started: boolean
  taskId: string
  /** Why the sync did not start */
  reason?: string
  result?: FetchResult
}

// ---------------------------------------------------------------------------
// Runner
// ---------------------------------------------------------------------------

export async function runSync(config: SyncRunnerConfig): Promise<SyncRunnerResult> {
  const syncConfig = loadSyncConfig(config.configPath, config.env ?? process.env)
  const engine = new SyncEngine({
    config: syncConfig,
    ...(config.transport ? { transport: config.transport } : {}),
    ...(config.fetch ? { fetch: config.fetch } : {}),
  })

  const started = await engine.startSync(config.jql ?? syncConfig.jql, {
    forceRefresh: config.full ?? false,
    ...(config.changelog !== undefined ? { includeChangelog: config.changelog } : {}),
  })
  if (!started.started || !started.done) {
    return {
      started: false,
      taskId: started.taskId,
      reason: started.reason ?? 'Sync did not start',
    }
  }

  const onAbort = (): void => {
    engine.cancel().catch((error: unknown) => {
      console.error('Failed to request cancellation:', error instanceof Error ? error.message : error)
    })
  }
  config.signal?.addEventListener('abort', onAbort, { once: true })

  const onProgress = config.onProgress
  const poller = onProgress
    ? setInterval(() => {
        engine
          .getTaskState()
          .then(onProgress)
          .catch((error: unknown) => {
            console.error('Failed to read task state:', error instanceof Error ? error.message : error)
          })
      }, config.pollIntervalMs ?? 1000)
    : undefined

  try {
    const result = await started.done
    return { started: true, taskId: started.taskId, result }
  } finally {
    if (poller) clearInterval(poller)
    config.signal?.removeEventListener('abort', onAbort)
  }
}
