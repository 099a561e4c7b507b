/**
 * Status Runner -- Programmatic API for the status and cancel CLIs.
 *
 * Both commands only touch the persisted task state, so they work from any
 * process while a sync runs elsewhere.
 */

import {
  TaskProgressTracker,
  loadSyncConfig,
  type TaskProgressTrackerOptions,
  type TaskState,
} from '@issuesync/core'

// ---------------------------------------------------------------------------
// Public types
// ---------------------------------------------------------------------------

export interface TaskStateRunnerConfig {
  /** Sync config to take the state directory and timeouts from */
  configPath?: string
  /** State directory when no config is given (default: .issuesync) */
  stateDir?: string
  /** Environment for `${NAME}` references in the config (default: process.env) */
  env?: NodeJS.ProcessEnv
}

export const DEFAULT_STATE_DIR = '.issuesync'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function createTracker(config: TaskStateRunnerConfig): TaskProgressTracker {
  if (config.configPath) {
    const syncConfig = loadSyncConfig(config.configPath, config.env ?? process.env)
    const options: TaskProgressTrackerOptions = {
      stateDir: syncConfig.stateDir,
      orphanTimeoutMs: syncConfig.orphanTimeoutMs,
      displayWindowMs: syncConfig.displayWindowMs,
    }
    return new TaskProgressTracker(options)
  }
  return new TaskProgressTracker({ stateDir: config.stateDir ?? DEFAULT_STATE_DIR })
}

/**
 * Human-readable summary of a task state.
 */
export function formatTaskState(state: TaskState): string {
  if (state.status === 'idle') {
    return 'No sync task'
  }

  const progress = state.phase === 'fetch' ? state.fetch_progress : state.calculate_progress
  const lines = [
    `Task:      ${state.task_name} (${state.task_id})`,
    `Status:    ${state.status}${state.cancelled ? ' (cancellation requested)' : ''}`,
    `Phase:     ${state.phase} ${Math.round(progress.percent)}%${progress.message ? ` - ${progress.message}` : ''}`,
    `Started:   ${state.start_time}`,
  ]
  if (state.message) {
    lines.push(`Message:   ${state.message}`)
  }
  return lines.join('\n')
}

// ---------------------------------------------------------------------------
// Runners
// ---------------------------------------------------------------------------

export async function runStatus(config: TaskStateRunnerConfig = {}): Promise<TaskState> {
  return createTracker(config).getState()
}

/**
 * Request cancellation of the running sync. Returns false when none runs.
 */
export async function runCancel(config: TaskStateRunnerConfig = {}): Promise<boolean> {
  return createTracker(config).cancel()
}
