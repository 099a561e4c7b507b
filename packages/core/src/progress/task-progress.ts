/**
 * Task Progress Tracker
 *
 * Durable state for the single long-running sync task. The state lives in
 * one JSON document so a poller in another process (or after a restart)
 * can follow progress and request cancellation.
 *
 * Lifecycle: idle → in_progress → complete | error → (garbage collected) idle
 *
 * - Only one task may be in_progress; start() refuses a second one unless
 *   the first is orphaned (in_progress longer than the orphan timeout).
 * - Every write is atomic (temp file, fsync, rename).
 * - A document that fails to parse is retried with backoff before it is
 *   treated as unreadable; a missing document means idle.
 * - Cancellation only sets a flag. The fetch loop polls it.
 */

import { z } from 'zod'
import { join } from 'path'
import {
  OrphanedTaskError,
  createLogger,
  sleep,
  type CancellationToken,
  type Logger,
} from '@issuesync/tracker'
import { DEFAULT_DISPLAY_WINDOW_MS, DEFAULT_ORPHAN_TIMEOUT_MS } from '../config/sync-config.js'
import { readJsonFile, removeFile, writeJsonAtomic } from '../storage/atomic-file.js'

// ---------------------------------------------------------------------------
// State document
// ---------------------------------------------------------------------------

export const TaskStatusSchema = z.enum(['idle', 'in_progress', 'complete', 'error'])
export type TaskStatus = z.infer<typeof TaskStatusSchema>

export const TaskPhaseSchema = z.enum(['fetch', 'calculate'])
export type TaskPhase = z.infer<typeof TaskPhaseSchema>

export const PhaseProgressSchema = z.object({
  current: z.number().default(0),
  total: z.number().default(0),
  percent: z.number().default(0),
  message: z.string().default(''),
})
export type PhaseProgress = z.infer<typeof PhaseProgressSchema>

export const TaskStateSchema = z
  .object({
    task_id: z.string(),
    task_name: z.string().default(''),
    status: TaskStatusSchema,
    phase: TaskPhaseSchema.default('fetch'),
    fetch_progress: PhaseProgressSchema.default({}),
    calculate_progress: PhaseProgressSchema.default({}),
    cancelled: z.boolean().default(false),
    start_time: z.string(),
    ui_state: z.record(z.string(), z.unknown()).default({}),
    metadata: z.record(z.string(), z.unknown()).default({}),
    message: z.string().optional(),
    cancel_time: z.string().optional(),
    error_time: z.string().optional(),
    complete_time: z.string().optional(),
  })
  .passthrough()

export type TaskState = z.infer<typeof TaskStateSchema>

export const TASK_STATE_FILE = 'task_progress.json'

function emptyProgress(): PhaseProgress {
  return { current: 0, total: 0, percent: 0, message: '' }
}

export function idleState(): TaskState {
  return {
    task_id: '',
    task_name: '',
    status: 'idle',
    phase: 'fetch',
    fetch_progress: emptyProgress(),
    calculate_progress: emptyProgress(),
    cancelled: false,
    start_time: '',
    ui_state: { operation_in_progress: false },
    metadata: {},
  }
}

// ---------------------------------------------------------------------------
// Tracker
// ---------------------------------------------------------------------------

export interface TaskProgressTrackerOptions {
  /** Directory holding task_progress.json */
  stateDir: string
  /** In-progress tasks older than this are orphaned (default: 30 min) */
  orphanTimeoutMs?: number
  /** Finished tasks stay visible this long before removal (default: 5 min) */
  displayWindowMs?: number
  /** Read attempts before a malformed document is declared unreadable (default: 3) */
  readAttempts?: number
  /** First read retry delay, doubled per attempt (default: 50) */
  readRetryDelayMs?: number
  logger?: Logger
  /** Clock, for tests */
  now?: () => number
}

type StateRead =
  | { kind: 'missing' }
  | { kind: 'ok'; state: TaskState }
  | { kind: 'unreadable'; error: Error }

export class TaskProgressTracker {
  readonly statePath: string
  private readonly orphanTimeoutMs: number
  private readonly displayWindowMs: number
  private readonly readAttempts: number
  private readonly readRetryDelayMs: number
  private readonly log: Logger
  private readonly now: () => number
  /** Task started by this instance; progress writes for other tasks are refused */
  private ownTaskId: string | null = null

  constructor(options: TaskProgressTrackerOptions) {
    this.statePath = join(options.stateDir, TASK_STATE_FILE)
    this.orphanTimeoutMs = options.orphanTimeoutMs ?? DEFAULT_ORPHAN_TIMEOUT_MS
    this.displayWindowMs = options.displayWindowMs ?? DEFAULT_DISPLAY_WINDOW_MS
    this.readAttempts = Math.max(1, options.readAttempts ?? 3)
    this.readRetryDelayMs = options.readRetryDelayMs ?? 50
    this.log = options.logger ?? createLogger('task-progress')
    this.now = options.now ?? (() => Date.now())
  }

  // ── Reads ────────────────────────────────────────────────────────────────

  private async readState(): Promise<StateRead> {
    let lastError: Error = new Error('Task state unreadable')

    for (let attempt = 0; attempt < this.readAttempts; attempt++) {
      const result = readJsonFile(this.statePath)
      if (result.kind === 'missing') return { kind: 'missing' }

      if (result.kind === 'ok') {
        const parsed = TaskStateSchema.safeParse(result.value)
        if (parsed.success) return { kind: 'ok', state: parsed.data }
        lastError = new Error(`Task state has an unexpected shape: ${parsed.error.issues[0]?.message ?? 'unknown'}`)
      } else if (result.kind === 'unparseable') {
        lastError = result.error
      }

      if (attempt < this.readAttempts - 1) {
        await sleep(this.readRetryDelayMs * Math.pow(2, attempt))
      }
    }

    this.log.error('Task state unreadable after retries', {
      path: this.statePath,
      attempts: this.readAttempts,
      error: lastError,
    })
    return { kind: 'unreadable', error: lastError }
  }

  private write(state: TaskState): void {
    writeJsonAtomic(this.statePath, state)
  }

  private elapsedSince(isoTime: string | undefined): number | null {
    if (!isoTime) return null
    const time = Date.parse(isoTime)
    return Number.isNaN(time) ? null : this.now() - time
  }

  private isOrphaned(state: TaskState): boolean {
    if (state.status !== 'in_progress') return false
    const elapsed = this.elapsedSince(state.start_time)
    return elapsed === null || elapsed > this.orphanTimeoutMs
  }

  private isStale(state: TaskState): boolean {
    if (state.status !== 'complete' && state.status !== 'error') return false
    const finishedAt = state.status === 'complete' ? state.complete_time : state.error_time
    const elapsed = this.elapsedSince(finishedAt ?? state.start_time)
    return elapsed === null || elapsed > this.displayWindowMs
  }

  /**
   * Mark an orphaned task as failed.
   */
  private recoverOrphan(state: TaskState): TaskState {
    const elapsed = this.elapsedSince(state.start_time) ?? 0
    const orphan = new OrphanedTaskError(
      `Task timed out after ${Math.round(this.orphanTimeoutMs / 60_000)} minutes`,
      state.task_id,
      elapsed
    )
    this.log.warn('Orphaned task recovered', { taskId: state.task_id, error: orphan })

    const failed: TaskState = {
      ...state,
      status: 'error',
      error_time: new Date(this.now()).toISOString(),
      message: orphan.message,
      ui_state: { ...state.ui_state, operation_in_progress: false },
    }
    this.write(failed)
    return failed
  }

  /**
   * Current task state. Missing or garbage-collected state reads as idle.
   * Orphaned tasks are reported (and persisted) as error.
   */
  async getState(): Promise<TaskState> {
    const read = await this.readState()
    if (read.kind !== 'ok') return idleState()

    let state = read.state
    if (this.isOrphaned(state)) {
      state = this.recoverOrphan(state)
    }
    if (this.isStale(state)) {
      removeFile(this.statePath)
      this.log.debug('Finished task state removed', { taskId: state.task_id })
      return idleState()
    }
    return state
  }

  // ── Transitions ──────────────────────────────────────────────────────────

  /**
   * Start a task. Returns false when another task is already in progress.
   */
  async start(
    taskId: string,
    taskName: string,
    metadata: Record<string, unknown> = {}
  ): Promise<boolean> {
    const read = await this.readState()
    if (read.kind === 'ok' && read.state.status === 'in_progress') {
      if (!this.isOrphaned(read.state)) {
        this.log.warn('Task already in progress', {
          taskId: read.state.task_id,
          requested: taskId,
        })
        return false
      }
      this.recoverOrphan(read.state)
    }

    const state: TaskState = {
      task_id: taskId,
      task_name: taskName,
      status: 'in_progress',
      phase: 'fetch',
      fetch_progress: emptyProgress(),
      calculate_progress: emptyProgress(),
      cancelled: false,
      start_time: new Date(this.now()).toISOString(),
      ui_state: { operation_in_progress: true },
      metadata,
    }
    this.write(state)
    this.ownTaskId = taskId
    this.log.info('Task started', { taskId, taskName })
    return true
  }

  /**
   * Record progress for a phase. Other fields of the document are kept.
   */
  async updateProgress(
    phase: TaskPhase,
    current: number,
    total: number,
    message = ''
  ): Promise<boolean> {
    const state = await this.ownedState('update progress')
    if (!state || state.status !== 'in_progress') return false

    const percent = total > 0 ? Math.min(100, (current / total) * 100) : 0
    const progress: PhaseProgress = { current, total, percent, message }
    const next: TaskState = {
      ...state,
      phase,
      ...(phase === 'fetch' ? { fetch_progress: progress } : { calculate_progress: progress }),
      ui_state: 'operation_in_progress' in state.ui_state
        ? state.ui_state
        : { ...state.ui_state, operation_in_progress: true },
    }
    this.write(next)
    return true
  }

  /**
   * Request cancellation of the running task.
   */
  async cancel(): Promise<boolean> {
    const read = await this.readState()
    if (read.kind !== 'ok' || read.state.status !== 'in_progress') {
      this.log.info('No running task to cancel')
      return false
    }

    this.write({
      ...read.state,
      cancelled: true,
      cancel_time: new Date(this.now()).toISOString(),
    })
    this.log.info('Cancellation requested', { taskId: read.state.task_id })
    return true
  }

  async isCancelled(): Promise<boolean> {
    const read = await this.readState()
    if (read.kind !== 'ok') return false
    if (this.ownTaskId !== null && read.state.task_id !== this.ownTaskId) return false
    return read.state.cancelled
  }

  /**
   * Token that polls the persisted cancellation flag.
   */
  cancellationToken(): CancellationToken {
    return { isCancelled: () => this.isCancelled() }
  }

  /**
   * Mark the task complete. Refused while the fetch phase is unfinished.
   */
  async complete(message = 'Task completed', metadata: Record<string, unknown> = {}): Promise<boolean> {
    const state = await this.ownedState('complete')
    if (!state) return false

    if (state.phase === 'fetch' && state.fetch_progress.percent < 100) {
      this.log.warn('Ignoring completion while fetch is still in progress', {
        taskId: state.task_id,
        percent: state.fetch_progress.percent,
      })
      return false
    }

    this.write({
      ...state,
      status: 'complete',
      complete_time: new Date(this.now()).toISOString(),
      message,
      metadata: { ...state.metadata, ...metadata },
      ui_state: { ...state.ui_state, operation_in_progress: false },
    })
    this.log.info('Task completed', { taskId: state.task_id })
    return true
  }

  /**
   * Mark the task failed (errors and cancellations). Refused when another
   * task has replaced this tracker's own.
   */
  async fail(message: string): Promise<boolean> {
    const read = await this.readState()
    if (read.kind === 'ok' && this.ownTaskId !== null && read.state.task_id !== this.ownTaskId) {
      this.log.warn('Task id mismatch, cannot fail', {
        expected: this.ownTaskId,
        found: read.state.task_id,
      })
      return false
    }
    const base = read.kind === 'ok' ? read.state : { ...idleState(), task_id: this.ownTaskId ?? '' }

    this.write({
      ...base,
      status: 'error',
      error_time: new Date(this.now()).toISOString(),
      message,
      ui_state: { ...base.ui_state, operation_in_progress: false },
    })
    this.log.error('Task failed', { taskId: base.task_id, reason: message })
    return true
  }

  /**
   * Remove the state document.
   */
  clear(): void {
    removeFile(this.statePath)
    this.ownTaskId = null
  }

  private async ownedState(action: string): Promise<TaskState | null> {
    const read = await this.readState()
    if (read.kind !== 'ok') {
      this.log.warn(`No task state, cannot ${action}`)
      return null
    }
    if (this.ownTaskId !== null && read.state.task_id !== this.ownTaskId) {
      this.log.warn(`Task id mismatch, cannot ${action}`, {
        expected: this.ownTaskId,
        found: read.state.task_id,
      })
      return null
    }
    return read.state
  }
}
