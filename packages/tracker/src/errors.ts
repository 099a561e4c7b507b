/**
 * Error codes shared by every sync component.
 *
 * Components convert failures into one of these codes at their boundary;
 * the sync engine turns them into a boolean result plus a short message.
 */
export type SyncErrorCode =
  | 'NETWORK_TRANSIENT'
  | 'REQUEST_INVALID'
  | 'CACHE_CORRUPT'
  | 'CONFIG_INVALID'
  | 'CANCELLED'
  | 'ORPHANED'

/**
 * Base error class for issue sync errors
 */
export class SyncError extends Error {
  constructor(
    message: string,
    public readonly code: SyncErrorCode,
    public readonly context?: Record<string, unknown>
  ) {
    super(message)
    this.name = 'SyncError'
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SyncError)
    }
  }
}

/**
 * Returns true for HTTP statuses worth retrying (429 and any 5xx)
 */
export function isTransientStatus(statusCode: number): boolean {
  return statusCode === 429 || (statusCode >= 500 && statusCode < 600)
}

/**
 * Error thrown when the tracker API returns a non-2xx response.
 * 429 and 5xx are transient, every other status is a rejected request.
 */
export class TrackerApiError extends SyncError {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly response?: unknown,
    /** Delay requested by a Retry-After header, if any */
    public readonly retryAfterMs?: number
  ) {
    super(
      message,
      isTransientStatus(statusCode) ? 'NETWORK_TRANSIENT' : 'REQUEST_INVALID',
      { statusCode, response }
    )
    this.name = 'TrackerApiError'
  }
}

/**
 * Timeout or connection failure before any HTTP status was received
 */
export class NetworkTransientError extends SyncError {
  constructor(message: string, public readonly originalError?: Error) {
    super(message, 'NETWORK_TRANSIENT', { causeMessage: originalError?.message })
    this.name = 'NetworkTransientError'
  }
}

/**
 * The tracker answered with something we cannot use (bad payload shape)
 */
export class RequestInvalidError extends SyncError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'REQUEST_INVALID', context)
    this.name = 'RequestInvalidError'
  }
}

/**
 * A cache file is malformed or exceeds the size limit
 */
export class CacheCorruptError extends SyncError {
  constructor(message: string, public readonly filePath: string) {
    super(message, 'CACHE_CORRUPT', { filePath })
    this.name = 'CacheCorruptError'
  }
}

/**
 * Missing query, malformed endpoint or any other rejected configuration
 */
export class ConfigInvalidError extends SyncError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message, 'CONFIG_INVALID', { issues })
    this.name = 'ConfigInvalidError'
  }
}

/**
 * Cooperative cancellation was observed
 */
export class CancelledError extends SyncError {
  constructor(message = 'Operation cancelled by user') {
    super(message, 'CANCELLED')
    this.name = 'CancelledError'
  }
}

/**
 * An in-progress task outlived its timeout without finishing
 */
export class OrphanedTaskError extends SyncError {
  constructor(
    message: string,
    public readonly taskId: string,
    public readonly elapsedMs: number
  ) {
    super(message, 'ORPHANED', { taskId, elapsedMs })
    this.name = 'OrphanedTaskError'
  }
}

/**
 * Type guard to check if an error is a SyncError
 */
export function isSyncError(error: unknown): error is SyncError {
  return error instanceof SyncError
}

const NETWORK_ERROR_PATTERNS = [
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EAI_AGAIN',
  'socket hang up',
  'fetch failed',
  'network error',
  'timeout',
]

/**
 * Map any thrown value onto the sync error taxonomy.
 * Unknown errors that look like network failures are transient, anything
 * else is treated as a rejected request so it is not retried.
 */
export function classifyError(error: unknown): SyncErrorCode {
  if (error instanceof SyncError) {
    return error.code
  }
  if (error instanceof Error) {
    const text = `${error.name} ${error.message}`.toLowerCase()
    if (error.name === 'AbortError' || error.name === 'TimeoutError') {
      return 'NETWORK_TRANSIENT'
    }
    if (NETWORK_ERROR_PATTERNS.some((pattern) => text.includes(pattern.toLowerCase()))) {
      return 'NETWORK_TRANSIENT'
    }
  }
  return 'REQUEST_INVALID'
}

/**
 * Type guard to check if an error is retryable
 */
export function isRetryableError(error: unknown): boolean {
  return classifyError(error) === 'NETWORK_TRANSIENT'
}

/**
 * Short, user-facing description of an error (no stack traces)
 */
export function describeError(error: unknown): string {
  if (error instanceof TrackerApiError) {
    return `Tracker API returned HTTP ${error.statusCode}: ${error.message}`
  }
  if (error instanceof Error) {
    return error.message
  }
  return String(error)
}
