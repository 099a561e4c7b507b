import type { CancellationToken } from './cancellation.js'
import { CancelledError, isRetryableError } from './errors.js'

/**
 * Retry configuration
 */
export interface RetryConfig {
  /** Total attempts including the first one (default: 5) */
  maxAttempts?: number
  /** Delay before the first retry (default: 1000) */
  initialDelayMs?: number
  /** Multiplier applied per retry (default: 2) */
  backoffMultiplier?: number
  /** Upper bound for any single delay (default: 32000) */
  maxDelayMs?: number
}

/**
 * Default retry configuration
 */
export const DEFAULT_RETRY_CONFIG: Required<RetryConfig> = {
  maxAttempts: 5,
  initialDelayMs: 1000,
  backoffMultiplier: 2,
  maxDelayMs: 32000,
}

/**
 * Sleep utility for async delays
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/**
 * Calculate delay for a given retry attempt with exponential backoff
 */
export function calculateDelay(
  attempt: number,
  config: Required<RetryConfig>
): number {
  const delay =
    config.initialDelayMs * Math.pow(config.backoffMultiplier, attempt)
  return Math.min(delay, config.maxDelayMs)
}

/**
 * Upper bound on total sleep time for an always-failing retryable operation
 */
export function maxTotalDelay(config: RetryConfig = {}): number {
  const resolved = { ...DEFAULT_RETRY_CONFIG, ...config }
  let total = 0
  for (let attempt = 0; attempt < resolved.maxAttempts - 1; attempt++) {
    total += calculateDelay(attempt, resolved)
  }
  return total
}

/**
 * Retry context passed to callbacks
 */
export interface RetryContext {
  /** Zero-based index of the attempt that just failed */
  attempt: number
  maxAttempts: number
  lastError: Error
  delay: number
}

/**
 * Callback for retry events
 */
export type RetryCallback = (context: RetryContext) => void

/**
 * Options for withRetry function
 */
export interface WithRetryOptions {
  config?: RetryConfig
  onRetry?: RetryCallback
  shouldRetry?: (error: unknown) => boolean
  /**
   * Optional callback to extract a rate-limit delay (in ms) from an error.
   * When provided and returns a positive number, that delay is used instead
   * of the standard exponential backoff for that retry attempt.
   */
  getRetryAfterMs?: (error: unknown) => number | null
  /**
   * Optional callback invoked when a rate limit is detected (getRetryAfterMs
   * returned a value). Use this to penalize a shared token bucket so other
   * concurrent callers also back off.
   */
  onRateLimited?: (retryAfterMs: number) => void
  /** Checked before every backoff sleep */
  cancellation?: CancellationToken
}

/**
 * Outcome of executeWithRetry. Never a rejected promise.
 */
export type RetryOutcome<T> =
  | { success: true; result: T; attempts: number }
  | { success: false; error: Error; attempts: number }

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}

/**
 * Execute an async function with exponential backoff retry logic.
 *
 * When `getRetryAfterMs` is provided and returns a positive delay for an
 * error, that delay is used instead of exponential backoff. This allows
 * honoring HTTP 429 Retry-After headers from upstream APIs.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: WithRetryOptions = {}
): Promise<T> {
  const outcome = await executeWithRetry(fn, options)
  if (outcome.success) {
    return outcome.result
  }
  throw outcome.error
}

/**
 * Run `fn` until it succeeds, fails with a non-retryable error, or the
 * attempt budget is spent. Errors are returned, never thrown.
 */
export async function executeWithRetry<T>(
  fn: () => Promise<T>,
  options: WithRetryOptions = {}
): Promise<RetryOutcome<T>> {
  const config: Required<RetryConfig> = {
    ...DEFAULT_RETRY_CONFIG,
    ...options.config,
  }
  const maxAttempts = Math.max(1, config.maxAttempts)
  const shouldRetry = options.shouldRetry ?? isRetryableError

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    try {
      const result = await fn()
      return { success: true, result, attempts: attempt + 1 }
    } catch (error) {
      const lastError = toError(error)

      if (attempt === maxAttempts - 1 || !shouldRetry(error)) {
        return { success: false, error: lastError, attempts: attempt + 1 }
      }

      // Retry-After replaces the backoff but never exceeds maxDelayMs
      const requestedMs = options.getRetryAfterMs?.(error) ?? null
      const retryAfterMs = requestedMs === null ? null : Math.min(requestedMs, config.maxDelayMs)
      const delay = retryAfterMs ?? calculateDelay(attempt, config)

      if (retryAfterMs !== null && options.onRateLimited) {
        options.onRateLimited(retryAfterMs)
      }

      options.onRetry?.({
        attempt,
        maxAttempts,
        lastError,
        delay,
      })

      try {
        if (options.cancellation && (await options.cancellation.isCancelled())) {
          return { success: false, error: new CancelledError(), attempts: attempt + 1 }
        }
      } catch (checkError) {
        return { success: false, error: toError(checkError), attempts: attempt + 1 }
      }

      await sleep(delay)
    }
  }

  // Unreachable: the loop always returns on its last attempt
  return { success: false, error: new Error('Retry loop exited without a result'), attempts: maxAttempts }
}
