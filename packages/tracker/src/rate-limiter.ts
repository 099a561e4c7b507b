/**
 * Token Bucket Rate Limiter
 *
 * Proactive rate limiting for tracker search calls. Bursty pagination is
 * allowed up to the bucket capacity; sustained load is capped at the refill
 * rate so we stay below the upstream API ceiling.
 *
 * Refill is computed lazily from elapsed wall-clock time on every call.
 * There is no background timer.
 *
 * Default: 100 burst capacity, 10 tokens/sec refill.
 */

import type { CancellationToken } from './cancellation.js'
import { TrackerApiError } from './errors.js'
import { sleep } from './retry.js'

export interface TokenBucketConfig {
  /** Maximum tokens (burst capacity). Default: 100 */
  maxTokens: number
  /** Tokens added per second. Default: 10 */
  refillRate: number
}

export const DEFAULT_RATE_LIMIT_CONFIG: TokenBucketConfig = {
  maxTokens: 100,
  refillRate: 10,
}

/** Longest single sleep inside waitAndConsume, so cancellation stays responsive */
export const MAX_WAIT_SLICE_MS = 1000

export interface RateLimiterState {
  tokens: number
  maxTokens: number
  refillRate: number
  lastRefill: number
}

export class TokenBucket {
  private tokens: number
  private readonly maxTokens: number
  private readonly refillRate: number
  private lastRefill: number

  constructor(config: Partial<TokenBucketConfig> = {}) {
    const resolved = { ...DEFAULT_RATE_LIMIT_CONFIG, ...config }
    if (resolved.maxTokens <= 0 || resolved.refillRate <= 0) {
      throw new RangeError('maxTokens and refillRate must be positive')
    }
    this.maxTokens = resolved.maxTokens
    this.refillRate = resolved.refillRate
    this.tokens = this.maxTokens
    this.lastRefill = Date.now()
  }

  /** Refill tokens based on elapsed time since last refill. */
  private refill(): void {
    const now = Date.now()
    const elapsed = (now - this.lastRefill) / 1000

    // During a penalty period, lastRefill is in the future so elapsed is negative.
    // Skip refill entirely until the penalty expires.
    if (elapsed <= 0) return

    const newTokens = elapsed * this.refillRate
    this.tokens = Math.min(this.maxTokens, this.tokens + newTokens)
    this.lastRefill = now
  }

  /**
   * Take `n` tokens if they are available right now.
   * Never blocks; returns false and leaves the bucket untouched otherwise.
   */
  tryConsume(n = 1): boolean {
    this.refill()
    if (this.tokens >= n) {
      this.tokens -= n
      return true
    }
    return false
  }

  /**
   * Wait until `n` tokens are available, then take them.
   *
   * Sleeps in slices of at most one second and polls the cancellation token
   * between slices. Resolves to false when cancelled before the tokens were
   * taken.
   */
  async waitAndConsume(n = 1, cancellation?: CancellationToken): Promise<boolean> {
    if (n > this.maxTokens) {
      throw new RangeError(
        `Cannot consume ${n} tokens from a bucket of capacity ${this.maxTokens}`
      )
    }

    for (;;) {
      if (this.tryConsume(n)) return true
      if (cancellation && (await cancellation.isCancelled())) return false

      await sleep(this.nextWaitMs(n))
    }
  }

  /** Time until `n` tokens exist, capped at one wait slice. */
  private nextWaitMs(n: number): number {
    const penaltyMs = this.lastRefill - Date.now()
    if (penaltyMs > 0) {
      return Math.min(penaltyMs, MAX_WAIT_SLICE_MS)
    }
    const needed = n - this.tokens
    const ms = Math.ceil((needed / this.refillRate) * 1000)
    return Math.max(1, Math.min(ms, MAX_WAIT_SLICE_MS))
  }

  /**
   * Penalize the bucket after receiving a 429 rate limit response.
   *
   * Drains all tokens to 0 and shifts the refill baseline forward by
   * `seconds` so no new tokens appear until the penalty expires.
   *
   * @param seconds - How long to pause before tokens start refilling (from Retry-After header)
   */
  penalize(seconds: number): void {
    this.tokens = 0
    // Push lastRefill into the future so refill() computes negative elapsed
    // time until the penalty expires, effectively freezing token generation.
    this.lastRefill = Date.now() + seconds * 1000
  }

  /** Current number of whole tokens available (for testing/monitoring). */
  get availableTokens(): number {
    this.refill()
    return Math.floor(this.tokens)
  }

  /** Point-in-time copy of the bucket state. */
  snapshot(): RateLimiterState {
    this.refill()
    return {
      tokens: this.tokens,
      maxTokens: this.maxTokens,
      refillRate: this.refillRate,
      lastRefill: this.lastRefill,
    }
  }
}

/**
 * Retry-After delay (ms) carried by a 429 response, or null when the error
 * is not a rate-limit response or carries no usable header.
 */
export function extractRetryAfterMs(error: unknown): number | null {
  if (!(error instanceof TrackerApiError) || error.statusCode !== 429) {
    return null
  }
  if (error.retryAfterMs === undefined || error.retryAfterMs <= 0) {
    return null
  }
  return error.retryAfterMs
}

/**
 * Parse a Retry-After header value. Accepts delta-seconds or an HTTP date.
 */
export function parseRetryAfterHeader(value: string | null, now = Date.now()): number | undefined {
  if (!value) return undefined

  const seconds = Number(value.trim())
  if (Number.isFinite(seconds)) {
    return seconds > 0 ? seconds * 1000 : undefined
  }

  const date = Date.parse(value)
  if (Number.isNaN(date)) return undefined
  const ms = date - now
  return ms > 0 ? ms : undefined
}
