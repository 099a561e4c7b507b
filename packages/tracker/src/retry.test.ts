import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import {
  DEFAULT_RETRY_CONFIG,
  calculateDelay,
  executeWithRetry,
  maxTotalDelay,
  withRetry,
} from './retry.js'
import { extractRetryAfterMs } from './rate-limiter.js'
import { CancellationSource } from './cancellation.js'
import { CancelledError, NetworkTransientError, TrackerApiError } from './errors.js'

describe('calculateDelay', () => {
  it('doubles from the initial delay', () => {
    expect(calculateDelay(0, DEFAULT_RETRY_CONFIG)).toBe(1000)
    expect(calculateDelay(1, DEFAULT_RETRY_CONFIG)).toBe(2000)
    expect(calculateDelay(3, DEFAULT_RETRY_CONFIG)).toBe(8000)
  })

  it('caps at maxDelayMs', () => {
    expect(calculateDelay(5, DEFAULT_RETRY_CONFIG)).toBe(32000)
    expect(calculateDelay(10, DEFAULT_RETRY_CONFIG)).toBe(32000)
  })
})

describe('maxTotalDelay', () => {
  it('sums the capped delays between attempts', () => {
    expect(maxTotalDelay()).toBe(15000)
    expect(maxTotalDelay({ maxAttempts: 8 })).toBe(95000)
  })
})

describe('executeWithRetry', () => {
  beforeEach(() => {
    vi.useFakeTimers()
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it('returns the result of a first-time success', async () => {
    const fn = vi.fn().mockResolvedValue('ok')

    const outcome = await executeWithRetry(fn)

    expect(outcome).toEqual({ success: true, result: 'ok', attempts: 1 })
    expect(fn).toHaveBeenCalledTimes(1)
  })

  it('retries transient failures until success', async () => {
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new TrackerApiError('unavailable', 503))
      .mockRejectedValueOnce(new NetworkTransientError('Connection failed: ECONNRESET'))
      .mockResolvedValueOnce('ok')

    const promise = executeWithRetry(fn)
    await vi.advanceTimersByTimeAsync(3000)
    const outcome = await promise

    expect(outcome).toEqual({ success: true, result: 'ok', attempts: 3 })
  })

  it('retries plain errors that look like connection failures', async () => {
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('request to host failed, reason: ECONNREFUSED'))
      .mockResolvedValueOnce('ok')

    const promise = executeWithRetry(fn)
    await vi.advanceTimersByTimeAsync(1000)

    expect((await promise).success).toBe(true)
    expect(fn).toHaveBeenCalledTimes(2)
  })

  it('fails immediately on a rejected request', async () => {
    const error = new TrackerApiError('bad jql', 400)
    const fn = vi.fn().mockRejectedValue(error)

    const outcome = await executeWithRetry(fn)

    expect(outcome).toEqual({ success: false, error, attempts: 1 })
    expect(fn).toHaveBeenCalledTimes(1)
  })

  it('stops after maxAttempts and sleeps no longer than the backoff bound', async () => {
    const fn = vi.fn().mockRejectedValue(new TrackerApiError('unavailable', 503))
    const start = Date.now()

    const promise = executeWithRetry(fn)
    await vi.runAllTimersAsync()
    const outcome = await promise

    expect(outcome.success).toBe(false)
    expect(outcome.attempts).toBe(5)
    expect(fn).toHaveBeenCalledTimes(5)
    expect(Date.now() - start).toBe(maxTotalDelay())
  })

  it('honors Retry-After and reports the rate limit', async () => {
    const onRateLimited = vi.fn()
    const onRetry = vi.fn()
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new TrackerApiError('slow down', 429, undefined, 7000))
      .mockResolvedValueOnce('ok')

    const promise = executeWithRetry(fn, {
      getRetryAfterMs: extractRetryAfterMs,
      onRateLimited,
      onRetry,
    })
    await vi.advanceTimersByTimeAsync(7000)
    const outcome = await promise

    expect(outcome.success).toBe(true)
    expect(onRateLimited).toHaveBeenCalledWith(7000)
    expect(onRetry).toHaveBeenCalledWith(expect.objectContaining({ attempt: 0, delay: 7000, maxAttempts: 5 }))
  })

  it('caps a Retry-After delay at maxDelayMs', async () => {
    const onRateLimited = vi.fn()
    const onRetry = vi.fn()
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new TrackerApiError('slow down', 429, undefined, 3_600_000))
      .mockResolvedValueOnce('ok')

    const start = Date.now()
    const promise = executeWithRetry(fn, {
      config: { maxAttempts: 2, initialDelayMs: 10, maxDelayMs: 50 },
      getRetryAfterMs: extractRetryAfterMs,
      onRateLimited,
      onRetry,
    })
    await vi.advanceTimersByTimeAsync(50)
    const outcome = await promise

    expect(outcome.success).toBe(true)
    expect(Date.now() - start).toBe(50)
    expect(onRateLimited).toHaveBeenCalledWith(50)
    expect(onRetry).toHaveBeenCalledWith(expect.objectContaining({ attempt: 0, delay: 50 }))
  })

  it('stops with a CancelledError when cancelled between attempts', async () => {
    const source = new CancellationSource()
    source.cancel()
    const fn = vi.fn().mockRejectedValue(new TrackerApiError('unavailable', 503))

    const outcome = await executeWithRetry(fn, { cancellation: source })

    expect(outcome.success).toBe(false)
    expect(outcome.attempts).toBe(1)
    if (!outcome.success) {
      expect(outcome.error).toBeInstanceOf(CancelledError)
    }
  })

  it('wraps non-Error throws without throwing', async () => {
    const fn = vi.fn().mockRejectedValue('plain string')

    const outcome = await executeWithRetry(fn)

    expect(outcome.success).toBe(false)
    if (!outcome.success) {
      expect(outcome.error.message).toBe('plain string')
    }
  })
})

describe('withRetry', () => {
  it('throws the final error', async () => {
    const error = new TrackerApiError('not found', 404)
    await expect(withRetry(() => Promise.reject(error))).rejects.toBe(error)
  })

  it('returns the result on success', async () => {
    await expect(withRetry(() => Promise.resolve(42))).resolves.toBe(42)
  })
})
