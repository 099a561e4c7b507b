import { describe, it, expect } from 'vitest'
import {
  CacheCorruptError,
  CancelledError,
  ConfigInvalidError,
  NetworkTransientError,
  OrphanedTaskError,
  SyncError,
  TrackerApiError,
  classifyError,
  describeError,
  isRetryableError,
  isSyncError,
} from './errors.js'
import { CancellationSource, NEVER_CANCELLED, anyCancelled, throwIfCancelled } from './cancellation.js'

describe('error taxonomy', () => {
  it('classifies tracker responses by status', () => {
    expect(new TrackerApiError('limited', 429).code).toBe('NETWORK_TRANSIENT')
    expect(new TrackerApiError('down', 500).code).toBe('NETWORK_TRANSIENT')
    expect(new TrackerApiError('gateway', 504).code).toBe('NETWORK_TRANSIENT')
    expect(new TrackerApiError('bad', 400).code).toBe('REQUEST_INVALID')
    expect(new TrackerApiError('denied', 401).code).toBe('REQUEST_INVALID')
    expect(new TrackerApiError('missing', 404).code).toBe('REQUEST_INVALID')
  })

  it('keeps codes on every subclass', () => {
    expect(new CacheCorruptError('bad json', '/tmp/x.json').code).toBe('CACHE_CORRUPT')
    expect(new ConfigInvalidError('no query').code).toBe('CONFIG_INVALID')
    expect(new CancelledError().code).toBe('CANCELLED')
    expect(new OrphanedTaskError('stale', 'sync', 1).code).toBe('ORPHANED')
    expect(isSyncError(new CancelledError())).toBe(true)
    expect(new CancelledError()).toBeInstanceOf(SyncError)
  })

  it('classifies plain errors by message', () => {
    expect(classifyError(new Error('read ECONNRESET'))).toBe('NETWORK_TRANSIENT')
    expect(classifyError(new TypeError('fetch failed'))).toBe('NETWORK_TRANSIENT')
    const abort = new Error('aborted')
    abort.name = 'AbortError'
    expect(classifyError(abort)).toBe('NETWORK_TRANSIENT')
    expect(classifyError(new Error('Unexpected token'))).toBe('REQUEST_INVALID')
    expect(classifyError('weird')).toBe('REQUEST_INVALID')
  })

  it('retries only transient errors', () => {
    expect(isRetryableError(new NetworkTransientError('timeout'))).toBe(true)
    expect(isRetryableError(new TrackerApiError('bad', 400))).toBe(false)
    expect(isRetryableError(new CancelledError())).toBe(false)
  })

  it('describes errors without stack traces', () => {
    expect(describeError(new TrackerApiError('Field does not exist', 400))).toBe(
      'Tracker API returned HTTP 400: Field does not exist'
    )
    expect(describeError(new Error('boom'))).toBe('boom')
    expect(describeError(12)).toBe('12')
  })
})

describe('cancellation', () => {
  it('combines tokens', async () => {
    const a = new CancellationSource()
    const b = new CancellationSource()
    const combined = anyCancelled(a, undefined, b)

    expect(await combined.isCancelled()).toBe(false)
    b.cancel('user request')
    expect(await combined.isCancelled()).toBe(true)
    expect(b.reason).toBe('user request')
  })

  it('throws once cancelled', async () => {
    const source = new CancellationSource()
    await expect(throwIfCancelled(source)).resolves.toBeUndefined()
    await expect(throwIfCancelled(NEVER_CANCELLED)).resolves.toBeUndefined()
    source.cancel()
    await expect(throwIfCancelled(source, 'stopped')).rejects.toThrow(new CancelledError('stopped'))
  })
})
