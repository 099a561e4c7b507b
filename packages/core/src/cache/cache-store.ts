/**
 * Cache Store
 *
 * One JSON file per cache key, holding records validated by the store's
 * record schema (issue records, changelog histories):
 *
 *   { "metadata": { "timestamp", "config_hash", "record_count", "query" }, "data": [...] }
 *
 * An entry is valid only while its config hash matches the caller's and it
 * is younger than the caller's max age. Malformed or oversized files are
 * reported as corrupt and treated as a miss; they never fail a sync.
 */

import { existsSync, readdirSync } from 'fs'
import { join } from 'path'
import { z } from 'zod'
import {
  CacheCorruptError,
  createLogger,
  type IssueRecord,
  type Logger,
} from '@issuesync/tracker'
import { DEFAULT_CACHE_MAX_BYTES } from '../config/sync-config.js'
import { readJsonFile, removeFile, writeJsonAtomic } from '../storage/atomic-file.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export const CacheFileSchema = z.object({
  metadata: z.object({
    timestamp: z.string().refine((value) => !Number.isNaN(Date.parse(value)), {
      message: 'timestamp must be an ISO date',
    }),
    config_hash: z.string(),
    record_count: z.number().int().nonnegative().optional(),
    query: z.string().optional(),
  }),
  data: z.array(z.unknown()),
})

export type CacheFile = z.infer<typeof CacheFileSchema>

export interface CacheEntry<T = IssueRecord> {
  key: string
  data: T[]
  timestamp: Date
  configHash: string
}

export type CacheMissReason = 'missing' | 'expired' | 'config_mismatch' | 'corrupt'

export type CacheLookup<T = IssueRecord> =
  | { valid: true; entry: CacheEntry<T> }
  | { valid: false; reason: CacheMissReason }

export interface CacheStoreOptions<T> {
  /** Directory holding one file per key */
  dir: string
  /** Schema every cached record must satisfy */
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
  /** Files above this size are treated as corrupt (default: 100 MiB) */
  maxBytes?: number
  logger?: Logger
  /** Clock, for tests */
  now?: () => number
}

const KEY_PATTERN = /^[A-Za-z0-9_-]+$/

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

export class CacheStore<T = IssueRecord> {
  private readonly dir: string
  private readonly records: z.ZodArray<z.ZodType<T, z.ZodTypeDef, unknown>>
  private readonly maxBytes: number
  private readonly log: Logger
  private readonly now: () => number

  constructor(options: CacheStoreOptions<T>) {
    this.dir = options.dir
    this.records = z.array(options.schema)
    this.maxBytes = options.maxBytes ?? DEFAULT_CACHE_MAX_BYTES
    this.log = options.logger ?? createLogger('cache-store')
    this.now = options.now ?? (() => Date.now())
  }

  pathFor(key: string): string {
    if (!KEY_PATTERN.test(key)) {
      throw new RangeError(`Invalid cache key: ${key}`)
    }
    return join(this.dir, `${key}.json`)
  }

  /**
   * Look up a key. Never throws on file content problems.
   */
  get(key: string, configHash: string, maxAgeMs: number): CacheLookup<T> {
    const read = this.read(key)
    if (read.kind === 'missing') {
      return { valid: false, reason: 'missing' }
    }
    if (read.kind === 'corrupt') {
      this.log.warn('Cache file is corrupt, treating as a miss', { cacheKey: key, error: read.error })
      return { valid: false, reason: 'corrupt' }
    }

    const entry = read.entry
    if (entry.configHash !== configHash) {
      this.log.info('Cache config hash changed', { cacheKey: key })
      return { valid: false, reason: 'config_mismatch' }
    }

    const age = this.now() - entry.timestamp.getTime()
    if (age > maxAgeMs) {
      this.log.info('Cache entry expired', { cacheKey: key, ageMs: age, maxAgeMs })
      return { valid: false, reason: 'expired' }
    }

    return { valid: true, entry }
  }

  /**
   * Read an entry regardless of age or config hash. Used by delta sync,
   * which refreshes stale data instead of discarding it.
   */
  peek(key: string): CacheEntry<T> | null {
    const read = this.read(key)
    return read.kind === 'ok' ? read.entry : null
  }

  /**
   * Write an entry, replacing any previous one atomically.
   */
  put(key: string, data: T[], configHash: string, query?: string): CacheEntry<T> {
    const timestamp = new Date(this.now())
    const file: CacheFile = {
      metadata: {
        timestamp: timestamp.toISOString(),
        config_hash: configHash,
        record_count: data.length,
        ...(query !== undefined ? { query } : {}),
      },
      data,
    }
    writeJsonAtomic(this.pathFor(key), file)
    this.log.debug('Cache entry written', { cacheKey: key, records: data.length })
    return { key, data, timestamp, configHash }
  }

  invalidate(key: string): boolean {
    const removed = removeFile(this.pathFor(key))
    if (removed) {
      this.log.info('Cache entry invalidated', { cacheKey: key })
    }
    return removed
  }

  /**
   * Remove every entry. Returns the number of files removed.
   */
  invalidateAll(): number {
    if (!existsSync(this.dir)) return 0

    let removed = 0
    for (const name of readdirSync(this.dir)) {
      if (name.endsWith('.json') && removeFile(join(this.dir, name))) {
        removed++
      }
    }
    this.log.info('Cache cleared', { removed })
    return removed
  }

  private read(
    key: string
  ): { kind: 'missing' } | { kind: 'corrupt'; error: CacheCorruptError } | { kind: 'ok'; entry: CacheEntry<T> } {
    const filePath = this.pathFor(key)
    const result = readJsonFile(filePath, this.maxBytes)

    switch (result.kind) {
      case 'missing':
        return { kind: 'missing' }
      case 'too_large':
        return {
          kind: 'corrupt',
          error: new CacheCorruptError(
            `Cache file is ${result.size} bytes, above the ${this.maxBytes} byte limit`,
            filePath
          ),
        }
      case 'unparseable':
        return {
          kind: 'corrupt',
          error: new CacheCorruptError(`Cache file is not valid JSON: ${result.error.message}`, filePath),
        }
      case 'ok': {
        const unexpectedShape = (error: z.ZodError) => ({
          kind: 'corrupt' as const,
          error: new CacheCorruptError(
            `Cache file has an unexpected shape: ${error.issues[0]?.message ?? 'unknown'}`,
            filePath
          ),
        })
        const parsed = CacheFileSchema.safeParse(result.value)
        if (!parsed.success) return unexpectedShape(parsed.error)
        const data = this.records.safeParse(parsed.data.data)
        if (!data.success) return unexpectedShape(data.error)
        return {
          kind: 'ok',
          entry: {
            key,
            data: data.data,
            timestamp: new Date(parsed.data.metadata.timestamp),
            configHash: parsed.data.metadata.config_hash,
          },
        }
      }
    }
  }
}
