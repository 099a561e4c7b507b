/**
 * Cache key derivation
 *
 * Keys are sha256 digests of a canonical JSON document, so identical
 * query parameters always produce the same key and any change produces a
 * different one.
 */

import { createHash } from 'crypto'

export interface CacheKeyInput {
  jql: string
  fieldMappings?: Record<string, string>
  timeWindow?: string
  /** Separates entries of another record kind fetched by the same query */
  scope?: string
}

function sortedEntries(mappings: Record<string, string> = {}): Array<[string, string]> {
  return Object.entries(mappings).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
}

function sha256(text: string): string {
  return createHash('sha256').update(text).digest('hex')
}

/**
 * Deterministic cache key for a query configuration.
 */
export function generateCacheKey(input: CacheKeyInput): string {
  const canonical = JSON.stringify({
    fields: sortedEntries(input.fieldMappings),
    jql: input.jql.trim(),
    window: input.timeWindow ?? '',
    ...(input.scope ? { scope: input.scope } : {}),
  })
  return sha256(canonical)
}

/**
 * Hash of the processing configuration stored alongside cached data.
 * A cached entry is only reused while this hash is unchanged.
 */
export function computeConfigHash(fieldMappings: Record<string, string> = {}): string {
  return sha256(JSON.stringify(sortedEntries(fieldMappings)))
}
