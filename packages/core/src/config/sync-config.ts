/**
 * Sync Configuration
 *
 * Loads and validates the declarative sync config (YAML). Every tunable the
 * engine uses lives here with its default, and is validated once before a
 * sync starts:
 * - tracker endpoint and credentials
 * - query, time window and field mappings (these drive the cache key)
 * - cache, rate-limit and retry parameters
 * - delta and two-phase heuristics
 * - task state location and timeouts
 */

import { z } from 'zod'
import { readFileSync, existsSync } from 'fs'
import { resolve } from 'path'
import YAML from 'yaml'
import { ConfigInvalidError, buildSearchEndpoint, isHttpUrl } from '@issuesync/tracker'

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_CACHE_MAX_AGE_MS = 24 * 60 * 60 * 1000
export const DEFAULT_CACHE_MAX_BYTES = 100 * 1024 * 1024
export const DEFAULT_DELTA_CHANGE_THRESHOLD = 0.2
export const DEFAULT_COUNT_DRIFT_RATIO = 0.05
export const DEFAULT_COUNT_DRIFT_MIN = 5
export const DEFAULT_MAX_CORRELATION_VALUES = 500
export const DEFAULT_ORPHAN_TIMEOUT_MS = 30 * 60 * 1000
export const DEFAULT_DISPLAY_WINDOW_MS = 5 * 60 * 1000
export const MIN_QUERY_LENGTH = 5
export const DEFAULT_COMPLETION_STATUSES = ['Done', 'Resolved', 'Closed']
export const DEFAULT_CHANGELOG_PAGE_SIZE = 50

// ---------------------------------------------------------------------------
// Zod Schema
// ---------------------------------------------------------------------------

export const QueryTextSchema = z
  .string()
  .trim()
  .min(MIN_QUERY_LENGTH, `Query must be at least ${MIN_QUERY_LENGTH} characters`)

export const SyncConfigSchema = z.object({
  /** Tracker base URL (e.g. https://tracker.example.com) */
  baseUrl: z.string().trim().refine(isHttpUrl, { message: 'baseUrl must be an http(s) URL' }),
  /** REST API version of the search endpoint */
  apiVersion: z.enum(['2', '3']).default('2'),
  /** Bearer token; `${ENV_VAR}` references are resolved when loading from file */
  token: z.string().optional(),
  jql: QueryTextSchema,
  /** Label of the reporting window (e.g. "52w"); part of the cache key */
  timeWindow: z.string().default(''),
  /** Logical name to field id, optionally with a `=Value` condition */
  fieldMappings: z.record(z.string(), z.string()).default({}),
  pageSize: z.number().int().min(1).max(1000).default(1000),
  /** Hard cap on records per fetch */
  limit: z.number().int().positive().optional(),
  method: z.enum(['GET', 'POST']).default('GET'),
  requestTimeoutMs: z.number().int().positive().default(30_000),
  cache: z
    .object({
      dir: z.string().default('.issuesync/cache'),
      maxAgeMs: z.number().int().positive().default(DEFAULT_CACHE_MAX_AGE_MS),
      maxBytes: z.number().int().positive().default(DEFAULT_CACHE_MAX_BYTES),
    })
    .default({}),
  rateLimit: z
    .object({
      maxTokens: z.number().positive().default(100),
      refillRate: z.number().positive().default(10),
    })
    .default({}),
  retry: z
    .object({
      maxAttempts: z.number().int().min(1).default(5),
      initialDelayMs: z.number().int().nonnegative().default(1000),
      maxDelayMs: z.number().int().nonnegative().default(32_000),
    })
    .default({}),
  delta: z
    .object({
      enabled: z.boolean().default(true),
      /** Delta larger than this share of the cached set forces a full fetch */
      changeThreshold: z.number().min(0).default(DEFAULT_DELTA_CHANGE_THRESHOLD),
      countDriftRatio: z.number().min(0).default(DEFAULT_COUNT_DRIFT_RATIO),
      countDriftMin: z.number().int().min(0).default(DEFAULT_COUNT_DRIFT_MIN),
    })
    .default({}),
  twoPhase: z
    .object({
      secondaryProjects: z.array(z.string().trim().min(1)).default([]),
      secondaryIssueTypes: z.array(z.string().trim().min(1)).default([]),
      /** Skip phase 2 when primary records carry no correlation values */
      skipWhenEmpty: z.boolean().default(true),
      maxCorrelationValues: z.number().int().positive().default(DEFAULT_MAX_CORRELATION_VALUES),
    })
    .default({}),
  changelog: z
    .object({
      /** Fetch status histories of completed issues after each sync */
      enabled: z.boolean().default(false),
      completionStatuses: z.array(z.string().trim().min(1)).min(1).default(DEFAULT_COMPLETION_STATUSES),
      /** Changelog payloads are large; pages stay small */
      pageSize: z.number().int().min(1).max(1000).default(DEFAULT_CHANGELOG_PAGE_SIZE),
    })
    .default({}),
  /** Directory holding the task state document */
  stateDir: z.string().default('.issuesync'),
  orphanTimeoutMs: z.number().int().positive().default(DEFAULT_ORPHAN_TIMEOUT_MS),
  displayWindowMs: z.number().int().nonnegative().default(DEFAULT_DISPLAY_WINDOW_MS),
})

// ---------------------------------------------------------------------------
// TypeScript Types
// ---------------------------------------------------------------------------

export type SyncConfig = z.infer<typeof SyncConfigSchema>
export type SyncConfigInput = z.input<typeof SyncConfigSchema>

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Validate raw input, converting schema failures into ConfigInvalidError.
 */
export function validateSyncConfig(input: unknown): SyncConfig {
  const parsed = SyncConfigSchema.safeParse(input)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    )
    throw new ConfigInvalidError(`Invalid sync configuration: ${issues.join('; ')}`, issues)
  }
  return parsed.data
}

/**
 * Replace `${NAME}` references in every string of a parsed document.
 * Unset variables resolve to an empty string.
 */
export function resolveEnvReferences(
  value: unknown,
  env: NodeJS.ProcessEnv = process.env
): unknown {
  if (typeof value === 'string') {
    return value.replace(/\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g, (_match, name: string) => env[name] ?? '')
  }
  if (Array.isArray(value)) {
    return value.map((item) => resolveEnvReferences(item, env))
  }
  if (typeof value === 'object' && value !== null) {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]) => [key, resolveEnvReferences(item, env)])
    )
  }
  return value
}

/**
 * Search endpoint URL for a validated config
 */
export function searchEndpointFor(config: Pick<SyncConfig, 'baseUrl' | 'apiVersion'>): string {
  return buildSearchEndpoint(config.baseUrl, config.apiVersion)
}

/**
 * Whether the two-phase protocol has both category lists configured
 */
export function isTwoPhaseConfigured(config: Pick<SyncConfig, 'twoPhase'>): boolean {
  return (
    config.twoPhase.secondaryProjects.length > 0 &&
    config.twoPhase.secondaryIssueTypes.length > 0
  )
}

// ---------------------------------------------------------------------------
// Loader
// ---------------------------------------------------------------------------

/**
 * Load and validate a sync config file.
 *
 * @param configPath - Path to the YAML file
 * @param env - Environment used for `${NAME}` references
 * @throws {ConfigInvalidError} If the file is missing, unreadable or invalid
 */
export function loadSyncConfig(
  configPath: string,
  env: NodeJS.ProcessEnv = process.env
): SyncConfig {
  const absolute = resolve(configPath)
  if (!existsSync(absolute)) {
    throw new ConfigInvalidError(`Config file not found: ${absolute}`)
  }

  let parsed: unknown
  try {
    parsed = YAML.parse(readFileSync(absolute, 'utf-8'))
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new ConfigInvalidError(`Config file is not valid YAML: ${message}`)
  }

  return validateSyncConfig(resolveEnvReferences(parsed ?? {}, env))
}
