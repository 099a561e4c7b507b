// Configuration
export type { SyncConfig, SyncConfigInput } from './config/sync-config.js'
export {
  SyncConfigSchema,
  QueryTextSchema,
  DEFAULT_CACHE_MAX_AGE_MS,
  DEFAULT_CACHE_MAX_BYTES,
  DEFAULT_DELTA_CHANGE_THRESHOLD,
  DEFAULT_COUNT_DRIFT_RATIO,
  DEFAULT_COUNT_DRIFT_MIN,
  DEFAULT_MAX_CORRELATION_VALUES,
  DEFAULT_ORPHAN_TIMEOUT_MS,
  DEFAULT_DISPLAY_WINDOW_MS,
  DEFAULT_COMPLETION_STATUSES,
  DEFAULT_CHANGELOG_PAGE_SIZE,
  MIN_QUERY_LENGTH,
  validateSyncConfig,
  resolveEnvReferences,
  searchEndpointFor,
  isTwoPhaseConfigured,
  loadSyncConfig,
} from './config/sync-config.js'

// Storage
export type { JsonReadResult } from './storage/atomic-file.js'
export { writeJsonAtomic, readJsonFile, removeFile } from './storage/atomic-file.js'

// Cache
export type { CacheKeyInput } from './cache/cache-key.js'
export { generateCacheKey, computeConfigHash } from './cache/cache-key.js'
export type {
  CacheFile,
  CacheEntry,
  CacheMissReason,
  CacheLookup,
  CacheStoreOptions,
} from './cache/cache-store.js'
export { CacheStore, CacheFileSchema } from './cache/cache-store.js'

// Task progress
export type {
  TaskStatus,
  TaskPhase,
  PhaseProgress,
  TaskState,
  TaskProgressTrackerOptions,
} from './progress/task-progress.js'
export {
  TaskProgressTracker,
  TaskStateSchema,
  TASK_STATE_FILE,
  idleState,
} from './progress/task-progress.js'

// Delta sync
export type {
  DeltaFallbackReason,
  DeltaOutcome,
  DeltaRequest,
  DeltaSyncOptions,
} from './sync/delta-sync.js'
export {
  DeltaSyncEngine,
  DELTA_OFFSET_MS,
  buildDeltaQuery,
  mergeIssues,
  hasCountDrift,
} from './sync/delta-sync.js'

// Two-phase fetch
export type {
  SecondaryPhaseStatus,
  TwoPhaseOptions,
  TwoPhaseRequest,
  TwoPhaseResult,
} from './sync/two-phase.js'
export {
  TwoPhaseCorrelator,
  collectCorrelationValues,
  buildSecondaryQuery,
  shouldUseTwoPhase,
} from './sync/two-phase.js'

// Changelogs
export type { ChangelogRequest, ChangelogResult, ChangelogSyncOptions } from './sync/changelog.js'
export {
  ChangelogSync,
  CHANGELOG_CACHE_SCOPE,
  CHANGELOG_FIELDS,
  buildChangelogQuery,
  changelogCacheKey,
} from './sync/changelog.js'

// Engine
export type {
  FetchSource,
  FetchResult,
  StartSyncOptions,
  StartSyncResult,
  SyncEngineOptions,
} from './sync/sync-engine.js'
export { SyncEngine } from './sync/sync-engine.js'
