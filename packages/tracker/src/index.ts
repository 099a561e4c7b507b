// Errors
export type { SyncErrorCode } from './errors.js'
export {
  SyncError,
  TrackerApiError,
  NetworkTransientError,
  RequestInvalidError,
  CacheCorruptError,
  ConfigInvalidError,
  CancelledError,
  OrphanedTaskError,
  isSyncError,
  isRetryableError,
  isTransientStatus,
  classifyError,
  describeError,
} from './errors.js'

// Cancellation
export type { CancellationToken } from './cancellation.js'
export {
  CancellationSource,
  NEVER_CANCELLED,
  anyCancelled,
  throwIfCancelled,
} from './cancellation.js'

// Logging
export type { LogLevel, LogContext, LogEntry, LogSink, LoggerOptions } from './logger.js'
export { Logger, createLogger, formatError } from './logger.js'

// Rate limiting
export type { TokenBucketConfig, RateLimiterState } from './rate-limiter.js'
export {
  TokenBucket,
  DEFAULT_RATE_LIMIT_CONFIG,
  MAX_WAIT_SLICE_MS,
  extractRetryAfterMs,
  parseRetryAfterHeader,
} from './rate-limiter.js'

// Retry
export type {
  RetryConfig,
  RetryContext,
  RetryCallback,
  RetryOutcome,
  WithRetryOptions,
} from './retry.js'
export {
  DEFAULT_RETRY_CONFIG,
  sleep,
  calculateDelay,
  maxTotalDelay,
  withRetry,
  executeWithRetry,
} from './retry.js'

// Issues
export type {
  RawIssue,
  SearchResponse,
  FixVersion,
  IssueRecord,
} from './issue.js'
export {
  RawIssueSchema,
  SearchResponseSchema,
  FixVersionSchema,
  IssueRecordSchema,
  normalizeIssue,
  simplifyFieldValue,
} from './issue.js'

// Fields and queries
export { BASE_FIELDS, buildFieldList, stripFieldCondition } from './fields.js'
export {
  quoteJqlValue,
  buildMembershipClause,
  andClauses,
  formatJqlDateTime,
  mentionsToken,
  splitOrderBy,
} from './jql.js'

// Changelogs
export type { StatusTransition, IssueHistory } from './changelog.js'
export {
  StatusTransitionSchema,
  IssueHistorySchema,
  extractStatusTransitions,
  toIssueHistory,
} from './changelog.js'

// Search
export type {
  ApiVersion,
  SearchRequest,
  SearchTransport,
  SearchClientConfig,
} from './search-client.js'
export {
  MAX_PAGE_SIZE,
  TrackerSearchClient,
  buildSearchEndpoint,
  isHttpUrl,
} from './search-client.js'

// Pagination
export type {
  FetchState,
  TerminalFetchState,
  PaginatedQuery,
  FetchProgress,
  PaginatedResult,
  PaginatedFetcherOptions,
} from './paginated-fetcher.js'
export { PaginatedFetcher, clampPageSize } from './paginated-fetcher.js'
