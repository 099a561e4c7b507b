/**
 * Structured Logger for issue sync
 *
 * Every component logs through a named Logger carrying sync context
 * (task id, cache key, query, page). Output goes to a sink: the console by
 * default, or whatever a caller injects (tests capture entries this way).
 *
 * LOG_LEVEL selects the minimum level (`silent` disables output) and
 * LOG_JSON switches between JSON lines and colored text, unless the
 * logger was created with explicit options.
 *
 * Credentials never reach the output: context keys that look like tokens or
 * auth headers are redacted at any depth.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export interface LogContext {
  /** Sync task identifier */
  taskId?: string
  /** Cache entry key */
  cacheKey?: string
  /** Query being fetched */
  jql?: string
  /** Page number within a paginated fetch */
  page?: number
  /** Duration in milliseconds */
  durationMs?: number
  /** Error object for error logs */
  error?: Error | unknown
  [key: string]: unknown
}

export interface LogEntry {
  timestamp: string
  level: LogLevel
  message: string
  service: string
  context?: Record<string, unknown>
}

/**
 * Receives every entry at or above the logger's level.
 */
export type LogSink = (entry: LogEntry, formatted: string) => void

export interface LoggerOptions {
  /** Minimum level, or 'silent' (default: LOG_LEVEL, then NODE_ENV) */
  level?: LogLevel | 'silent'
  /** JSON lines instead of colored text (default: LOG_JSON, then NODE_ENV) */
  json?: boolean
  sink?: LogSink
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

const REDACTED = '[redacted]'
const SECRET_KEY_PATTERN = /token|authorization|password|secret/i

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVEL_PRIORITY
}

function levelFromEnv(): LogLevel | 'silent' {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase()
  if (envLevel === 'silent') return 'silent'
  if (envLevel && isLogLevel(envLevel)) return envLevel
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug'
}

function jsonFromEnv(): boolean {
  const envValue = process.env.LOG_JSON
  if (envValue !== undefined) {
    return envValue === 'true' || envValue === '1'
  }
  return process.env.NODE_ENV === 'production'
}

/**
 * Plain object for an error, following `cause` chains.
 */
export function formatError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    const code = 'code' in error ? error.code : undefined
    return {
      name: error.name,
      message: error.message,
      ...(code !== undefined ? { code } : {}),
      stack: error.stack,
      ...(error.cause ? { cause: formatError(error.cause) } : {}),
    }
  }
  return { message: String(error) }
}

function redact(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(redact)
  if (typeof value !== 'object' || value === null || value instanceof Date) return value

  const result: Record<string, unknown> = {}
  for (const [key, inner] of Object.entries(value)) {
    result[key] = SECRET_KEY_PATTERN.test(key) ? REDACTED : redact(inner)
  }
  return result
}

function formatContext(context: LogContext): Record<string, unknown> {
  const formatted: Record<string, unknown> = {}

  for (const [key, value] of Object.entries(context)) {
    if (value === undefined) continue

    if (SECRET_KEY_PATTERN.test(key)) {
      formatted[key] = REDACTED
    } else if (key === 'error' || value instanceof Error) {
      formatted[key] = formatError(value)
    } else {
      formatted[key] = redact(value)
    }
  }

  return formatted
}

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[36m', // cyan
  info: '\x1b[32m', // green
  warn: '\x1b[33m', // yellow
  error: '\x1b[31m', // red
}
const RESET = '\x1b[0m'
const DIM = '\x1b[2m'

function formatPretty(entry: LogEntry): string {
  const color = LEVEL_COLORS[entry.level]
  const time = entry.timestamp.slice(11, 23)
  let output = `${DIM}${time}${RESET} ${color}${entry.level.toUpperCase().padEnd(5)}${RESET} [${entry.service}] ${entry.message}`

  const context = entry.context
  if (!context) return output

  const fields = Object.entries(context)
    .filter(([key]) => key !== 'error')
    .map(([key, value]) => `${key}=${JSON.stringify(value)}`)
    .join(' ')
  if (fields) {
    output += ` ${DIM}${fields}${RESET}`
  }

  const err = context.error
  if (typeof err === 'object' && err !== null) {
    const name = 'name' in err ? String(err.name) : 'Error'
    const message = 'message' in err ? String(err.message) : ''
    output += `\n  ${color}${name}: ${message}${RESET}`
    if ('stack' in err && typeof err.stack === 'string') {
      output += `\n${DIM}${err.stack.split('\n').slice(1, 4).join('\n')}${RESET}`
    }
  }
  return output
}

const consoleSink: LogSink = (entry, formatted) => {
  switch (entry.level) {
    case 'error':
      console.error(formatted)
      break
    case 'warn':
      console.warn(formatted)
      break
    default:
      console.log(formatted)
  }
}

export class Logger {
  private readonly minLevel: LogLevel | 'silent'
  private readonly json: boolean
  private readonly sink: LogSink

  constructor(
    private readonly service: string,
    private readonly defaultContext: LogContext = {},
    private readonly options: LoggerOptions = {}
  ) {
    this.minLevel = options.level ?? levelFromEnv()
    this.json = options.json ?? jsonFromEnv()
    this.sink = options.sink ?? consoleSink
  }

  /**
   * Logger with additional default context, same output settings
   */
  child(context: LogContext): Logger {
    return new Logger(this.service, { ...this.defaultContext, ...context }, this.options)
  }

  private log(level: LogLevel, message: string, context: LogContext = {}): void {
    if (this.minLevel === 'silent') return
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.minLevel]) return

    const formattedContext = formatContext({ ...this.defaultContext, ...context })
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      service: this.service,
      ...(Object.keys(formattedContext).length > 0 ? { context: formattedContext } : {}),
    }
    this.sink(entry, this.json ? JSON.stringify(entry) : formatPretty(entry))
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context)
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context)
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context)
  }

  error(message: string, context?: LogContext): void {
    this.log('error', message, context)
  }
}

export function createLogger(
  service: string,
  defaultContext: LogContext = {},
  options: LoggerOptions = {}
): Logger {
  return new Logger(service, defaultContext, options)
}
