/**
 * Tracker Search Client
 *
 * Thin HTTP client for the issue-tracker search endpoint
 * (`/rest/api/{2|3}/search`). One call is one page; pagination, rate
 * limiting and retries live in PaginatedFetcher.
 *
 * Errors are mapped onto the sync taxonomy:
 * - non-2xx responses → TrackerApiError (429/5xx transient, other 4xx fatal)
 * - timeouts and connection failures → NetworkTransientError
 * - unusable payloads → RequestInvalidError
 */

import {
  NetworkTransientError,
  RequestInvalidError,
  TrackerApiError,
} from './errors.js'
import { SearchResponseSchema, type SearchResponse } from './issue.js'
import { parseRetryAfterHeader } from './rate-limiter.js'

/** Hard per-call maximum enforced by the tracker */
export const MAX_PAGE_SIZE = 1000

export type ApiVersion = '2' | '3'

export interface SearchRequest {
  jql: string
  startAt: number
  maxResults: number
  fields?: string[]
  expand?: string[]
}

/**
 * Anything that can run one search call. PaginatedFetcher depends on this
 * interface so tests can substitute an in-process fake.
 */
export interface SearchTransport {
  search(request: SearchRequest): Promise<SearchResponse>
}

export interface SearchClientConfig {
  /** Full search endpoint URL (see buildSearchEndpoint) */
  endpoint: string
  /** Bearer token; omitted for anonymous instances */
  token?: string
  /** GET with query params (default) or POST with a JSON body */
  method?: 'GET' | 'POST'
  /** Request timeout in ms (default: 30_000) */
  timeoutMs?: number
  /** fetch implementation (default: global fetch) */
  fetch?: typeof fetch
}

/**
 * Build the search endpoint for a tracker base URL.
 * A base URL that already points at a search endpoint is kept as-is.
 */
export function buildSearchEndpoint(baseUrl: string, apiVersion: ApiVersion = '2'): string {
  const trimmed = baseUrl.trim().replace(/\/+$/, '')
  if (/\/rest\/api\/\d+\/search$/.test(trimmed)) {
    return trimmed
  }
  return `${trimmed}/rest/api/${apiVersion}/search`
}

/**
 * Returns true when the value parses as an http(s) URL
 */
export function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value)
    return url.protocol === 'http:' || url.protocol === 'https:'
  } catch {
    return false
  }
}

export class TrackerSearchClient implements SearchTransport {
  private readonly endpoint: string
  private readonly token?: string
  private readonly method: 'GET' | 'POST'
  private readonly timeoutMs: number
  private readonly fetchImpl: typeof fetch

  constructor(config: SearchClientConfig) {
    if (!isHttpUrl(config.endpoint)) {
      throw new RequestInvalidError(`Search endpoint must be an http(s) URL: ${config.endpoint}`)
    }
    this.endpoint = config.endpoint
    this.token = config.token
    this.method = config.method ?? 'GET'
    this.timeoutMs = config.timeoutMs ?? 30_000
    this.fetchImpl = config.fetch ?? fetch
  }

  async search(request: SearchRequest): Promise<SearchResponse> {
    const headers: Record<string, string> = { Accept: 'application/json' }
    if (this.token) {
      headers.Authorization = `Bearer ${this.token}`
    }

    let url = this.endpoint
    let body: string | undefined
    if (this.method === 'GET') {
      url = `${this.endpoint}?${toSearchParams(request).toString()}`
    } else {
      headers['Content-Type'] = 'application/json'
      body = JSON.stringify({
        jql: request.jql,
        startAt: request.startAt,
        maxResults: request.maxResults,
        ...(request.fields ? { fields: request.fields } : {}),
        ...(request.expand ? { expand: request.expand } : {}),
      })
    }

    // Headers and body are read under one timeout
    const controller = new AbortController()
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs)
    try {
      let response: Response
      let text: string
      try {
        response = await this.fetchImpl(url, {
          method: this.method,
          headers,
          body,
          signal: controller.signal,
        })
        text = await response.text()
      } catch (error) {
        if (error instanceof Error && error.name === 'AbortError') {
          throw new NetworkTransientError(`Request timeout after ${this.timeoutMs}ms`, error)
        }
        const cause = error instanceof Error ? error : new Error(String(error))
        throw new NetworkTransientError(`Connection failed: ${cause.message}`, cause)
      }

      if (!response.ok) {
        throw new TrackerApiError(
          extractErrorMessage(text) ?? (response.statusText || 'Request failed'),
          response.status,
          text.slice(0, 500),
          parseRetryAfterHeader(response.headers.get('retry-after'))
        )
      }

      let payload: unknown
      try {
        payload = JSON.parse(text)
      } catch {
        throw new RequestInvalidError('Search response is not valid JSON', { status: response.status })
      }

      const parsed = SearchResponseSchema.safeParse(payload)
      if (!parsed.success) {
        throw new RequestInvalidError('Search response has an unexpected shape', {
          issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
        })
      }
      return parsed.data
    } finally {
      clearTimeout(timeout)
    }
  }
}

function toSearchParams(request: SearchRequest): URLSearchParams {
  const params = new URLSearchParams({
    jql: request.jql,
    startAt: String(request.startAt),
    maxResults: String(request.maxResults),
  })
  if (request.fields && request.fields.length > 0) {
    params.set('fields', request.fields.join(','))
  }
  if (request.expand && request.expand.length > 0) {
    params.set('expand', request.expand.join(','))
  }
  return params
}

/**
 * Tracker error bodies look like `{ errorMessages: [...], errors: {...} }`
 */
function extractErrorMessage(body: string): string | undefined {
  if (!body) return undefined
  try {
    const parsed: unknown = JSON.parse(body)
    if (typeof parsed !== 'object' || parsed === null) return undefined
    const messages: string[] = []
    if ('errorMessages' in parsed && Array.isArray(parsed.errorMessages)) {
      for (const message of parsed.errorMessages) {
        if (typeof message === 'string') messages.push(message)
      }
    }
    if ('errors' in parsed && typeof parsed.errors === 'object' && parsed.errors !== null) {
      for (const [field, message] of Object.entries(parsed.errors)) {
        if (typeof message === 'string') messages.push(`${field}: ${message}`)
      }
    }
    return messages.length > 0 ? messages.join('; ') : undefined
  } catch {
    return undefined
  }
}
