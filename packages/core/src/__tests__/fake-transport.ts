import type { RawIssue, SearchRequest, SearchResponse, SearchTransport } from '@issuesync/tracker'

export type SearchHandler = (
  request: SearchRequest,
  call: number
) => SearchResponse | Promise<SearchResponse>

/**
 * In-process search transport. Every request is recorded and answered by
 * the handler; a handler that throws behaves like a failed HTTP call.
 */
export class FakeSearchTransport implements SearchTransport {
  readonly requests: SearchRequest[] = []

  constructor(private readonly handler: SearchHandler) {}

  async search(request: SearchRequest): Promise<SearchResponse> {
    this.requests.push(request)
    return this.handler(request, this.requests.length)
  }

  /** Queries sent, in order */
  get queries(): string[] {
    return this.requests.map((request) => request.jql)
  }
}

export function rawIssues(
  count: number,
  prefix = 'ABC',
  fields: (index: number) => Record<string, unknown> = () => ({})
): RawIssue[] {
  return Array.from({ length: count }, (_, i) => ({
    key: `${prefix}-${i + 1}`,
    id: String(10_000 + i),
    fields: fields(i),
  }))
}

/**
 * Offset slice of a record set, as the search endpoint returns it.
 */
export function page(records: readonly RawIssue[], request: SearchRequest): SearchResponse {
  return {
    startAt: request.startAt,
    maxResults: request.maxResults,
    total: records.length,
    issues: records.slice(request.startAt, request.startAt + request.maxResults),
  }
}
