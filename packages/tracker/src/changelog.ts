/**
 * Changelog histories
 *
 * Searches with `expand=changelog` return each issue's edit history. Only
 * status changes are kept: they are what cycle and lead time reporting
 * reads, and the rest of the history is large.
 */

import { z } from 'zod'
import type { RawIssue } from './issue.js'

// Items are read field by field: their `toString` key would shadow
// Object.prototype.toString in an object schema.
const ChangeItemSchema = z.record(z.string(), z.unknown())

const HistorySchema = z.object({
  created: z.string(),
  author: z.object({ displayName: z.string() }).nullable().optional(),
  items: z.array(ChangeItemSchema).default([]),
})

const ChangelogSchema = z.object({
  histories: z.array(HistorySchema).default([]),
})

export const StatusTransitionSchema = z.object({
  from: z.string().nullable(),
  to: z.string().nullable(),
  /** Timestamp of the change as the tracker reports it */
  at: z.string(),
  author: z.string().nullable(),
})

export type StatusTransition = z.infer<typeof StatusTransitionSchema>

export const IssueHistorySchema = z.object({
  key: z.string().min(1),
  transitions: z.array(StatusTransitionSchema),
})

export type IssueHistory = z.infer<typeof IssueHistorySchema>

function textOf(item: Record<string, unknown>, name: string): string | null {
  const value = item[name]
  return typeof value === 'string' ? value : null
}

function timeOf(at: string): number {
  const time = Date.parse(at)
  return Number.isNaN(time) ? 0 : time
}

/**
 * Status transitions of an issue, oldest first. Issues fetched without
 * the changelog expansion have none.
 */
export function extractStatusTransitions(raw: RawIssue): StatusTransition[] {
  const parsed = ChangelogSchema.safeParse(raw.changelog)
  if (!parsed.success) return []

  const transitions = parsed.data.histories.flatMap((history) =>
    history.items
      .filter((item) => textOf(item, 'field')?.toLowerCase() === 'status')
      .map((item) => ({
        from: textOf(item, 'fromString'),
        to: textOf(item, 'toString'),
        at: history.created,
        author: history.author?.displayName ?? null,
      }))
  )
  return transitions.sort((a, b) => timeOf(a.at) - timeOf(b.at))
}

export function toIssueHistory(raw: RawIssue): IssueHistory {
  return { key: raw.key, transitions: extractStatusTransitions(raw) }
}
