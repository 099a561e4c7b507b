/**
 * Issue records
 *
 * The tracker returns loosely shaped `{ key, id, fields }` payloads. They are
 * validated at the edge and normalized into IssueRecord, which is what the
 * cache stores and what downstream consumers read.
 */

import { z } from 'zod'
import { stripFieldCondition } from './fields.js'

// ---------------------------------------------------------------------------
// Raw payloads
// ---------------------------------------------------------------------------

export const RawIssueSchema = z.object({
  id: z.string().optional(),
  key: z.string().min(1),
  fields: z.record(z.string(), z.unknown()).default({}),
  /** Present when the search asked for `expand=changelog` */
  changelog: z.unknown().optional(),
})

export type RawIssue = z.infer<typeof RawIssueSchema>

export const SearchResponseSchema = z.object({
  startAt: z.number().int().nonnegative().default(0),
  maxResults: z.number().int().nonnegative().optional(),
  total: z.number().int().nonnegative(),
  issues: z.array(RawIssueSchema).default([]),
})

export type SearchResponse = z.infer<typeof SearchResponseSchema>

// ---------------------------------------------------------------------------
// Normalized records
// ---------------------------------------------------------------------------

export const FixVersionSchema = z.object({
  name: z.string(),
  releaseDate: z.string().nullable().default(null),
  released: z.boolean().nullable().default(null),
})

export type FixVersion = z.infer<typeof FixVersionSchema>

export const IssueRecordSchema = z.object({
  key: z.string().min(1),
  id: z.string().nullable(),
  summary: z.string(),
  project: z.string().nullable(),
  status: z.string().nullable(),
  statusCategory: z.string().nullable(),
  issueType: z.string().nullable(),
  priority: z.string().nullable(),
  resolution: z.string().nullable(),
  assignee: z.string().nullable(),
  created: z.string().nullable(),
  updated: z.string().nullable(),
  resolved: z.string().nullable(),
  labels: z.array(z.string()),
  components: z.array(z.string()),
  fixVersions: z.array(FixVersionSchema),
  parent: z.string().nullable(),
  /** Custom field values keyed by field id */
  customFields: z.record(z.string(), z.unknown()),
})

export type IssueRecord = z.infer<typeof IssueRecordSchema>

// ---------------------------------------------------------------------------
// Field readers
// ---------------------------------------------------------------------------

const NamedSchema = z.object({ name: z.string() })
const KeyedSchema = z.object({ key: z.string() })
const DisplayNameSchema = z.object({ displayName: z.string() })
const ValueSchema = z.object({ value: z.union([z.string(), z.number(), z.boolean()]) })
const StatusSchema = z.object({
  name: z.string(),
  statusCategory: z.object({ name: z.string() }).optional(),
})
const RawFixVersionSchema = z.object({
  name: z.string(),
  releaseDate: z.string().optional(),
  released: z.boolean().optional(),
})

function nameOf(value: unknown): string | null {
  const parsed = NamedSchema.safeParse(value)
  return parsed.success ? parsed.data.name : null
}

function stringOf(value: unknown): string | null {
  return typeof value === 'string' ? value : null
}

function namesOf(value: unknown): string[] {
  if (!Array.isArray(value)) return []
  return value.flatMap((item) => {
    if (typeof item === 'string') return [item]
    const name = nameOf(item)
    return name === null ? [] : [name]
  })
}

function fixVersionsOf(value: unknown): FixVersion[] {
  if (!Array.isArray(value)) return []
  return value.flatMap((item) => {
    const parsed = RawFixVersionSchema.safeParse(item)
    if (!parsed.success) return []
    return [{
      name: parsed.data.name,
      releaseDate: parsed.data.releaseDate ?? null,
      released: parsed.data.released ?? null,
    }]
  })
}

/**
 * Reduce option/user/version objects to their display value.
 * Anything unrecognized is kept as-is.
 */
export function simplifyFieldValue(value: unknown): unknown {
  if (value === undefined || value === null) return null
  if (Array.isArray(value)) return value.map(simplifyFieldValue)

  const option = ValueSchema.safeParse(value)
  if (option.success) return option.data.value
  const named = NamedSchema.safeParse(value)
  if (named.success) return named.data.name
  const person = DisplayNameSchema.safeParse(value)
  if (person.success) return person.data.displayName

  return value
}

/**
 * Normalize a raw tracker issue.
 *
 * @param fieldMappings - logical name to field id (optionally `id=Value`);
 *   each mapped field is copied into `customFields` under its bare id
 */
export function normalizeIssue(
  raw: RawIssue,
  fieldMappings: Record<string, string> = {}
): IssueRecord {
  const f = raw.fields
  const status = StatusSchema.safeParse(f.status)
  const project = KeyedSchema.safeParse(f.project)
  const parent = KeyedSchema.safeParse(f.parent)
  const assignee = DisplayNameSchema.safeParse(f.assignee)

  const customFields: Record<string, unknown> = {}
  for (const mapped of Object.values(fieldMappings)) {
    const fieldId = stripFieldCondition(mapped)
    if (fieldId && !(fieldId in customFields)) {
      customFields[fieldId] = simplifyFieldValue(f[fieldId])
    }
  }

  return {
    key: raw.key,
    id: raw.id ?? null,
    summary: stringOf(f.summary) ?? '',
    project: project.success ? project.data.key : null,
    status: status.success ? status.data.name : null,
    statusCategory: status.success ? status.data.statusCategory?.name ?? null : null,
    issueType: nameOf(f.issuetype),
    priority: nameOf(f.priority),
    resolution: nameOf(f.resolution),
    assignee: assignee.success ? assignee.data.displayName : null,
    created: stringOf(f.created),
    updated: stringOf(f.updated),
    resolved: stringOf(f.resolutiondate),
    labels: namesOf(f.labels),
    components: namesOf(f.components),
    fixVersions: fixVersionsOf(f.fixVersions),
    parent: parent.success ? parent.data.key : null,
    customFields,
  }
}
