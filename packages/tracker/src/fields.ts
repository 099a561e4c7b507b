/**
 * Field list construction for search requests.
 */

/** Fields every sync requests, whatever the mappings */
export const BASE_FIELDS = [
  'key',
  'summary',
  'project',
  'created',
  'updated',
  'resolutiondate',
  'status',
  'issuetype',
  'assignee',
  'priority',
  'resolution',
  'labels',
  'components',
  'fixVersions',
  'parent',
] as const

/**
 * Mapping values may carry a condition (`customfield_10001=Production`);
 * only the part before `=` is a field id.
 */
export function stripFieldCondition(mapping: string): string {
  const index = mapping.indexOf('=')
  return (index === -1 ? mapping : mapping.slice(0, index)).trim()
}

/**
 * Base fields followed by the sorted, de-duplicated mapped field ids.
 */
export function buildFieldList(fieldMappings: Record<string, string> = {}): string[] {
  const base: string[] = [...BASE_FIELDS]
  const extra = new Set<string>()
  for (const mapped of Object.values(fieldMappings)) {
    const id = stripFieldCondition(mapped)
    if (id && !base.includes(id)) {
      extra.add(id)
    }
  }
  return [...base, ...[...extra].sort()]
}
