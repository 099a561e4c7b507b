/**
 * JQL helpers
 */

/**
 * Quote a value for use in a JQL clause, escaping backslashes and quotes.
 */
export function quoteJqlValue(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`
}

/**
 * `field = "v"` for a single value, `field in ("a", "b")` for several.
 * Throws on an empty list: an empty `in ()` is a JQL syntax error.
 */
export function buildMembershipClause(field: string, values: readonly string[]): string {
  if (values.length === 0) {
    throw new RangeError(`Cannot build a ${field} clause without values`)
  }
  if (values.length === 1) {
    return `${field} = ${quoteJqlValue(values[0])}`
  }
  return `${field} in (${values.map(quoteJqlValue).join(', ')})`
}

/**
 * Join clauses with AND, wrapping each in parentheses.
 */
export function andClauses(...clauses: string[]): string {
  return clauses
    .map((clause) => clause.trim())
    .filter((clause) => clause.length > 0)
    .map((clause) => `(${clause})`)
    .join(' AND ')
}

/**
 * Split a trailing ORDER BY off a query so clauses can be appended to the
 * filter part.
 */
export function splitOrderBy(jql: string): { filter: string; orderBy: string } {
  const match = /(^|\s+)ORDER\s+BY\s+/i.exec(jql)
  if (!match) {
    return { filter: jql.trim(), orderBy: '' }
  }
  return { filter: jql.slice(0, match.index).trim(), orderBy: jql.slice(match.index).trim() }
}

/**
 * JQL date literal at minute resolution in UTC: `YYYY-MM-DD HH:mm`.
 */
export function formatJqlDateTime(date: Date): string {
  const pad = (n: number) => n.toString().padStart(2, '0')
  return (
    `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}`
  )
}

/**
 * Case-insensitive check for a whole-word token in a query.
 */
export function mentionsToken(jql: string, token: string): boolean {
  const escaped = token.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
  return new RegExp(`(^|[^A-Za-z0-9_-])"?${escaped}"?($|[^A-Za-z0-9_-])`, 'i').test(jql)
}
