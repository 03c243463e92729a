/**
 * @file Snapshot Queries
 *
 * Filtering, ordering and limiting over the documents of a local snapshot.
 * Filters are equality matches on (dot-separated) field paths; ordering is on
 * a single field.
 *
 * Values of different types order by type first:
 * missing/null < boolean < number < string < timestamp < list < map.
 *
 * @module @docsync/collection-sync/query/snapshot-query
 */

import type { FieldValue, StoredDocument } from '../types/document.js'
import type { QueryOptions, QueryResult } from '../types/index.js'
import { deepEqual, getFieldValue, isPlainObject } from '../document/values.js'

// =============================================================================
// Comparison
// =============================================================================

function typeRank(value: FieldValue | undefined): number {
  if (value === undefined || value === null) return 0
  if (typeof value === 'boolean') return 1
  if (typeof value === 'number') return 2
  if (typeof value === 'string') return 3
  if (value instanceof Date) return 4
  if (Array.isArray(value)) return 5
  return 6
}

/**
 * Total order over field values.
 *
 * @returns Negative if a < b, positive if a > b, 0 if equal
 *
 * @example
 * ```typescript
 * compareFieldValues(1, 2) // < 0
 * compareFieldValues(null, 'a') // < 0
 * compareFieldValues(new Date(5), new Date(5)) // 0
 * ```
 */
export function compareFieldValues(a: FieldValue | undefined, b: FieldValue | undefined): number {
  const rankDiff = typeRank(a) - typeRank(b)
  if (rankDiff !== 0) {
    return rankDiff
  }

  if (typeof a === 'boolean' && typeof b === 'boolean') {
    return Number(a) - Number(b)
  }
  if (typeof a === 'number' && typeof b === 'number') {
    return a - b
  }
  if (typeof a === 'string' && typeof b === 'string') {
    return a < b ? -1 : a > b ? 1 : 0
  }
  if (a instanceof Date && b instanceof Date) {
    return a.getTime() - b.getTime()
  }
  if (Array.isArray(a) && Array.isArray(b)) {
    const length = Math.min(a.length, b.length)
    for (let i = 0; i < length; i++) {
      const diff = compareFieldValues(a[i], b[i])
      if (diff !== 0) return diff
    }
    return a.length - b.length
  }
  if (isPlainObject(a) && isPlainObject(b)) {
    return compareFieldValues(JSON.stringify(a), JSON.stringify(b))
  }
  return 0
}

// =============================================================================
// Query
// =============================================================================

/**
 * Runs a query over snapshot entries.
 *
 * Ties in ordering keep snapshot order. Without `orderBy` results follow
 * snapshot order.
 *
 * @example
 * ```typescript
 * runSnapshotQuery(engine.entries('projects'), {
 *   where: { status: 'in_progress' },
 *   orderBy: { field: 'createdAt', direction: 'desc' },
 *   limit: 5,
 * })
 * ```
 */
export function runSnapshotQuery(
  entries: readonly StoredDocument[],
  options: QueryOptions = {}
): QueryResult[] {
  const filters = Object.entries(options.where ?? {})

  let results: QueryResult[] = entries
    .filter(({ document }) =>
      filters.every(([field, expected]) => deepEqual(getFieldValue(document, field), expected))
    )
    .map(({ id, document }) => ({ id, document }))

  if (options.orderBy) {
    const { field, direction = 'asc' } = options.orderBy
    const sign = direction === 'desc' ? -1 : 1
    results = results
      .map((result, index) => ({ result, index, key: getFieldValue(result.document, field) }))
      .sort((a, b) => sign * compareFieldValues(a.key, b.key) || a.index - b.index)
      .map(({ result }) => result)
  }

  if (options.limit !== undefined) {
    results = results.slice(0, Math.max(0, options.limit))
  }

  return results
}
