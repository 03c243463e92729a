/**
 * @file Last-Write-Wins Conflict Resolution
 *
 * Decides whether an incoming document version replaces the one already held
 * in a snapshot. Versions are ordered by their `updatedAt` timestamp; a
 * missing or invalid timestamp counts as the epoch. When timestamps tie, the
 * incoming (later-arriving) server version wins unless it is identical, in
 * which case the event is a duplicate.
 *
 * @packageDocumentation
 * @module @docsync/collection-sync/sync/conflict/last-write-wins
 */

import type { Document } from '../../types/document.js'
import { deepEqual, isValidDate } from '../../document/values.js'

// =============================================================================
// Types
// =============================================================================

/**
 * Outcome of comparing an incoming version against the current one.
 *
 * - `'incoming'` - the incoming version replaces the current one
 * - `'stale'` - the current version is strictly newer; drop the incoming one
 * - `'duplicate'` - same timestamp and content; nothing would change
 */
export type LastWriteWinsOutcome = 'incoming' | 'stale' | 'duplicate'

/**
 * Function to extract a comparable timestamp (milliseconds) from a document.
 */
export type TimestampExtractor = (doc: Readonly<Document>) => number

// =============================================================================
// Timestamps
// =============================================================================

/**
 * Extract the `updatedAt` timestamp of a document in milliseconds.
 *
 * @returns 0 when the field is missing or not a valid date
 *
 * @example
 * ```typescript
 * extractTimestamp({ updatedAt: new Date(1_000) }) // 1000
 * extractTimestamp({ name: 'untimed' }) // 0
 * ```
 */
export const extractTimestamp: TimestampExtractor = (doc) =>
  isValidDate(doc.updatedAt) ? doc.updatedAt.getTime() : 0

/**
 * Compare two timestamps.
 *
 * @returns Negative if a < b, positive if a > b, 0 if equal
 */
export function compareTimestamps(a: number, b: number): number {
  return a - b
}

// =============================================================================
// Resolution
// =============================================================================

/**
 * Resolve a write conflict between the current snapshot entry and an incoming
 * version of the same document.
 *
 * @param current - The version currently held, if any
 * @param incoming - The version delivered by the remote store
 *
 * @example
 * ```typescript
 * const current = { status: 'open', updatedAt: new Date(2000) }
 * resolveLastWriteWins(current, { status: 'draft', updatedAt: new Date(1000) }) // 'stale'
 * resolveLastWriteWins(current, { status: 'open', updatedAt: new Date(2000) }) // 'duplicate'
 * resolveLastWriteWins(current, { status: 'closed', updatedAt: new Date(2000) }) // 'incoming'
 * ```
 */
export function resolveLastWriteWins(
  current: Readonly<Document> | undefined,
  incoming: Readonly<Document>,
  getTimestamp: TimestampExtractor = extractTimestamp
): LastWriteWinsOutcome {
  if (current === undefined) {
    return 'incoming'
  }

  const comparison = compareTimestamps(getTimestamp(incoming), getTimestamp(current))
  if (comparison < 0) {
    return 'stale'
  }
  if (comparison === 0 && deepEqual(current, incoming)) {
    return 'duplicate'
  }
  return 'incoming'
}
