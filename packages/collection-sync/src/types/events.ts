/**
 * @fileoverview Change Event Types
 *
 * Normalized representations of remote document changes and of the deltas
 * the reconciler hands to observers.
 *
 * - {@link RemoteChange}: what a remote store delivers on its live stream
 * - {@link ChangeEvent}: a remote change after the reconciler stamped it with
 *   its collection and sequence number
 * - {@link Delta}: the net observable change produced by reconciling one event
 *
 * @packageDocumentation
 * @module @docsync/collection-sync/types/events
 */

import type { CollectionName, Document, DocumentId } from './document.js'

// ============================================================================
// Change Kinds
// ============================================================================

/**
 * The three kinds of change a live stream can report.
 */
export type ChangeKind = 'added' | 'modified' | 'removed'

/**
 * All change kinds, in lifecycle order.
 */
export const CHANGE_KINDS: readonly ChangeKind[] = ['added', 'modified', 'removed']

// ============================================================================
// Remote Changes
// ============================================================================

/**
 * A document was added or modified on the remote store.
 *
 * @example
 * ```typescript
 * const change: RemoteUpsert = {
 *   kind: 'added',
 *   id: 'p1',
 *   document: { name: 'Fit-out', updatedAt: new Date() },
 * }
 * ```
 */
export interface RemoteUpsert {
  /** Discriminator for upserts */
  kind: 'added' | 'modified'
  /** Id of the affected document */
  id: DocumentId
  /** Full document content after the change */
  document: Document
}

/**
 * A document was removed from the remote store.
 */
export interface RemoteRemoval {
  /** Discriminator for removals */
  kind: 'removed'
  /** Id of the removed document */
  id: DocumentId
}

/**
 * A change notification as delivered by a remote store's live stream.
 */
export type RemoteChange = RemoteUpsert | RemoteRemoval

/**
 * A remote change after it reached the reconciler.
 *
 * `sequence` is assigned from a per-collection monotonic counter at the moment
 * the reconciler processes the change, not by the remote store.
 */
export type ChangeEvent = RemoteChange & {
  /** Collection the change belongs to */
  collection: CollectionName
  /** Per-collection processing order */
  sequence: number
}

// ============================================================================
// Deltas
// ============================================================================

/**
 * The minimal observable change produced by reconciling one event.
 *
 * `before` and `after` are deep-frozen; observers may keep them but cannot
 * mutate them.
 *
 * @example
 * ```typescript
 * function render(delta: Delta): void {
 *   switch (delta.kind) {
 *     case 'added':
 *       table.insertRow(delta.id, delta.after)
 *       break
 *     case 'modified':
 *       table.updateRow(delta.id, delta.after)
 *       break
 *     case 'removed':
 *       table.deleteRow(delta.id)
 *       break
 *   }
 * }
 * ```
 */
export interface Delta {
  /** Collection the delta belongs to */
  readonly collection: CollectionName
  /** Net change kind, derived from `before`/`after` */
  readonly kind: ChangeKind
  /** Id of the affected document */
  readonly id: DocumentId
  /** Document before the change, absent for `added` */
  readonly before?: Readonly<Document>
  /** Document after the change, absent for `removed` */
  readonly after?: Readonly<Document>
  /** Sequence number of the event that produced this delta */
  readonly sequence: number
}

// ============================================================================
// Type Guards
// ============================================================================

/**
 * Narrows a remote change to an upsert carrying a document.
 *
 * @example
 * ```typescript
 * if (isRemoteUpsert(change)) {
 *   console.log(change.document.updatedAt)
 * }
 * ```
 */
export function isRemoteUpsert(change: RemoteChange): change is RemoteUpsert {
  return change.kind !== 'removed'
}

/**
 * Narrows a remote change to a removal.
 */
export function isRemoteRemoval(change: RemoteChange): change is RemoteRemoval {
  return change.kind === 'removed'
}

/**
 * Checks whether a value is one of the known {@link ChangeKind}s.
 */
export function isChangeKind(value: unknown): value is ChangeKind {
  return CHANGE_KINDS.some((kind) => kind === value)
}
