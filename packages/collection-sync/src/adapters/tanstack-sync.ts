/**
 * @file TanStack DB Sync Adapter
 *
 * Feeds a TanStack DB collection from a sync engine subscription. The UI layer
 * is just another observer: every delta becomes a TanStack DB change message.
 *
 * While the subscription is not `active` (initial load, resync after a
 * reconnect) deltas are grouped into one sync transaction, committed when the
 * subscription becomes `active`. The collection is marked ready the first time
 * that happens.
 *
 * @module @docsync/collection-sync/adapters/tanstack-sync
 */

import type { CollectionName, Document, DocumentId } from '../types/document.js'
import type { Delta } from '../types/events.js'
import type { ChangeMessage, StatusChange, SyncCallbacks, SyncObserver, SyncReturn } from '../types/index.js'
import type { SyncEngine } from '../sync/engine.js'

// =============================================================================
// Types
// =============================================================================

/**
 * Default row shape: the document's fields plus its id.
 */
export type SyncedRow = Document & { id: DocumentId }

/**
 * Options for {@link createLiveCollectionSync}.
 *
 * @typeParam T - The row type of the TanStack DB collection
 */
export interface LiveCollectionSyncOptions<T> {
  /** Converts a synced document to a collection row */
  toRow: (id: DocumentId, document: Readonly<Document>) => T
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Default row conversion.
 */
export function toSyncedRow(id: DocumentId, document: Readonly<Document>): SyncedRow {
  return { ...document, id }
}

/**
 * Converts a delta to a TanStack DB change message.
 *
 * @returns `undefined` for a delta missing the document its kind requires
 */
export function deltaToChangeMessage<T>(
  delta: Delta,
  toRow: (id: DocumentId, document: Readonly<Document>) => T
): ChangeMessage<T> | undefined {
  const metadata = { sequence: delta.sequence }

  switch (delta.kind) {
    case 'added':
      return delta.after
        ? { type: 'insert', key: delta.id, value: toRow(delta.id, delta.after), metadata }
        : undefined
    case 'modified':
      return delta.after
        ? {
            type: 'update',
            key: delta.id,
            value: toRow(delta.id, delta.after),
            previousValue: delta.before ? toRow(delta.id, delta.before) : undefined,
            metadata,
          }
        : undefined
    case 'removed':
      return delta.before
        ? { type: 'delete', key: delta.id, value: toRow(delta.id, delta.before), metadata }
        : undefined
  }
}

// =============================================================================
// Main Export
// =============================================================================

/**
 * Creates a TanStack DB sync function backed by an engine subscription.
 *
 * @example
 * ```typescript
 * import { createCollection } from '@tanstack/db'
 *
 * const projects = createCollection({
 *   id: 'projects',
 *   getKey: (row: ProjectRow) => row.id,
 *   sync: {
 *     sync: createLiveCollectionSync(engine, 'projects', {
 *       toRow: (id, doc) => projectRowSchema.parse({ ...doc, id }),
 *     }),
 *   },
 * })
 * ```
 */
export function createLiveCollectionSync<T extends object>(
  engine: SyncEngine,
  collection: CollectionName,
  options: LiveCollectionSyncOptions<T>
): (params: SyncCallbacks<T>) => SyncReturn {
  const { toRow } = options

  return function sync(params: SyncCallbacks<T>): SyncReturn {
    const { begin, write, commit, markReady } = params

    let isReady = false
    let isLive = engine.subscriptionState(collection) === 'active'
    let inTransaction = false
    let isCleanedUp = false

    const settle = (): void => {
      if (inTransaction) {
        commit()
        inTransaction = false
      }
      if (!isReady) {
        isReady = true
        markReady()
      }
    }

    const observer: SyncObserver = {
      onDelta: (delta) => {
        const message = deltaToChangeMessage(delta, toRow)
        if (isCleanedUp || !message) {
          return
        }
        if (isLive && !inTransaction) {
          begin()
          write(message)
          commit()
          return
        }
        if (!inTransaction) {
          begin()
          inTransaction = true
        }
        write(message)
      },
      onStatusChange: (change: StatusChange) => {
        if (isCleanedUp) {
          return
        }
        isLive = change.status === 'active'
        if (isLive) {
          settle()
        }
      },
    }

    const handle = engine.subscribe(collection, observer, { replay: false })

    const existing = engine.snapshot(collection).documents
    if (existing.size > 0) {
      begin()
      for (const [id, document] of existing) {
        write({ type: 'insert', key: id, value: toRow(id, document) })
      }
      inTransaction = true
    }
    if (isLive) {
      settle()
    }

    return {
      cleanup: () => {
        if (isCleanedUp) {
          return
        }
        isCleanedUp = true
        engine.unsubscribe(handle)
        if (inTransaction) {
          commit()
          inTransaction = false
        }
      },
    }
  }
}

/**
 * {@link createLiveCollectionSync} with the default {@link SyncedRow} shape.
 */
export function createDocumentCollectionSync(
  engine: SyncEngine,
  collection: CollectionName
): (params: SyncCallbacks<SyncedRow>) => SyncReturn {
  return createLiveCollectionSync(engine, collection, { toRow: toSyncedRow })
}
