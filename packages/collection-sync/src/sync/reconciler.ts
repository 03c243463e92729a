/**
 * @file Reconciler
 *
 * Owns the authoritative in-memory snapshot of every subscribed collection and
 * turns remote changes into minimal deltas. It is the single place where a
 * snapshot is mutated, so it is also the single place that guarantees a
 * snapshot never regresses:
 *
 * - every processed change gets the next per-collection sequence number
 * - an upsert older than the held version is discarded (last-write-wins on
 *   `updatedAt`)
 * - an upsert identical to the held version is a duplicate
 * - a removal of an absent id is a no-op
 * - a removed document cannot be resurrected by a change that is not newer
 *   than the version that was removed (tombstones)
 *
 * Documents are deep-copied and frozen on the way in; every document handed
 * out (deltas, snapshots, lookups) is a separate frozen copy.
 *
 * @module @docsync/collection-sync/sync/reconciler
 */

import type { CollectionName, Document, DocumentId, StoredDocument } from '../types/document.js'
import type { ChangeEvent, Delta, RemoteChange } from '../types/events.js'
import type { CollectionSnapshot } from '../types/index.js'
import type { Logger } from '../logger.js'
import { silentLogger } from '../logger.js'
import { frozenCopy } from '../document/values.js'
import { extractTimestamp, resolveLastWriteWins } from './conflict/last-write-wins.js'

// =============================================================================
// Types
// =============================================================================

/**
 * Result of processing one remote change.
 */
export interface ReconcileResult {
  /** The change, stamped with its collection and sequence number */
  event: ChangeEvent
  /** The net observable change, absent when the event was a no-op */
  delta?: Delta
}

/**
 * Options for {@link Reconciler}.
 */
export interface ReconcilerOptions {
  logger?: Logger
  /** Tombstones kept per collection; the oldest go first. @default 10000 */
  maxTombstones?: number
}

/**
 * Options for {@link Reconciler.resyncWithEvents}.
 */
export interface ResyncOptions {
  /**
   * Forget every tombstone once the listing is applied. Only safe when no
   * change older than the listing can still arrive.
   */
  pruneTombstones?: boolean
}

interface CollectionState {
  sequence: number
  documents: Map<DocumentId, Readonly<Document>>
  /** `updatedAt` (ms) of removed documents */
  tombstones: Map<DocumentId, number>
}

// =============================================================================
// Reconciler
// =============================================================================

/**
 * Applies remote changes to per-collection snapshots.
 *
 * @example
 * ```typescript
 * const reconciler = new Reconciler()
 *
 * reconciler.apply('projects', { kind: 'added', id: 'p1', document: { updatedAt: t1 } })
 * // { collection: 'projects', kind: 'added', id: 'p1', after: {...}, sequence: 1 }
 *
 * reconciler.apply('projects', { kind: 'modified', id: 'p1', document: { updatedAt: t0 } })
 * // undefined (older than the held version)
 * ```
 */
export class Reconciler {
  private readonly states = new Map<CollectionName, CollectionState>()
  private readonly logger: Logger
  private readonly maxTombstones: number

  constructor(options: ReconcilerOptions = {}) {
    this.logger = options.logger ?? silentLogger
    this.maxTombstones = options.maxTombstones ?? 10000
  }

  /**
   * Applies a single remote change and returns the resulting delta, if any.
   */
  apply(collection: CollectionName, change: RemoteChange): Delta | undefined {
    return this.process(collection, change).delta
  }

  /**
   * Applies a single remote change and returns both the sequenced event and
   * the delta it produced.
   */
  process(collection: CollectionName, change: RemoteChange): ReconcileResult {
    return this.processChange(collection, change, false)
  }

  /**
   * Reconciles a full listing against the current snapshot.
   *
   * Each listed document is applied as a synthetic `added` or `modified`
   * change; every held document missing from the listing is then removed.
   * The listing is authoritative, so it may restore ids that were removed
   * locally.
   *
   * @returns The deltas produced, in application order
   */
  resync(
    collection: CollectionName,
    listing: readonly StoredDocument[],
    options?: ResyncOptions
  ): Delta[] {
    return this.resyncWithEvents(collection, listing, options).flatMap((result) =>
      result.delta ? [result.delta] : []
    )
  }

  /**
   * Like {@link resync}, but returns every sequenced event alongside its delta.
   */
  resyncWithEvents(
    collection: CollectionName,
    listing: readonly StoredDocument[],
    options: ResyncOptions = {}
  ): ReconcileResult[] {
    const state = this.state(collection)
    const results: ReconcileResult[] = []
    const listed = new Set<DocumentId>()

    for (const { id, document } of listing) {
      listed.add(id)
      const kind = state.documents.has(id) ? 'modified' : 'added'
      results.push(this.processChange(collection, { kind, id, document }, true))
    }

    for (const id of [...state.documents.keys()]) {
      if (!listed.has(id)) {
        results.push(this.processChange(collection, { kind: 'removed', id }, true))
      }
    }

    if (options.pruneTombstones) {
      state.tombstones.clear()
    }

    const changed = results.filter((result) => result.delta !== undefined).length
    this.logger.debug('Resync reconciled', {
      collection,
      listed: listing.length,
      deltas: changed,
    })

    return results
  }

  // ===========================================================================
  // Reads
  // ===========================================================================

  /**
   * Returns a frozen copy of a collection's snapshot.
   */
  snapshot(collection: CollectionName): CollectionSnapshot {
    const state = this.states.get(collection)
    const documents = new Map<DocumentId, Readonly<Document>>()
    if (state) {
      for (const [id, document] of state.documents) {
        documents.set(id, frozenCopy(document))
      }
    }
    return Object.freeze({
      collection,
      lastSequence: state?.sequence ?? 0,
      documents,
    })
  }

  /**
   * Returns a frozen copy of one document, if held.
   */
  get(collection: CollectionName, id: DocumentId): Readonly<Document> | undefined {
    const document = this.states.get(collection)?.documents.get(id)
    return document ? frozenCopy(document) : undefined
  }

  /**
   * Returns frozen copies of every held document, in insertion order.
   */
  entries(collection: CollectionName): StoredDocument[] {
    const state = this.states.get(collection)
    if (!state) {
      return []
    }
    return [...state.documents].map(([id, document]) => ({ id, document: frozenCopy(document) }))
  }

  /**
   * Number of documents held for a collection.
   */
  size(collection: CollectionName): number {
    return this.states.get(collection)?.documents.size ?? 0
  }

  /**
   * Sequence number of the last processed change.
   */
  lastSequence(collection: CollectionName): number {
    return this.states.get(collection)?.sequence ?? 0
  }

  /**
   * Number of removed documents still remembered for a collection.
   */
  tombstoneCount(collection: CollectionName): number {
    return this.states.get(collection)?.tombstones.size ?? 0
  }

  /**
   * Forgets everything held for a collection.
   */
  drop(collection: CollectionName): void {
    this.states.delete(collection)
  }

  /**
   * Forgets every collection.
   */
  clear(): void {
    this.states.clear()
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private state(collection: CollectionName): CollectionState {
    let state = this.states.get(collection)
    if (!state) {
      state = { sequence: 0, documents: new Map(), tombstones: new Map() }
      this.states.set(collection, state)
    }
    return state
  }

  private remember(state: CollectionState, id: DocumentId, removedAt: number): void {
    state.tombstones.delete(id)
    state.tombstones.set(id, removedAt)
    for (const oldest of state.tombstones.keys()) {
      if (state.tombstones.size <= this.maxTombstones) {
        break
      }
      state.tombstones.delete(oldest)
    }
  }

  private processChange(
    collection: CollectionName,
    change: RemoteChange,
    authoritative: boolean
  ): ReconcileResult {
    const state = this.state(collection)
    state.sequence += 1
    const sequence = state.sequence
    const event: ChangeEvent = { ...change, collection, sequence }

    if (change.kind === 'removed') {
      const before = state.documents.get(change.id)
      if (!before) {
        return { event }
      }
      state.documents.delete(change.id)
      const removedAt = extractTimestamp(before)
      if (removedAt > 0) {
        this.remember(state, change.id, removedAt)
      }
      return {
        event,
        delta: { collection, kind: 'removed', id: change.id, before: frozenCopy(before), sequence },
      }
    }

    const current = state.documents.get(change.id)
    const incomingAt = extractTimestamp(change.document)

    if (!current && !authoritative) {
      const removedAt = state.tombstones.get(change.id)
      if (removedAt !== undefined && incomingAt <= removedAt) {
        this.logger.debug('Discarded change for removed document', {
          collection,
          id: change.id,
          sequence,
        })
        return { event }
      }
    }

    const outcome = resolveLastWriteWins(current, change.document)
    if (outcome !== 'incoming') {
      this.logger.debug(`Discarded ${outcome} change`, { collection, id: change.id, sequence })
      return { event }
    }

    const stored = frozenCopy(change.document)
    state.documents.set(change.id, stored)
    state.tombstones.delete(change.id)

    return {
      event,
      delta: current
        ? {
            collection,
            kind: 'modified',
            id: change.id,
            before: frozenCopy(current),
            after: frozenCopy(stored),
            sequence,
          }
        : { collection, kind: 'added', id: change.id, after: frozenCopy(stored), sequence },
    }
  }
}
