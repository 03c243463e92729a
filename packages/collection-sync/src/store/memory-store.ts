/**
 * @file In-Memory Remote Store
 *
 * A {@link RemoteStore} that keeps collections in process memory. Useful for
 * local development without a backend, for demos seeded from fixture data and
 * as the store behind the test suite.
 *
 * Live changes are delivered synchronously, before the write that caused them
 * resolves. Fault injection helpers simulate dropped streams, failing writes
 * and listings, and raw (possibly stale or duplicated) stream deliveries.
 *
 * @module @docsync/collection-sync/store/memory-store
 */

import { randomUUID } from 'crypto'
import type { CollectionName, Document, DocumentId, StoredDocument } from '../types/document.js'
import type { RemoteChange } from '../types/events.js'
import type { CancelStream, RemoteStore, WriteOptions } from './remote-store.js'
import { cloneDocument } from '../document/values.js'
import { StreamDisconnectedError } from '../errors.js'

// =============================================================================
// Types
// =============================================================================

/**
 * Options for {@link InMemoryRemoteStore}.
 */
export interface InMemoryRemoteStoreOptions {
  /** Documents to start with, keyed by collection */
  initialData?: Record<CollectionName, StoredDocument[]>
  /** Id generator for writes without an id. @default randomUUID */
  generateId?: () => DocumentId
}

interface StreamListener {
  onEvent: (change: RemoteChange) => void
  onError: (error: Error) => void
}

// =============================================================================
// Store
// =============================================================================

/**
 * In-process remote store with live streams and fault injection.
 *
 * @example
 * ```typescript
 * const store = new InMemoryRemoteStore({
 *   initialData: {
 *     projects: [{ id: 'p1', document: { name: 'Fit-out', updatedAt: new Date() } }],
 *   },
 * })
 *
 * const engine = createSyncEngine({ store })
 *
 * // Simulate a network drop
 * store.failStreams('projects')
 * ```
 */
export class InMemoryRemoteStore implements RemoteStore {
  private readonly data = new Map<CollectionName, Map<DocumentId, Document>>()
  private readonly streams = new Map<CollectionName, Set<StreamListener>>()
  private readonly generateId: () => DocumentId
  private pendingWriteFailures: Error[] = []
  private pendingListFailures: Error[] = []
  private pendingStreamFailures: Error[] = []

  constructor(options: InMemoryRemoteStoreOptions = {}) {
    this.generateId = options.generateId ?? randomUUID
    for (const [collection, documents] of Object.entries(options.initialData ?? {})) {
      this.seed(collection, documents)
    }
  }

  // ===========================================================================
  // RemoteStore
  // ===========================================================================

  streamCollection(
    collection: CollectionName,
    onEvent: (change: RemoteChange) => void,
    onError: (error: Error) => void
  ): CancelStream {
    const failure = this.pendingStreamFailures.shift()
    if (failure) {
      throw failure
    }

    const listener: StreamListener = { onEvent, onError }
    let listeners = this.streams.get(collection)
    if (!listeners) {
      listeners = new Set()
      this.streams.set(collection, listeners)
    }
    listeners.add(listener)

    return () => {
      this.removeListener(collection, listener)
    }
  }

  async listCollection(collection: CollectionName): Promise<StoredDocument[]> {
    const failure = this.pendingListFailures.shift()
    if (failure) {
      throw failure
    }
    return this.list(collection)
  }

  async writeDocument(
    collection: CollectionName,
    id: DocumentId | undefined,
    document: Document,
    options: WriteOptions = {}
  ): Promise<DocumentId> {
    const failure = this.pendingWriteFailures.shift()
    if (failure) {
      throw failure
    }

    const documentId = id ?? this.generateId()
    const documents = this.collection(collection)
    const existing = documents.get(documentId)
    const next = options.merge && existing ? { ...existing, ...cloneDocument(document) } : cloneDocument(document)

    documents.set(documentId, next)
    this.emit(collection, {
      kind: existing ? 'modified' : 'added',
      id: documentId,
      document: next,
    })

    return documentId
  }

  async deleteDocument(collection: CollectionName, id: DocumentId): Promise<void> {
    const failure = this.pendingWriteFailures.shift()
    if (failure) {
      throw failure
    }

    const documents = this.data.get(collection)
    if (documents?.delete(id)) {
      this.emit(collection, { kind: 'removed', id })
    }
  }

  // ===========================================================================
  // Data Access
  // ===========================================================================

  /**
   * Replaces the documents of a collection without notifying streams.
   */
  seed(collection: CollectionName, documents: readonly StoredDocument[]): void {
    const map = new Map<DocumentId, Document>()
    for (const { id, document } of documents) {
      map.set(id, cloneDocument(document))
    }
    this.data.set(collection, map)
  }

  /**
   * Copies of the documents currently stored in a collection.
   */
  list(collection: CollectionName): StoredDocument[] {
    const documents = this.data.get(collection)
    if (!documents) {
      return []
    }
    return [...documents].map(([id, document]) => ({ id, document: cloneDocument(document) }))
  }

  /**
   * Copy of one stored document.
   */
  read(collection: CollectionName, id: DocumentId): Document | undefined {
    const document = this.data.get(collection)?.get(id)
    return document ? cloneDocument(document) : undefined
  }

  /**
   * Number of open streams on a collection.
   */
  streamCount(collection: CollectionName): number {
    return this.streams.get(collection)?.size ?? 0
  }

  // ===========================================================================
  // Fault Injection
  // ===========================================================================

  /**
   * Fails every open stream on a collection, as a dropped connection would.
   */
  failStreams(collection: CollectionName, error?: Error): void {
    const listeners = this.streams.get(collection)
    if (!listeners) {
      return
    }
    this.streams.delete(collection)
    const failure = error ?? new StreamDisconnectedError(collection, { reason: 'connection lost' })
    for (const listener of listeners) {
      listener.onError(failure)
    }
  }

  /**
   * Makes the next `writeDocument` or `deleteDocument` call reject.
   */
  failNextWrite(error: Error): void {
    this.pendingWriteFailures.push(error)
  }

  /**
   * Makes the next `listCollection` call reject.
   */
  failNextList(error: Error): void {
    this.pendingListFailures.push(error)
  }

  /**
   * Makes the next `streamCollection` call throw.
   */
  failNextStream(error: Error): void {
    this.pendingStreamFailures.push(error)
  }

  /**
   * Delivers a change to open streams without touching stored data.
   */
  emitRaw(collection: CollectionName, change: RemoteChange): void {
    this.emit(collection, change)
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private collection(collection: CollectionName): Map<DocumentId, Document> {
    let documents = this.data.get(collection)
    if (!documents) {
      documents = new Map()
      this.data.set(collection, documents)
    }
    return documents
  }

  private emit(collection: CollectionName, change: RemoteChange): void {
    const listeners = this.streams.get(collection)
    if (!listeners) {
      return
    }
    for (const listener of [...listeners]) {
      listener.onEvent(
        change.kind === 'removed'
          ? { kind: 'removed', id: change.id }
          : { kind: change.kind, id: change.id, document: cloneDocument(change.document) }
      )
    }
  }

  private removeListener(collection: CollectionName, listener: StreamListener): void {
    const listeners = this.streams.get(collection)
    if (!listeners) {
      return
    }
    listeners.delete(listener)
    if (listeners.size === 0) {
      this.streams.delete(collection)
    }
  }
}
