/**
 * @file Sync Engine
 *
 * The facade applications talk to. It wires the subscription registry,
 * reconciler, dispatcher, reconnection supervisor and mutation gateway around
 * one injected remote store:
 *
 * ```
 * subscribe ─▶ registry ─open─▶ supervisor ─stream/listing─▶ reconciler
 *                                                              │ delta
 *                           observers ◀── dispatcher ◀─────────┘
 * create/update/remove ─▶ gateway ─▶ store ─echo─▶ (stream path above)
 * ```
 *
 * @module @docsync/collection-sync/sync/engine
 */

import { EventEmitter } from 'events'
import type { CollectionName, Document, DocumentId, StoredDocument } from '../types/document.js'
import type { ChangeEvent, Delta, RemoteChange } from '../types/events.js'
import type {
  CollectionSnapshot,
  CreateOptions,
  ObserveOptions,
  Observer,
  PendingMutation,
  QueryOptions,
  QueryResult,
  StatusChange,
  SubscriptionHandle,
  SubscriptionStatus,
} from '../types/index.js'
import type { SyncEngineOptions, SyncEngineSettings } from '../config.js'
import { resolveEngineOptions } from '../config.js'
import type { Logger } from '../logger.js'
import { resolveLogger } from '../logger.js'
import { EngineDisposedError, SyncError, toError } from '../errors.js'
import { runSnapshotQuery } from '../query/snapshot-query.js'
import { assertCollectionName } from './collection-name.js'
import { EventDispatcher } from './dispatcher.js'
import { MutationGateway } from './mutation-gateway.js'
import { Reconciler } from './reconciler.js'
import type { RegistryHandle, SubscriptionInfo } from './registry.js'
import { SubscriptionRegistry } from './registry.js'
import { ReconnectionSupervisor } from './reconnection.js'

// =============================================================================
// Engine
// =============================================================================

/**
 * Keeps local readers consistent with a remote document store.
 *
 * `statusChange` and `delta` listeners run synchronously on the stream path,
 * before observers are called, and should return quickly. Observers are the
 * non-blocking way to consume deltas.
 *
 * @fires SyncEngine#statusChange - A subscription changed state (`StatusChange`), synchronously
 * @fires SyncEngine#delta - The reconciler produced a delta (`Delta`), synchronously
 * @fires SyncEngine#observerError - An observer threw or rejected (`ObserverFailureError`)
 *
 * @example
 * ```typescript
 * const engine = createSyncEngine({ store: new InMemoryRemoteStore() })
 *
 * const handle = engine.subscribe('clients', (delta) => {
 *   console.log(delta.kind, delta.id, delta.after)
 * })
 *
 * await engine.ready('clients')
 * const id = await engine.create('clients', { name: 'Acme' })
 *
 * engine.unsubscribe(handle)
 * engine.dispose()
 * ```
 */
export class SyncEngine extends EventEmitter {
  private readonly settings: SyncEngineSettings
  private readonly logger: Logger
  private readonly registry = new SubscriptionRegistry()
  private readonly reconciler: Reconciler
  private readonly dispatcher: EventDispatcher
  private readonly supervisor: ReconnectionSupervisor
  private readonly gateway: MutationGateway
  private readonly handles = new Map<number, RegistryHandle>()
  private _disposed = false

  constructor(options: SyncEngineOptions) {
    super()
    const resolved = resolveEngineOptions(options)
    this.settings = {
      backoff: resolved.backoff,
      pendingMutationTimeoutMs: resolved.pendingMutationTimeoutMs,
      resyncBufferSize: resolved.resyncBufferSize,
      replayOnSubscribe: resolved.replayOnSubscribe,
      debug: resolved.debug,
    }
    this.logger = resolveLogger(resolved.logger, resolved.debug)

    this.reconciler = new Reconciler({ logger: this.logger })
    this.dispatcher = new EventDispatcher({
      logger: this.logger,
      onObserverError: (error) => this.safeEmit('observerError', error),
    })
    this.gateway = new MutationGateway({
      store: resolved.store,
      timeoutMs: resolved.pendingMutationTimeoutMs,
      clock: resolved.clock,
      schemas: resolved.schemas,
      logger: this.logger,
    })
    this.supervisor = new ReconnectionSupervisor({
      store: resolved.store,
      backoff: resolved.backoff,
      resyncBufferSize: resolved.resyncBufferSize,
      random: resolved.random,
      logger: this.logger,
      sink: {
        apply: (collection, change) => this.ingest(collection, change),
        reconcile: (collection, listing, { freshStream }) =>
          this.ingestListing(collection, listing, freshStream),
        setStatus: (collection, status) => {
          this.registry.setStatus(collection, status)
        },
      },
    })

    this.registry.on('open', (info: SubscriptionInfo) => {
      this.logger.debug('Subscription opened', { collection: info.collection })
      void this.supervisor.start(info.collection, info.signal)
    })
    this.registry.on('statusChange', (change: StatusChange) => {
      this.logger.debug('Subscription status changed', { ...change })
      this.dispatcher.dispatchStatus(change)
      this.safeEmit('statusChange', change)
    })
    this.registry.on('close', (collection: CollectionName) => {
      this.logger.debug('Subscription closed', { collection })
      for (const [id, handle] of this.handles) {
        if (handle.collection === collection) {
          this.handles.delete(id)
        }
      }
      this.dispatcher.release(collection)
      this.reconciler.drop(collection)
    })
  }

  /**
   * Whether {@link dispose} has been called.
   */
  get disposed(): boolean {
    return this._disposed
  }

  // ===========================================================================
  // Subscriptions
  // ===========================================================================

  /**
   * Registers an observer on a collection, opening the collection's
   * subscription if this is its first observer.
   *
   * Unless `replay` is disabled, the observer first receives the documents
   * already held as `added` deltas.
   *
   * @throws {InvalidCollectionError} If the collection name is invalid
   * @throws {EngineDisposedError} After `dispose()`
   */
  subscribe(
    collection: CollectionName,
    observer: Observer,
    options: ObserveOptions = {}
  ): SubscriptionHandle {
    this.assertActive('subscribe')

    const registryHandle = this.registry.subscribe(collection)
    const replay = options.replay ?? this.settings.replayOnSubscribe
    const handle = this.dispatcher.register(
      collection,
      observer,
      replay ? this.replayDeltas(collection) : []
    )
    this.handles.set(handle.id, registryHandle)

    return handle
  }

  /**
   * Removes an observer. The collection's subscription closes when its last
   * observer leaves. Unsubscribing twice has no effect.
   */
  unsubscribe(handle: SubscriptionHandle): void {
    const registryHandle = this.handles.get(handle.id)
    if (!registryHandle || registryHandle.collection !== handle.collection) {
      return
    }
    this.handles.delete(handle.id)
    this.dispatcher.unregister(handle)
    this.registry.unsubscribe(registryHandle)
  }

  /**
   * Current state of a collection's subscription; `closed` if there is none.
   */
  subscriptionState(collection: CollectionName): SubscriptionStatus {
    return this.registry.status(collection)
  }

  /**
   * Resolves once the collection's subscription is `active`.
   *
   * @throws {SyncError} If there is no open subscription, or it closes first
   */
  ready(collection: CollectionName): Promise<void> {
    const status = this.registry.status(collection)
    if (status === 'active') {
      return Promise.resolve()
    }
    if (status === 'closed') {
      return Promise.reject(
        new SyncError(`No open subscription for "${collection}"`, { collection })
      )
    }

    return new Promise<void>((resolve, reject) => {
      const onStatus = (change: StatusChange): void => {
        if (change.collection !== collection) {
          return
        }
        if (change.status === 'active') {
          this.off('statusChange', onStatus)
          resolve()
        } else if (change.status === 'closed') {
          this.off('statusChange', onStatus)
          reject(new SyncError(`Subscription for "${collection}" closed before it became active`, {
            collection,
          }))
        }
      }
      this.on('statusChange', onStatus)
    })
  }

  /**
   * Forces a full resync of a subscribed collection.
   */
  resync(collection: CollectionName): Promise<void> {
    this.assertActive('resync')
    return this.supervisor.resync(collection)
  }

  /**
   * Names of every collection with an open subscription.
   */
  collections(): CollectionName[] {
    return this.registry.collections()
  }

  // ===========================================================================
  // Mutations
  // ===========================================================================

  /**
   * Creates a document. Resolves on remote acknowledgement; the `added` delta
   * follows through the live stream.
   */
  create(collection: CollectionName, document: Document, options?: CreateOptions): Promise<DocumentId> {
    this.assertActive('create')
    return this.gateway.create(collection, document, options)
  }

  /**
   * Merges fields into a document and bumps its `updatedAt`.
   */
  update(collection: CollectionName, id: DocumentId, fields: Partial<Document>): Promise<void> {
    this.assertActive('update')
    return this.gateway.update(collection, id, fields)
  }

  /**
   * Deletes a document.
   */
  remove(collection: CollectionName, id: DocumentId): Promise<void> {
    this.assertActive('remove')
    return this.gateway.remove(collection, id)
  }

  /**
   * Writes still waiting for their echo.
   */
  pendingMutations(collection?: CollectionName): PendingMutation[] {
    return this.gateway.pending(collection)
  }

  // ===========================================================================
  // Reads
  // ===========================================================================

  /**
   * Frozen copy of a collection's snapshot.
   */
  snapshot(collection: CollectionName): CollectionSnapshot {
    assertCollectionName(collection)
    return this.reconciler.snapshot(collection)
  }

  /**
   * Frozen copy of one document, if held.
   */
  get(collection: CollectionName, id: DocumentId): Readonly<Document> | undefined {
    assertCollectionName(collection)
    return this.reconciler.get(collection, id)
  }

  /**
   * Queries the local snapshot with equality filters, ordering and a limit.
   */
  query(collection: CollectionName, options: QueryOptions = {}): QueryResult[] {
    assertCollectionName(collection)
    return runSnapshotQuery(this.reconciler.entries(collection), options)
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * Resolves once in-flight attaches and resyncs have finished and every
   * queued delta has been handed to observers.
   */
  async idle(collection?: CollectionName): Promise<void> {
    const collections = collection === undefined ? this.registry.collections() : [collection]
    await Promise.all(collections.map((name) => this.supervisor.settled(name)))
    await this.dispatcher.idle(collection)
  }

  /**
   * Closes every subscription, cancels streams and timers and drops pending
   * mutations. Observers still registered receive the `closed` status along
   * with anything already queued for them. Further calls throw
   * {@link EngineDisposedError}.
   */
  dispose(): void {
    if (this._disposed) {
      return
    }
    this._disposed = true
    this.registry.closeAll()
    this.supervisor.stopAll()
    this.gateway.clear()
    this.dispatcher.release()
    this.reconciler.clear()
    this.handles.clear()
    this.registry.removeAllListeners()
    this.logger.debug('Sync engine disposed')
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private assertActive(operation: string): void {
    if (this._disposed) {
      throw new EngineDisposedError(operation)
    }
  }

  private replayDeltas(collection: CollectionName): Delta[] {
    const sequence = this.reconciler.lastSequence(collection)
    return this.reconciler.entries(collection).map(({ id, document }) => ({
      collection,
      kind: 'added',
      id,
      after: document,
      sequence,
    }))
  }

  private ingest(collection: CollectionName, change: RemoteChange): void {
    if (this.registry.status(collection) === 'closed') {
      return
    }
    const { event, delta } = this.reconciler.process(collection, change)
    this.settle(event, delta)
  }

  private ingestListing(collection: CollectionName, listing: StoredDocument[], freshStream: boolean): void {
    if (this.registry.status(collection) === 'closed') {
      return
    }
    const results = this.reconciler.resyncWithEvents(collection, listing, {
      pruneTombstones: freshStream,
    })
    for (const { event, delta } of results) {
      // A listener may close the subscription mid-listing.
      if (this.registry.status(collection) === 'closed') {
        return
      }
      this.settle(event, delta)
    }
  }

  private settle(event: ChangeEvent, delta: Delta | undefined): void {
    this.gateway.observe(event)
    if (!delta) {
      return
    }
    this.dispatcher.dispatch(delta.collection, delta)
    this.safeEmit('delta', delta)
  }

  /**
   * Emits an event without letting a throwing listener reach the stream path.
   */
  private safeEmit(event: 'statusChange' | 'delta' | 'observerError', payload: unknown): void {
    try {
      this.emit(event, payload)
    } catch (error) {
      this.logger.error(`A "${event}" listener threw`, { error: toError(error).message })
    }
  }
}

/**
 * Creates a {@link SyncEngine}.
 *
 * @throws {SyncError} If the options are invalid
 *
 * @example
 * ```typescript
 * const engine = createSyncEngine({
 *   store: new RpcRemoteStore({ client }),
 *   backoff: { maxDelayMs: 15000 },
 *   pendingMutationTimeoutMs: 5000,
 * })
 * ```
 */
export function createSyncEngine(options: SyncEngineOptions): SyncEngine {
  return new SyncEngine(options)
}
