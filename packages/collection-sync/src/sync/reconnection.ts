/**
 * @file Reconnection Supervisor
 *
 * Owns the remote stream of every open subscription and keeps it alive.
 *
 * The initial attach and every recovery take the same path:
 *
 * 1. open the live stream; changes that arrive from now on are buffered
 * 2. fetch the full listing of the collection
 * 3. reconcile the listing against the snapshot
 * 4. replay the buffered changes, then go `active`
 *
 * When the stream fails (or the listing does), the stream is torn down, the
 * subscription goes `reconnecting`, and another attempt is scheduled after a
 * capped exponential backoff with jitter. Attempts never stop while the
 * subscription is open. Changes from a stream that was torn down or whose
 * subscription closed are dropped.
 *
 * ```
 *  pending ──listing applied──▶ active ──stream error──▶ reconnecting
 *                                 ▲                       │      ▲
 *                                 │                reopen │      │ failure
 *                                 └──listing applied── resyncing ┘
 * ```
 *
 * @module @docsync/collection-sync/sync/reconnection
 */

import type { CollectionName, StoredDocument } from '../types/document.js'
import type { RemoteChange } from '../types/events.js'
import type { SubscriptionStatus } from '../types/index.js'
import type { RemoteStore } from '../store/remote-store.js'
import type { BackoffSettings } from '../config.js'
import type { Logger } from '../logger.js'
import { silentLogger } from '../logger.js'
import { StreamDisconnectedError, toError } from '../errors.js'
import { calculateBackoffDelay } from './backoff.js'
import { EventBuffer } from './event-buffer.js'

// =============================================================================
// Types
// =============================================================================

/**
 * Where the supervisor delivers what it reads from the store.
 */
export interface SupervisorSink {
  /** A live change, in stream order */
  apply(collection: CollectionName, change: RemoteChange): void
  /**
   * A full listing to reconcile against the snapshot. `freshStream` is set
   * when the listing follows a newly opened stream, which will not deliver
   * anything older than the listing.
   */
  reconcile(
    collection: CollectionName,
    listing: StoredDocument[],
    options: { freshStream: boolean }
  ): void
  /** A lifecycle transition of the subscription */
  setStatus(collection: CollectionName, status: Exclude<SubscriptionStatus, 'closed'>): void
}

/**
 * Options for {@link ReconnectionSupervisor}.
 */
export interface ReconnectionSupervisorOptions {
  store: RemoteStore
  sink: SupervisorSink
  backoff: BackoffSettings
  /** Maximum number of live changes held while a listing is in flight */
  resyncBufferSize: number
  /** Uniform random source in [0, 1) for jitter */
  random?: () => number
  logger?: Logger
}

interface Session {
  collection: CollectionName
  signal: AbortSignal
  /** Bumped whenever a stream is opened or torn down */
  streamId: number
  cancelStream?: () => void
  buffer?: EventBuffer<RemoteChange>
  attempt: number
  reconnectTimer?: ReturnType<typeof setTimeout>
  inflight?: Promise<void>
  resyncRequested: boolean
  onAbort: () => void
}

// =============================================================================
// Supervisor
// =============================================================================

/**
 * Keeps one live stream per open subscription and recovers it after failures.
 *
 * @example
 * ```typescript
 * const supervisor = new ReconnectionSupervisor({
 *   store,
 *   sink: {
 *     apply: (collection, change) => engine.ingest(collection, change),
 *     reconcile: (collection, listing, options) => engine.ingestListing(collection, listing, options),
 *     setStatus: (collection, status) => registry.setStatus(collection, status),
 *   },
 *   backoff: DEFAULT_SETTINGS.backoff,
 *   resyncBufferSize: 10000,
 * })
 *
 * supervisor.start('projects', controller.signal)
 * ```
 */
export class ReconnectionSupervisor {
  private readonly sessions = new Map<CollectionName, Session>()
  private readonly store: RemoteStore
  private readonly sink: SupervisorSink
  private readonly backoff: BackoffSettings
  private readonly resyncBufferSize: number
  private readonly random: () => number
  private readonly logger: Logger

  constructor(options: ReconnectionSupervisorOptions) {
    this.store = options.store
    this.sink = options.sink
    this.backoff = options.backoff
    this.resyncBufferSize = options.resyncBufferSize
    this.random = options.random ?? Math.random
    this.logger = options.logger ?? silentLogger
  }

  /**
   * Starts supervising a subscription. Supervision ends when `signal` aborts.
   *
   * @returns A promise settling once the initial attach attempt finished
   */
  start(collection: CollectionName, signal: AbortSignal): Promise<void> {
    const existing = this.sessions.get(collection)
    if (existing) {
      return existing.inflight ?? Promise.resolve()
    }
    if (signal.aborted) {
      return Promise.resolve()
    }

    const session: Session = {
      collection,
      signal,
      streamId: 0,
      attempt: 0,
      resyncRequested: false,
      onAbort: () => this.stop(collection),
    }
    this.sessions.set(collection, session)
    signal.addEventListener('abort', session.onAbort, { once: true })

    return this.track(session, this.connect(session))
  }

  /**
   * Forces a full resync of a supervised collection. While reconnecting, the
   * pending attempt runs immediately instead.
   */
  resync(collection: CollectionName): Promise<void> {
    const session = this.sessions.get(collection)
    if (!session) {
      return Promise.resolve()
    }

    if (session.inflight) {
      // The running pass may already be past its final check.
      session.resyncRequested = true
      return session.inflight.then(() =>
        session.resyncRequested ? this.resync(collection) : undefined
      )
    }

    if (!session.cancelStream) {
      this.clearReconnectTimer(session)
      return this.track(session, this.connect(session))
    }

    this.sink.setStatus(collection, 'resyncing')
    return this.track(session, this.synchronize(session, session.streamId, false))
  }

  /**
   * Stops supervising a collection: cancels the stream and any pending
   * reconnection attempt.
   */
  stop(collection: CollectionName): void {
    const session = this.sessions.get(collection)
    if (!session) {
      return
    }
    this.sessions.delete(collection)
    session.signal.removeEventListener('abort', session.onAbort)
    this.clearReconnectTimer(session)
    this.teardownStream(session)
    this.logger.debug('Stopped supervising collection', { collection })
  }

  /**
   * Stops every supervised collection.
   */
  stopAll(): void {
    for (const collection of [...this.sessions.keys()]) {
      this.stop(collection)
    }
  }

  /**
   * Whether a collection is supervised.
   */
  has(collection: CollectionName): boolean {
    return this.sessions.has(collection)
  }

  /**
   * Number of consecutive failed attempts since the last successful attach.
   */
  attempts(collection: CollectionName): number {
    return this.sessions.get(collection)?.attempt ?? 0
  }

  /**
   * Resolves when the attach or resync in progress (if any) has finished.
   */
  async settled(collection: CollectionName): Promise<void> {
    let inflight = this.sessions.get(collection)?.inflight
    while (inflight) {
      await inflight
      inflight = this.sessions.get(collection)?.inflight
    }
  }

  // ===========================================================================
  // Attach / Resync
  // ===========================================================================

  private track(session: Session, task: Promise<void>): Promise<void> {
    const inflight = task
      .catch((error: unknown) => {
        this.logger.error('Synchronization failed', {
          collection: session.collection,
          error: toError(error).message,
        })
      })
      .finally(() => {
        if (session.inflight === inflight) {
          session.inflight = undefined
        }
      })
    session.inflight = inflight
    return inflight
  }

  private async connect(session: Session): Promise<void> {
    const streamId = this.openStream(session)
    if (streamId === undefined) {
      return
    }
    if (session.attempt > 0) {
      this.sink.setStatus(session.collection, 'resyncing')
    }
    await this.synchronize(session, streamId, true)
  }

  /**
   * Opens the live stream in buffering mode.
   *
   * @returns The id of the new stream, or `undefined` if opening failed
   */
  private openStream(session: Session): number | undefined {
    this.teardownStream(session)
    const streamId = session.streamId
    const { collection } = session

    try {
      const cancel = this.store.streamCollection(
        collection,
        (change) => this.handleChange(session, streamId, change),
        (error) => this.handleStreamError(session, streamId, error)
      )
      if (this.isStale(session, streamId)) {
        cancel()
        return undefined
      }
      session.cancelStream = cancel
    } catch (error) {
      this.handleStreamError(session, streamId, toError(error))
      return undefined
    }

    this.logger.debug('Stream opened', { collection, attempt: session.attempt })
    return streamId
  }

  /**
   * Fetches a listing, reconciles it and replays buffered changes.
   */
  private async synchronize(session: Session, streamId: number, freshStream: boolean): Promise<void> {
    const { collection } = session
    let fresh = freshStream

    do {
      session.resyncRequested = false
      session.buffer = new EventBuffer<RemoteChange>({
        maxSize: this.resyncBufferSize,
        onOverflow: ({ droppedCount }) => {
          session.resyncRequested = true
          this.logger.warn('Resync buffer overflowed; scheduling another resync', {
            collection,
            droppedCount,
            maxSize: this.resyncBufferSize,
          })
        },
      })

      let listing: StoredDocument[]
      try {
        listing = await this.store.listCollection(collection)
      } catch (error) {
        this.handleStreamError(session, streamId, toError(error))
        return
      }

      if (this.isStale(session, streamId)) {
        return
      }

      const buffered = session.buffer.flush()
      session.buffer.dispose()
      session.buffer = undefined

      try {
        this.sink.reconcile(collection, listing, { freshStream: fresh })
        for (const change of buffered) {
          if (this.isStale(session, streamId)) {
            return
          }
          this.sink.apply(collection, change)
        }
      } catch (error) {
        this.handleStreamError(session, streamId, toError(error))
        return
      }
      if (this.isStale(session, streamId)) {
        return
      }
      fresh = false

      this.logger.info('Collection synchronized', {
        collection,
        documents: listing.length,
        replayed: buffered.length,
      })

      session.attempt = 0
      this.sink.setStatus(collection, 'active')

      if (session.resyncRequested) {
        this.sink.setStatus(collection, 'resyncing')
      }
    } while (session.resyncRequested && !this.isStale(session, streamId))
  }

  // ===========================================================================
  // Stream Events
  // ===========================================================================

  private handleChange(session: Session, streamId: number, change: RemoteChange): void {
    if (this.isStale(session, streamId)) {
      return
    }
    if (session.buffer) {
      session.buffer.add(change)
      return
    }
    try {
      this.sink.apply(session.collection, change)
    } catch (error) {
      this.handleStreamError(session, streamId, toError(error))
    }
  }

  private handleStreamError(session: Session, streamId: number, error: Error): void {
    if (this.isStale(session, streamId)) {
      return
    }

    const { collection } = session
    const failure =
      error instanceof StreamDisconnectedError
        ? error
        : new StreamDisconnectedError(collection, { cause: error, reason: error.message })

    this.teardownStream(session)
    this.sink.setStatus(collection, 'reconnecting')
    this.scheduleReconnect(session, failure)
  }

  private scheduleReconnect(session: Session, failure: StreamDisconnectedError): void {
    this.clearReconnectTimer(session)
    session.attempt += 1
    const delay = calculateBackoffDelay(session.attempt, this.backoff, this.random)

    this.logger.warn('Stream failed; reconnecting', {
      collection: session.collection,
      attempt: session.attempt,
      delayMs: delay,
      error: failure.message,
    })

    session.reconnectTimer = setTimeout(() => {
      session.reconnectTimer = undefined
      if (this.sessions.get(session.collection) !== session) {
        return
      }
      void this.track(session, this.connect(session))
    }, delay)
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private isStale(session: Session, streamId: number): boolean {
    return (
      session.streamId !== streamId ||
      session.signal.aborted ||
      this.sessions.get(session.collection) !== session
    )
  }

  private teardownStream(session: Session): void {
    session.streamId += 1
    const cancel = session.cancelStream
    session.cancelStream = undefined
    session.buffer?.dispose()
    session.buffer = undefined
    if (cancel) {
      try {
        cancel()
      } catch (error) {
        this.logger.warn('Failed to cancel stream', {
          collection: session.collection,
          error: toError(error).message,
        })
      }
    }
  }

  private clearReconnectTimer(session: Session): void {
    if (session.reconnectTimer !== undefined) {
      clearTimeout(session.reconnectTimer)
      session.reconnectTimer = undefined
    }
  }
}
