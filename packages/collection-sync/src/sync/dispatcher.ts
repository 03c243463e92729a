/**
 * @file Event Dispatcher
 *
 * Fans deltas and status transitions out to the observers of a collection.
 *
 * Delivery is non-blocking: `dispatch` only enqueues. Each collection has its
 * own FIFO queue, drained on a microtask, so every observer of a collection
 * sees deltas in the order the reconciler produced them. Observers are not
 * awaited. A throwing or rejecting observer is reported through the logger as
 * an {@link ObserverFailureError} and delivery carries on with the next
 * observer and the next delta.
 *
 * @module @docsync/collection-sync/sync/dispatcher
 */

import type { CollectionName } from '../types/document.js'
import type { Delta } from '../types/events.js'
import type { Observer, StatusChange, SubscriptionHandle } from '../types/index.js'
import type { Logger } from '../logger.js'
import { silentLogger } from '../logger.js'
import { ObserverFailureError, toError } from '../errors.js'

// =============================================================================
// Types
// =============================================================================

/**
 * Options for {@link EventDispatcher}.
 */
export interface EventDispatcherOptions {
  logger?: Logger
  /** Called with every observer failure after it was logged */
  onObserverError?: (error: ObserverFailureError) => void
}

type QueueEntry =
  | { type: 'delta'; delta: Delta; targets: readonly number[] }
  | { type: 'status'; change: StatusChange; targets: readonly number[] }

interface CollectionChannel {
  observers: Map<number, Observer>
  queue: QueueEntry[]
  draining?: Promise<void>
}

// =============================================================================
// Dispatcher
// =============================================================================

/**
 * Per-collection observer registry and ordered delivery queue.
 *
 * @example
 * ```typescript
 * const dispatcher = new EventDispatcher({ logger })
 * const handle = dispatcher.register('clients', (delta) => render(delta))
 *
 * dispatcher.dispatch('clients', delta) // returns immediately
 * await dispatcher.idle('clients')      // every queued delta was handed out
 * ```
 */
export class EventDispatcher {
  private readonly channels = new Map<CollectionName, CollectionChannel>()
  /** Released channels still draining their queue */
  private readonly released = new Map<CollectionChannel, CollectionName>()
  private readonly logger: Logger
  private readonly onObserverError?: (error: ObserverFailureError) => void
  private nextId = 1

  constructor(options: EventDispatcherOptions = {}) {
    this.logger = options.logger ?? silentLogger
    this.onObserverError = options.onObserverError
  }

  /**
   * Registers an observer on a collection.
   *
   * @param replay - Deltas delivered to this observer only, ahead of any
   *   delta dispatched afterwards
   */
  register(
    collection: CollectionName,
    observer: Observer,
    replay: readonly Delta[] = []
  ): SubscriptionHandle {
    const id = this.nextId++
    const channel = this.channel(collection)
    channel.observers.set(id, observer)

    for (const delta of replay) {
      this.enqueue(collection, channel, { type: 'delta', delta, targets: [id] })
    }

    return Object.freeze({ id, collection })
  }

  /**
   * Removes an observer. Queued deltas are no longer delivered to it.
   *
   * @returns `false` if the handle was not registered
   */
  unregister(handle: SubscriptionHandle): boolean {
    const channel = this.channels.get(handle.collection)
    if (!channel || !channel.observers.delete(handle.id)) {
      return false
    }
    if (channel.observers.size === 0 && !channel.draining) {
      this.channels.delete(handle.collection)
    }
    return true
  }

  /**
   * Whether a handle is currently registered.
   */
  has(handle: SubscriptionHandle): boolean {
    return this.channels.get(handle.collection)?.observers.has(handle.id) ?? false
  }

  /**
   * Number of observers registered on a collection.
   */
  observerCount(collection: CollectionName): number {
    return this.channels.get(collection)?.observers.size ?? 0
  }

  /**
   * Queues a delta for every observer currently registered on its collection.
   */
  dispatch(collection: CollectionName, delta: Delta): void {
    const channel = this.channels.get(collection)
    if (!channel || channel.observers.size === 0) {
      return
    }
    this.enqueue(collection, channel, {
      type: 'delta',
      delta,
      targets: [...channel.observers.keys()],
    })
  }

  /**
   * Queues a status transition for every observer currently registered on
   * its collection, ordered with respect to deltas.
   */
  dispatchStatus(change: StatusChange): void {
    const channel = this.channels.get(change.collection)
    if (!channel || channel.observers.size === 0) {
      return
    }
    this.enqueue(change.collection, channel, {
      type: 'status',
      change,
      targets: [...channel.observers.keys()],
    })
  }

  /**
   * Resolves once every queued entry (for one collection, or all) has been
   * handed to its observers. Asynchronous observers are not awaited.
   */
  async idle(collection?: CollectionName): Promise<void> {
    const pending = (): Promise<void>[] => {
      if (collection !== undefined) {
        const draining = this.channels.get(collection)?.draining
        return draining ? [draining] : []
      }
      return [...this.channels.values()].flatMap((channel) =>
        channel.draining ? [channel.draining] : []
      )
    }

    const releasedPending = (): Promise<void>[] =>
      [...this.released].flatMap(([channel, name]) =>
        channel.draining && (collection === undefined || name === collection) ? [channel.draining] : []
      )

    let waiting = [...pending(), ...releasedPending()]
    while (waiting.length > 0) {
      await Promise.all(waiting)
      waiting = [...pending(), ...releasedPending()]
    }
  }

  /**
   * Drops every observer and queued entry of a collection, or of all
   * collections.
   */
  clear(collection?: CollectionName): void {
    if (collection === undefined) {
      for (const channel of [...this.channels.values(), ...this.released.keys()]) {
        channel.observers.clear()
        channel.queue = []
      }
      this.channels.clear()
      this.released.clear()
      return
    }
    const channel = this.channels.get(collection)
    if (channel) {
      channel.observers.clear()
      channel.queue = []
      this.channels.delete(collection)
    }
  }

  /**
   * Detaches the channel of a collection, or of every collection. Entries
   * already queued are still delivered to its observers; later dispatches and
   * registrations start a new channel.
   */
  release(collection?: CollectionName): void {
    const names = collection === undefined ? [...this.channels.keys()] : [collection]
    for (const name of names) {
      const channel = this.channels.get(name)
      if (!channel) {
        continue
      }
      this.channels.delete(name)
      if (channel.draining) {
        this.released.set(channel, name)
      }
    }
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private channel(collection: CollectionName): CollectionChannel {
    let channel = this.channels.get(collection)
    if (!channel) {
      channel = { observers: new Map(), queue: [] }
      this.channels.set(collection, channel)
    }
    return channel
  }

  private enqueue(collection: CollectionName, channel: CollectionChannel, entry: QueueEntry): void {
    channel.queue.push(entry)
    if (!channel.draining) {
      channel.draining = Promise.resolve().then(() => this.drain(collection, channel))
    }
  }

  private drain(collection: CollectionName, channel: CollectionChannel): void {
    let entry = channel.queue.shift()
    while (entry) {
      for (const id of entry.targets) {
        const observer = channel.observers.get(id)
        if (observer) {
          this.deliver(collection, id, observer, entry)
        }
      }
      entry = channel.queue.shift()
    }

    channel.draining = undefined
    this.released.delete(channel)
    if (channel.observers.size === 0 && this.channels.get(collection) === channel) {
      this.channels.delete(collection)
    }
  }

  private deliver(
    collection: CollectionName,
    id: number,
    observer: Observer,
    entry: QueueEntry
  ): void {
    try {
      let result: unknown
      if (entry.type === 'delta') {
        result = typeof observer === 'function' ? observer(entry.delta) : observer.onDelta(entry.delta)
      } else {
        if (typeof observer === 'function' || !observer.onStatusChange) {
          return
        }
        result = observer.onStatusChange(entry.change)
      }

      if (result instanceof Promise) {
        void result.catch((error: unknown) => this.report(collection, id, error))
      }
    } catch (error) {
      this.report(collection, id, error)
    }
  }

  private report(collection: CollectionName, id: number, error: unknown): void {
    const failure = new ObserverFailureError(collection, id, toError(error))
    this.logger.error(failure.message, { collection, observerId: id, error: failure })
    this.onObserverError?.(failure)
  }
}
