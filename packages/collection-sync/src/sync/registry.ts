/**
 * @file Subscription Registry
 *
 * Reference-counted bookkeeping of collection subscriptions. Any number of
 * callers may subscribe to the same collection; they share one subscription
 * (and therefore one remote stream). Each `subscribe` returns a distinct
 * handle, and the subscription closes when the last handle is released.
 *
 * The registry never performs I/O itself. It announces lifecycle changes as
 * events and hands every subscription an `AbortController` whose signal is
 * aborted on close; whoever opened the remote stream listens to that signal.
 *
 * @module @docsync/collection-sync/sync/registry
 */

import { EventEmitter } from 'events'
import type { CollectionName } from '../types/document.js'
import type { StatusChange, SubscriptionStatus } from '../types/index.js'
import { assertCollectionName } from './collection-name.js'

// =============================================================================
// Types
// =============================================================================

/**
 * Handle for one reference to a collection subscription.
 */
export interface RegistryHandle {
  readonly id: number
  readonly collection: CollectionName
}

/**
 * Read-only view of a subscription.
 */
export interface SubscriptionInfo {
  readonly collection: CollectionName
  readonly status: SubscriptionStatus
  readonly refCount: number
  /** Aborted when the subscription closes */
  readonly signal: AbortSignal
  /** When the subscription was opened (ms since epoch) */
  readonly openedAt: number
}

interface SubscriptionEntry {
  collection: CollectionName
  status: SubscriptionStatus
  handles: Set<number>
  controller: AbortController
  openedAt: number
}

// =============================================================================
// Registry
// =============================================================================

/**
 * Reference-counted registry of collection subscriptions.
 *
 * @fires SubscriptionRegistry#open - A new subscription was created (`SubscriptionInfo`)
 * @fires SubscriptionRegistry#statusChange - A subscription changed state (`StatusChange`)
 * @fires SubscriptionRegistry#close - A subscription closed (`CollectionName`)
 *
 * @example
 * ```typescript
 * const registry = new SubscriptionRegistry()
 * registry.on('open', ({ collection, signal }) => openStream(collection, signal))
 *
 * const a = registry.subscribe('projects') // opens
 * const b = registry.subscribe('projects') // shares
 * registry.unsubscribe(a)
 * registry.unsubscribe(b) // closes, signal aborted
 * ```
 */
export class SubscriptionRegistry extends EventEmitter {
  private readonly entries = new Map<CollectionName, SubscriptionEntry>()
  private nextHandleId = 1

  /**
   * Acquires a reference to a collection subscription, creating it in the
   * `pending` state if needed.
   *
   * @throws {InvalidCollectionError} If the name violates the naming rules
   */
  subscribe(collection: CollectionName): RegistryHandle {
    assertCollectionName(collection)

    const id = this.nextHandleId++
    const existing = this.entries.get(collection)
    if (existing) {
      existing.handles.add(id)
      return Object.freeze({ id, collection })
    }

    const entry: SubscriptionEntry = {
      collection,
      status: 'pending',
      handles: new Set([id]),
      controller: new AbortController(),
      openedAt: Date.now(),
    }
    this.entries.set(collection, entry)
    this.emit('open', this.toInfo(entry))

    return Object.freeze({ id, collection })
  }

  /**
   * Releases a reference. Releasing the last reference closes the
   * subscription. Releasing a handle twice has no effect.
   *
   * @returns `true` if this call closed the subscription
   */
  unsubscribe(handle: RegistryHandle): boolean {
    const entry = this.entries.get(handle.collection)
    if (!entry || !entry.handles.delete(handle.id)) {
      return false
    }
    if (entry.handles.size > 0) {
      return false
    }
    this.closeEntry(entry)
    return true
  }

  /**
   * Current status of a collection's subscription; `closed` when none exists.
   */
  status(collection: CollectionName): SubscriptionStatus {
    return this.entries.get(collection)?.status ?? 'closed'
  }

  /**
   * Moves an open subscription to a new state. Closing goes through
   * {@link close} instead.
   *
   * @returns `false` if there is no open subscription or nothing changed
   */
  setStatus(collection: CollectionName, status: Exclude<SubscriptionStatus, 'closed'>): boolean {
    const entry = this.entries.get(collection)
    if (!entry || entry.status === status) {
      return false
    }
    const previous = entry.status
    entry.status = status
    const change: StatusChange = { collection, status, previous }
    this.emit('statusChange', change)
    return true
  }

  /**
   * Read-only view of a subscription, if open.
   */
  get(collection: CollectionName): SubscriptionInfo | undefined {
    const entry = this.entries.get(collection)
    return entry ? this.toInfo(entry) : undefined
  }

  /**
   * Whether a handle still holds a reference.
   */
  isActive(handle: RegistryHandle): boolean {
    return this.entries.get(handle.collection)?.handles.has(handle.id) ?? false
  }

  /**
   * Number of live references to a collection.
   */
  refCount(collection: CollectionName): number {
    return this.entries.get(collection)?.handles.size ?? 0
  }

  /**
   * Names of every open subscription.
   */
  collections(): CollectionName[] {
    return [...this.entries.keys()]
  }

  /**
   * Closes a subscription regardless of outstanding references.
   *
   * @returns `false` if there was no open subscription
   */
  close(collection: CollectionName): boolean {
    const entry = this.entries.get(collection)
    if (!entry) {
      return false
    }
    this.closeEntry(entry)
    return true
  }

  /**
   * Closes every subscription.
   */
  closeAll(): void {
    for (const entry of [...this.entries.values()]) {
      this.closeEntry(entry)
    }
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private closeEntry(entry: SubscriptionEntry): void {
    this.entries.delete(entry.collection)
    entry.handles.clear()

    const previous = entry.status
    entry.status = 'closed'
    entry.controller.abort()

    const change: StatusChange = { collection: entry.collection, status: 'closed', previous }
    this.emit('statusChange', change)
    this.emit('close', entry.collection)
  }

  private toInfo(entry: SubscriptionEntry): SubscriptionInfo {
    return Object.freeze({
      collection: entry.collection,
      status: entry.status,
      refCount: entry.handles.size,
      signal: entry.controller.signal,
      openedAt: entry.openedAt,
    })
  }
}
