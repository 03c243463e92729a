import type { Collection } from '@tanstack/db'
import type { CollectionName, Document, DocumentId, FieldValue } from './document.js'
import type { ChangeKind, Delta } from './events.js'

// Re-export document and event types
export type {
  CollectionName,
  DocumentId,
  FieldValue,
  FieldMap,
  Document,
  StoredDocument,
  SystemField,
} from './document.js'

export { SYSTEM_FIELDS } from './document.js'

export type {
  ChangeKind,
  RemoteUpsert,
  RemoteRemoval,
  RemoteChange,
  ChangeEvent,
  Delta,
} from './events.js'

export { CHANGE_KINDS, isRemoteUpsert, isRemoteRemoval, isChangeKind } from './events.js'

// =============================================================================
// Subscription Status
// =============================================================================

/**
 * Lifecycle state of a collection subscription.
 *
 * @remarks
 * - `'pending'` - Created on the first observer registration; the stream is
 *   opening and the initial listing has not been applied yet
 * - `'active'` - The snapshot is current and live events are flowing
 * - `'reconnecting'` - The stream failed; waiting out a backoff delay
 * - `'resyncing'` - The stream was reopened and a full listing is being
 *   reconciled against the last known snapshot
 * - `'closed'` - The last observer left, or the owner closed the subscription
 *
 * ```
 *  pending ──listing applied──▶ active ──stream error──▶ reconnecting
 *     │                           ▲                        │     ▲
 *     │                           │                 reopen │     │ failure
 *     │                           └──listing applied── resyncing ┘
 *     └─────────── any state ──last unsubscribe / close──▶ closed
 * ```
 *
 * @example
 * ```typescript
 * engine.on('statusChange', ({ collection, status }) => {
 *   indicator.set(collection, status === 'active' ? 'online' : 'syncing')
 * })
 * ```
 */
export type SubscriptionStatus = 'pending' | 'active' | 'reconnecting' | 'resyncing' | 'closed'

/**
 * All subscription states, in lifecycle order.
 */
export const SUBSCRIPTION_STATUSES: readonly SubscriptionStatus[] = [
  'pending',
  'active',
  'reconnecting',
  'resyncing',
  'closed',
]

/**
 * Type guard to check if a value is a valid {@link SubscriptionStatus}.
 *
 * @example
 * ```typescript
 * const stored = sessionStorage.getItem('projects:status')
 * if (isSubscriptionStatus(stored)) {
 *   renderIndicator(stored)
 * }
 * ```
 */
export function isSubscriptionStatus(value: unknown): value is SubscriptionStatus {
  return SUBSCRIPTION_STATUSES.some((status) => status === value)
}

/**
 * Payload of a subscription status transition.
 */
export interface StatusChange {
  collection: CollectionName
  status: SubscriptionStatus
  previous: SubscriptionStatus
}

// =============================================================================
// Observers
// =============================================================================

/**
 * Callback form of an observer. May return a promise; the dispatcher does not
 * wait for it, but a rejection is caught and logged.
 */
export type DeltaListener = (delta: Delta) => void | Promise<void>

/**
 * Object form of an observer, optionally interested in connectivity changes.
 *
 * @example
 * ```typescript
 * const observer: SyncObserver = {
 *   onDelta: (delta) => table.apply(delta),
 *   onStatusChange: ({ status }) => banner.toggle(status !== 'active'),
 * }
 * ```
 */
export interface SyncObserver {
  onDelta: DeltaListener
  onStatusChange?: (change: StatusChange) => void
}

/**
 * Anything accepted where an observer is expected.
 */
export type Observer = DeltaListener | SyncObserver

/**
 * Options for registering an observer.
 */
export interface ObserveOptions {
  /**
   * Deliver the collection's current documents to this observer as `added`
   * deltas before any live delta.
   * @default true (or the engine's `replayOnSubscribe` setting)
   */
  replay?: boolean
}

/**
 * Handle returned by {@link SyncEngine.subscribe}. Pass it back to
 * `unsubscribe` to stop receiving deltas.
 */
export interface SubscriptionHandle {
  readonly id: number
  readonly collection: CollectionName
}

// =============================================================================
// Snapshots and Queries
// =============================================================================

/**
 * Read-only copy of a collection's authoritative state.
 */
export interface CollectionSnapshot {
  readonly collection: CollectionName
  /** Sequence number of the last event applied */
  readonly lastSequence: number
  readonly documents: ReadonlyMap<DocumentId, Readonly<Document>>
}

/**
 * Sort direction for {@link QueryOptions.orderBy}.
 */
export type SortDirection = 'asc' | 'desc'

/**
 * Options for querying the local snapshot.
 *
 * @example
 * ```typescript
 * const active = engine.query('projects', {
 *   where: { status: 'in_progress' },
 *   orderBy: { field: 'createdAt', direction: 'desc' },
 *   limit: 10,
 * })
 * ```
 */
export interface QueryOptions {
  /** Equality filters; every entry must match */
  where?: Record<string, FieldValue>
  /** Single-field ordering */
  orderBy?: { field: string; direction?: SortDirection }
  /** Maximum number of results */
  limit?: number
}

/**
 * A document together with its id, as returned by queries.
 */
export interface QueryResult {
  readonly id: DocumentId
  readonly document: Readonly<Document>
}

// =============================================================================
// Mutations
// =============================================================================

/**
 * Bookkeeping record for a locally issued write whose echo has not yet been
 * observed on the live stream.
 */
export interface PendingMutation {
  /** Unique id correlating the write with its echo */
  readonly correlationId: string
  readonly collection: CollectionName
  /** Id of the written document */
  readonly id: DocumentId
  /** Kind of change the echo is expected to carry */
  readonly expectedKind: ChangeKind
  /** When the write was issued (milliseconds since epoch) */
  readonly issuedAt: number
}

/**
 * Options for creating a document.
 */
export interface CreateOptions {
  /** Client-supplied id for idempotent upserts. Generated when omitted. */
  id?: DocumentId
}

// =============================================================================
// TanStack DB Sync Types
// =============================================================================

/**
 * A change message in the shape TanStack DB's sync `write` expects.
 *
 * @typeParam T - The row type of the TanStack DB collection
 */
export interface ChangeMessage<T> {
  type: 'insert' | 'update' | 'delete'
  key: string
  value: T
  previousValue?: T
  metadata?: Record<string, unknown>
}

/**
 * Parameters TanStack DB passes to a collection's sync function.
 *
 * @typeParam T - The row type of the TanStack DB collection
 */
export interface SyncParams<T extends object> {
  /** The collection being synced */
  collection: Collection<T>
  /** Begin a sync transaction; writes are batched until `commit()` */
  begin: () => void
  /** Write a change message to the collection */
  write: (change: ChangeMessage<T>) => void
  /** Commit the current sync transaction */
  commit: () => void
  /** Mark the collection as ready after the initial data load */
  markReady: () => void
}

/**
 * The part of {@link SyncParams} a sync function drives.
 *
 * @typeParam T - The row type of the TanStack DB collection
 */
export type SyncCallbacks<T extends object> = Pick<SyncParams<T>, 'begin' | 'write' | 'commit' | 'markReady'>

/**
 * Value a sync function hands back to TanStack DB.
 */
export interface SyncReturn {
  /** Stop syncing and release resources */
  cleanup: () => void
}
