/**
 * Type definitions for @docsync/collection-sync
 *
 * This module re-exports all types from the types directory for convenience.
 * For more granular imports, use the specific type modules directly.
 *
 * @module types
 */

export type {
  // Document types
  CollectionName,
  DocumentId,
  FieldValue,
  FieldMap,
  Document,
  StoredDocument,
  SystemField,
  // Event types
  ChangeKind,
  RemoteUpsert,
  RemoteRemoval,
  RemoteChange,
  ChangeEvent,
  Delta,
  // Subscription types
  SubscriptionStatus,
  StatusChange,
  DeltaListener,
  SyncObserver,
  Observer,
  ObserveOptions,
  SubscriptionHandle,
  // Snapshot and query types
  CollectionSnapshot,
  SortDirection,
  QueryOptions,
  QueryResult,
  // Mutation types
  PendingMutation,
  CreateOptions,
  // TanStack DB sync types
  ChangeMessage,
  SyncParams,
  SyncCallbacks,
  SyncReturn,
} from './types/index.js'

export {
  SYSTEM_FIELDS,
  CHANGE_KINDS,
  SUBSCRIPTION_STATUSES,
  isRemoteUpsert,
  isRemoteRemoval,
  isChangeKind,
  isSubscriptionStatus,
} from './types/index.js'
