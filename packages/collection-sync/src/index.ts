/**
 * @docsync/collection-sync
 *
 * Client-side synchronization core for hosted document collections.
 * Keeps any number of live readers consistent with a remote collection while
 * the connection drops and recovers, and issues writes whose results come back
 * through the same live stream.
 *
 * @packageDocumentation
 * @module @docsync/collection-sync
 *
 * @example
 * ```typescript
 * import { createSyncEngine, RpcRemoteStore } from '@docsync/collection-sync'
 *
 * const engine = createSyncEngine({ store: new RpcRemoteStore({ client }) })
 *
 * const handle = engine.subscribe('projects', (delta) => {
 *   console.log(delta.kind, delta.id)
 * })
 *
 * await engine.ready('projects')
 * await engine.create('projects', { name: 'Roadmap', status: 'planned' })
 *
 * engine.unsubscribe(handle)
 * ```
 */

// ============================================================================
// Type Exports
// ============================================================================

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
} from './types.js'

export {
  SYSTEM_FIELDS,
  CHANGE_KINDS,
  SUBSCRIPTION_STATUSES,
  isRemoteUpsert,
  isRemoteRemoval,
  isChangeKind,
  isSubscriptionStatus,
} from './types.js'

// ============================================================================
// Errors, Logging and Configuration
// ============================================================================

export {
  SyncError,
  InvalidCollectionError,
  InvalidDocumentError,
  EngineDisposedError,
  RemoteWriteError,
  StreamDisconnectedError,
  ObserverFailureError,
  toError,
  isTransientFailure,
  isSyncError,
  isRetryableWriteError,
} from './errors.js'
export type { WriteOperation } from './errors.js'

export { createConsoleLogger, silentLogger, resolveLogger, withContext } from './logger.js'
export type { Logger, LogFn, ConsoleLoggerOptions } from './logger.js'

export {
  DEFAULT_SETTINGS,
  MAX_TIMER_DELAY_MS,
  backoffSettingsSchema,
  syncEngineSettingsSchema,
  resolveEngineOptions,
  formatIssues,
} from './config.js'
export type {
  BackoffSettings,
  SyncEngineSettings,
  SyncEngineOptions,
  ResolvedSyncEngineOptions,
} from './config.js'

// ============================================================================
// Documents
// ============================================================================

export {
  documentSchema,
  fieldValueSchema,
  wireDocumentSchema,
  wireStoredDocumentSchema,
  wireTimestampSchema,
} from './document/schema.js'

export {
  cloneDocument,
  deepEqual,
  deepFreeze,
  frozenCopy,
  getFieldValue,
  isFieldValue,
  isPlainObject,
  isValidDate,
} from './document/values.js'

// ============================================================================
// Remote Stores
// ============================================================================

export type { RemoteStore, WriteOptions, CancelStream } from './store/remote-store.js'
export { InMemoryRemoteStore } from './store/memory-store.js'
export type { InMemoryRemoteStoreOptions } from './store/memory-store.js'
export { RpcRemoteStore, RpcPayloadError } from './store/rpc-store.js'
export type { RpcClient, RpcRemoteStoreOptions } from './store/rpc-store.js'

// ============================================================================
// Sync Engine
// ============================================================================

export * from './sync/index.js'

// ============================================================================
// Queries
// ============================================================================

export * from './query/index.js'

// ============================================================================
// TanStack DB Integration
// ============================================================================

export {
  createLiveCollectionSync,
  createDocumentCollectionSync,
  deltaToChangeMessage,
  toSyncedRow,
} from './adapters/tanstack-sync.js'
export type { SyncedRow, LiveCollectionSyncOptions } from './adapters/tanstack-sync.js'
