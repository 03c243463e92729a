/**
 * @file Sync Module Exports
 *
 * Subscription registry, reconciler, event dispatcher, reconnection
 * supervisor, mutation gateway and the engine that wires them together.
 *
 * @packageDocumentation
 * @module @docsync/collection-sync/sync
 */

// Engine
export { SyncEngine, createSyncEngine } from './engine.js'

// Components
export { SubscriptionRegistry } from './registry.js'
export type { RegistryHandle, SubscriptionInfo } from './registry.js'

export { Reconciler } from './reconciler.js'
export type { ReconcileResult, ReconcilerOptions, ResyncOptions } from './reconciler.js'

export { EventDispatcher } from './dispatcher.js'
export type { EventDispatcherOptions } from './dispatcher.js'

export { ReconnectionSupervisor } from './reconnection.js'
export type { ReconnectionSupervisorOptions, SupervisorSink } from './reconnection.js'

export { MutationGateway } from './mutation-gateway.js'
export type { MutationGatewayOptions } from './mutation-gateway.js'

// Building blocks
export { EventBuffer } from './event-buffer.js'
export type { EventBufferOptions } from './event-buffer.js'

export { calculateBackoffDelay } from './backoff.js'

export {
  validateCollectionName,
  assertCollectionName,
  MAX_COLLECTION_NAME_BYTES,
} from './collection-name.js'
export type {
  CollectionNameValidationResult,
  CollectionNameValidationOptions,
} from './collection-name.js'

export {
  resolveLastWriteWins,
  compareTimestamps,
  extractTimestamp,
} from './conflict/last-write-wins.js'
export type { LastWriteWinsOutcome, TimestampExtractor } from './conflict/last-write-wins.js'
