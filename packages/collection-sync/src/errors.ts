/**
 * @file Sync Error Classes
 *
 * Error classes for the synchronization core. Caller errors
 * ({@link InvalidCollectionError}, {@link InvalidDocumentError}) and mutation
 * failures ({@link RemoteWriteError}) are thrown to the caller. Stream failures
 * ({@link StreamDisconnectedError}) and observer failures
 * ({@link ObserverFailureError}) stay inside the engine: the first drives
 * reconnection, the second is logged at the dispatcher boundary.
 *
 * @example
 * ```typescript
 * import { RemoteWriteError, InvalidDocumentError } from '@docsync/collection-sync'
 *
 * try {
 *   await engine.update('projects', 'p1', { status: 'completed' })
 * } catch (error) {
 *   if (error instanceof RemoteWriteError && error.retryable) {
 *     scheduleRetry()
 *   } else if (error instanceof InvalidDocumentError) {
 *     form.showIssues(error.issues)
 *   }
 * }
 * ```
 */

import type { CollectionName, DocumentId } from './types/document.js'

// =============================================================================
// Base Error
// =============================================================================

/**
 * Base class for every error raised by the synchronization core.
 */
export class SyncError extends Error {
  /** Collection the failure relates to, if any */
  readonly collection?: CollectionName

  /** The original cause of this error, if any */
  override readonly cause?: Error

  constructor(
    message: string,
    options?: {
      collection?: CollectionName
      cause?: Error
    }
  ) {
    super(message)
    this.name = 'SyncError'
    this.collection = options?.collection
    this.cause = options?.cause

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target)
    }
  }
}

// =============================================================================
// Caller Errors
// =============================================================================

/**
 * Thrown when a collection name is empty or violates the store's naming
 * constraints. Never retried.
 */
export class InvalidCollectionError extends SyncError {
  /** Every constraint the name violated */
  readonly reasons: string[]

  constructor(collection: string, reasons: string[]) {
    super(`Invalid collection name "${collection}": ${reasons.join('; ')}`, { collection })
    this.name = 'InvalidCollectionError'
    this.reasons = reasons
  }
}

/**
 * Thrown by the mutation gateway when a document is malformed before the call
 * reaches the store.
 *
 * @example
 * ```typescript
 * await expect(
 *   engine.create('projects', { updatedAt: new Date('nope') })
 * ).rejects.toBeInstanceOf(InvalidDocumentError)
 * ```
 */
export class InvalidDocumentError extends SyncError {
  /** Human-readable description of each problem, prefixed by field path */
  readonly issues: string[]

  /** Id of the offending document, when known */
  readonly documentId?: DocumentId

  constructor(
    collection: CollectionName,
    issues: string[],
    options?: { documentId?: DocumentId; cause?: Error }
  ) {
    super(`Invalid document for "${collection}": ${issues.join('; ')}`, {
      collection,
      cause: options?.cause,
    })
    this.name = 'InvalidDocumentError'
    this.issues = issues
    this.documentId = options?.documentId
  }
}

/**
 * Thrown by any engine method called after `dispose()`.
 */
export class EngineDisposedError extends SyncError {
  constructor(operation: string) {
    super(`Cannot call ${operation}() on a disposed sync engine`)
    this.name = 'EngineDisposedError'
  }
}

// =============================================================================
// Remote Store Errors
// =============================================================================

/**
 * Mutation operations that reach the remote store.
 */
export type WriteOperation = 'create' | 'update' | 'remove'

/**
 * Error codes that indicate a transient network condition.
 *
 * @internal
 */
const TRANSIENT_CODES = new Set([
  'ETIMEDOUT',
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'unavailable',
  'deadline-exceeded',
  'resource-exhausted',
  'aborted',
])

/**
 * Wraps a failure of the remote store during an explicit mutation.
 *
 * The core never retries a failed write; `retryable` only tells the caller
 * whether retrying is likely to help.
 */
export class RemoteWriteError extends SyncError {
  /** The gateway operation that failed */
  readonly operation: WriteOperation

  /** Id of the target document, when known */
  readonly documentId?: DocumentId

  /** Whether the underlying failure looks transient */
  readonly retryable: boolean

  constructor(
    operation: WriteOperation,
    collection: CollectionName,
    cause: Error,
    options?: { documentId?: DocumentId }
  ) {
    super(`Remote ${operation} failed for "${collection}": ${cause.message}`, {
      collection,
      cause,
    })
    this.name = 'RemoteWriteError'
    this.operation = operation
    this.documentId = options?.documentId
    this.retryable = isTransientFailure(cause)
  }
}

/**
 * Raised internally when a live stream drops. Drives the reconnection
 * supervisor; observers only ever see the resulting status transition.
 */
export class StreamDisconnectedError extends SyncError {
  constructor(collection: CollectionName, options?: { reason?: string; cause?: Error }) {
    super(`Stream for "${collection}" disconnected${options?.reason ? `: ${options.reason}` : ''}`, {
      collection,
      cause: options?.cause,
    })
    this.name = 'StreamDisconnectedError'
  }
}

/**
 * Built at the dispatcher boundary when an observer throws or rejects.
 * Logged, never propagated.
 */
export class ObserverFailureError extends SyncError {
  /** Handle id of the failing observer */
  readonly observerId: number

  constructor(collection: CollectionName, observerId: number, cause: Error) {
    super(`Observer ${observerId} on "${collection}" failed: ${cause.message}`, {
      collection,
      cause,
    })
    this.name = 'ObserverFailureError'
    this.observerId = observerId
  }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Converts an unknown thrown value into an `Error`.
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value
  }
  return new Error(String(value))
}

/**
 * Determines whether a store failure looks transient.
 *
 * An explicit boolean `retryable` property wins; otherwise the `code`
 * property is compared against known network and quota codes.
 */
export function isTransientFailure(error: Error): boolean {
  const retryable: unknown = Reflect.get(error, 'retryable')
  if (typeof retryable === 'boolean') {
    return retryable
  }

  const code: unknown = Reflect.get(error, 'code')
  return typeof code === 'string' && TRANSIENT_CODES.has(code)
}

/**
 * Type guard for errors raised by this package.
 */
export function isSyncError(error: unknown): error is SyncError {
  return error instanceof SyncError
}

/**
 * Returns `true` for a {@link RemoteWriteError} whose cause looks transient.
 *
 * @example
 * ```typescript
 * try {
 *   await engine.create('leads', lead)
 * } catch (error) {
 *   if (isRetryableWriteError(error)) {
 *     toast('Network hiccup, try again')
 *   }
 * }
 * ```
 */
export function isRetryableWriteError(error: unknown): error is RemoteWriteError {
  return error instanceof RemoteWriteError && error.retryable
}
