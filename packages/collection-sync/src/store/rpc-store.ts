/**
 * @file RPC Remote Store
 *
 * A {@link RemoteStore} over a JSON-RPC style client with server push, such as
 * a WebSocket transport. The client is injected; this module only speaks the
 * method and push-message vocabulary below.
 *
 * | Call                                           | Result                     |
 * |------------------------------------------------|----------------------------|
 * | `subscribe { collection, subscriptionId }`      | ack (ignored)              |
 * | `unsubscribe { subscriptionId }`                | ack (ignored)              |
 * | `find { collection }`                           | `{ id, document }[]`       |
 * | `write { collection, id?, document, merge }`    | `{ id }`                   |
 * | `delete { collection, id }`                     | ack (ignored)              |
 *
 * Push messages arrive on the client's `push` event as `{ method, params }`:
 * `change` carries `{ subscriptionId, kind, id, document? }`,
 * `subscription.error` carries `{ subscriptionId, message, code? }`. A
 * `disconnect` event on the client fails every open stream.
 *
 * Every payload is validated with zod; ISO timestamps become `Date`s.
 *
 * @module @docsync/collection-sync/store/rpc-store
 */

import { randomUUID } from 'crypto'
import { z } from 'zod'
import type { CollectionName, Document, DocumentId, StoredDocument } from '../types/document.js'
import type { RemoteChange } from '../types/events.js'
import type { CancelStream, RemoteStore, WriteOptions } from './remote-store.js'
import type { Logger } from '../logger.js'
import { silentLogger } from '../logger.js'
import { formatIssues } from '../config.js'
import { wireDocumentSchema, wireStoredDocumentSchema } from '../document/schema.js'
import { StreamDisconnectedError, SyncError, toError } from '../errors.js'

// =============================================================================
// Client Contract
// =============================================================================

/**
 * The RPC client this store drives.
 */
export interface RpcClient {
  /** Execute an RPC call */
  rpc: (method: string, params?: Record<string, unknown>) => Promise<unknown>
  /** Subscribe to client events (`push`, `disconnect`) */
  on: (event: string, handler: (...args: unknown[]) => void) => void
  /** Unsubscribe from client events */
  off: (event: string, handler: (...args: unknown[]) => void) => void
}

/**
 * Options for {@link RpcRemoteStore}.
 */
export interface RpcRemoteStoreOptions {
  client: RpcClient
  logger?: Logger
  /** Subscription id generator. @default randomUUID */
  generateSubscriptionId?: () => string
}

// =============================================================================
// Wire Schemas
// =============================================================================

const changeParamsSchema = z.discriminatedUnion('kind', [
  z.object({
    subscriptionId: z.string(),
    kind: z.literal('added'),
    id: z.string().min(1),
    document: wireDocumentSchema,
  }),
  z.object({
    subscriptionId: z.string(),
    kind: z.literal('modified'),
    id: z.string().min(1),
    document: wireDocumentSchema,
  }),
  z.object({
    subscriptionId: z.string(),
    kind: z.literal('removed'),
    id: z.string().min(1),
  }),
])

const subscriptionErrorParamsSchema = z.object({
  subscriptionId: z.string(),
  message: z.string(),
  code: z.string().optional(),
})

const pushMessageSchema = z.object({
  method: z.string(),
  params: z.unknown(),
})

const findResultSchema = z.array(wireStoredDocumentSchema)

const writeResultSchema = z.object({ id: z.string().min(1) })

/**
 * Error raised for a response or push message that does not match the
 * expected shape.
 */
export class RpcPayloadError extends SyncError {
  readonly method: string
  readonly issues: string[]

  constructor(method: string, issues: string[], options?: { collection?: CollectionName }) {
    super(`Malformed "${method}" payload: ${issues.join('; ')}`, options)
    this.name = 'RpcPayloadError'
    this.method = method
    this.issues = issues
  }
}

interface OpenStream {
  collection: CollectionName
  onEvent: (change: RemoteChange) => void
  onError: (error: Error) => void
}

// =============================================================================
// Store
// =============================================================================

/**
 * Remote store backed by an RPC client with server push.
 *
 * @example
 * ```typescript
 * const store = new RpcRemoteStore({ client: transport })
 * const engine = createSyncEngine({ store })
 *
 * // on shutdown
 * engine.dispose()
 * store.dispose()
 * ```
 */
export class RpcRemoteStore implements RemoteStore {
  private readonly client: RpcClient
  private readonly logger: Logger
  private readonly generateSubscriptionId: () => string
  private readonly streams = new Map<string, OpenStream>()
  private disposed = false

  private readonly handlePush = (...args: unknown[]): void => {
    const message = pushMessageSchema.safeParse(args[0])
    if (!message.success) {
      this.logger.warn('Ignoring malformed push message', { issues: formatIssues(message.error) })
      return
    }

    switch (message.data.method) {
      case 'change':
        this.handleChange(message.data.params)
        break
      case 'subscription.error':
        this.handleSubscriptionError(message.data.params)
        break
      default:
        break
    }
  }

  private readonly handleDisconnect = (...args: unknown[]): void => {
    const reason = typeof args[0] === 'string' ? args[0] : 'transport disconnected'
    const streams = [...this.streams.values()]
    this.streams.clear()
    for (const stream of streams) {
      stream.onError(new StreamDisconnectedError(stream.collection, { reason }))
    }
  }

  constructor(options: RpcRemoteStoreOptions) {
    this.client = options.client
    this.logger = options.logger ?? silentLogger
    this.generateSubscriptionId = options.generateSubscriptionId ?? randomUUID
    this.client.on('push', this.handlePush)
    this.client.on('disconnect', this.handleDisconnect)
  }

  // ===========================================================================
  // RemoteStore
  // ===========================================================================

  streamCollection(
    collection: CollectionName,
    onEvent: (change: RemoteChange) => void,
    onError: (error: Error) => void
  ): CancelStream {
    if (this.disposed) {
      throw new SyncError('RpcRemoteStore has been disposed', { collection })
    }

    const subscriptionId = this.generateSubscriptionId()
    this.streams.set(subscriptionId, { collection, onEvent, onError })

    void this.client.rpc('subscribe', { collection, subscriptionId }).catch((error: unknown) => {
      this.failStream(subscriptionId, toError(error))
    })

    return () => {
      if (!this.streams.delete(subscriptionId)) {
        return
      }
      void this.client.rpc('unsubscribe', { subscriptionId }).catch((error: unknown) => {
        this.logger.debug('Unsubscribe failed', {
          collection,
          subscriptionId,
          error: toError(error).message,
        })
      })
    }
  }

  async listCollection(collection: CollectionName): Promise<StoredDocument[]> {
    const result = await this.client.rpc('find', { collection })
    const parsed = findResultSchema.safeParse(result)
    if (!parsed.success) {
      throw new RpcPayloadError('find', formatIssues(parsed.error), { collection })
    }
    return parsed.data
  }

  async writeDocument(
    collection: CollectionName,
    id: DocumentId | undefined,
    document: Document,
    options: WriteOptions = {}
  ): Promise<DocumentId> {
    const params: Record<string, unknown> = {
      collection,
      document,
      merge: options.merge ?? false,
    }
    if (id !== undefined) {
      params.id = id
    }

    const result = await this.client.rpc('write', params)
    const parsed = writeResultSchema.safeParse(result)
    if (!parsed.success) {
      throw new RpcPayloadError('write', formatIssues(parsed.error), { collection })
    }
    return parsed.data.id
  }

  async deleteDocument(collection: CollectionName, id: DocumentId): Promise<void> {
    await this.client.rpc('delete', { collection, id })
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * Number of open streams.
   */
  get streamCount(): number {
    return this.streams.size
  }

  /**
   * Detaches from the client. Open streams are dropped without callbacks.
   */
  dispose(): void {
    if (this.disposed) {
      return
    }
    this.disposed = true
    this.streams.clear()
    this.client.off('push', this.handlePush)
    this.client.off('disconnect', this.handleDisconnect)
  }

  // ===========================================================================
  // Push Handling
  // ===========================================================================

  private handleChange(params: unknown): void {
    const parsed = changeParamsSchema.safeParse(params)
    if (!parsed.success) {
      const subscriptionId = z.object({ subscriptionId: z.string() }).safeParse(params)
      if (subscriptionId.success) {
        const stream = this.streams.get(subscriptionId.data.subscriptionId)
        this.failStream(
          subscriptionId.data.subscriptionId,
          new RpcPayloadError('change', formatIssues(parsed.error), {
            collection: stream?.collection,
          })
        )
      } else {
        this.logger.warn('Ignoring change without subscription id', {
          issues: formatIssues(parsed.error),
        })
      }
      return
    }

    const change = parsed.data
    const stream = this.streams.get(change.subscriptionId)
    if (!stream) {
      return
    }

    stream.onEvent(
      change.kind === 'removed'
        ? { kind: 'removed', id: change.id }
        : { kind: change.kind, id: change.id, document: change.document }
    )
  }

  private handleSubscriptionError(params: unknown): void {
    const parsed = subscriptionErrorParamsSchema.safeParse(params)
    if (!parsed.success) {
      this.logger.warn('Ignoring malformed subscription error', {
        issues: formatIssues(parsed.error),
      })
      return
    }

    const { subscriptionId, message, code } = parsed.data
    const stream = this.streams.get(subscriptionId)
    if (!stream) {
      return
    }
    const cause = Object.assign(new Error(message), { code })
    this.failStream(
      subscriptionId,
      new StreamDisconnectedError(stream.collection, { reason: message, cause })
    )
  }

  private failStream(subscriptionId: string, error: Error): void {
    const stream = this.streams.get(subscriptionId)
    if (!stream) {
      return
    }
    this.streams.delete(subscriptionId)
    stream.onError(error)
  }
}
