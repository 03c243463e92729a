/**
 * @file Mutation Gateway
 *
 * Validates and issues `create`, `update` and `remove` writes against the
 * remote store.
 *
 * @packageDocumentation
 * @module @docsync/collection-sync/sync/mutation-gateway
 *
 * @remarks
 * The gateway:
 * - rejects malformed collection names and documents before any I/O
 * - stamps `createdAt` and `updatedAt` from the engine's clock
 * - registers a {@link PendingMutation} before each write and clears it when
 *   the write's echo passes through the reconciler, or logs and drops it when
 *   no echo arrives in time
 * - wraps store failures in {@link RemoteWriteError} and never retries
 *
 * Echoes are not suppressed: the resulting delta reaches every observer,
 * including the caller, through the regular stream path.
 */

import { randomUUID } from 'crypto'
import { z } from 'zod'
import type { ZodSchema } from 'zod'
import type { CollectionName, Document, DocumentId } from '../types/document.js'
import type { ChangeEvent, ChangeKind } from '../types/events.js'
import type { CreateOptions, PendingMutation } from '../types/index.js'
import type { RemoteStore } from '../store/remote-store.js'
import type { Logger } from '../logger.js'
import { silentLogger } from '../logger.js'
import { formatIssues } from '../config.js'
import { documentSchema } from '../document/schema.js'
import { cloneDocument } from '../document/values.js'
import { InvalidDocumentError, RemoteWriteError, toError } from '../errors.js'
import type { WriteOperation } from '../errors.js'
import { assertCollectionName } from './collection-name.js'

// =============================================================================
// Types
// =============================================================================

/**
 * Configuration for {@link MutationGateway}.
 */
export interface MutationGatewayOptions {
  store: RemoteStore
  /** How long a pending mutation waits for its echo */
  timeoutMs: number
  /** Source of system timestamps. @default () => new Date() */
  clock?: () => Date
  /** Per-collection schemas checked before writes */
  schemas?: Record<CollectionName, ZodSchema>
  /** Id generator for creates without an id. @default randomUUID */
  generateId?: () => DocumentId
  logger?: Logger
}

interface PendingEntry {
  mutation: PendingMutation
  timer: ReturnType<typeof setTimeout>
}

const EXPECTED_KIND: Record<WriteOperation, ChangeKind> = {
  create: 'added',
  update: 'modified',
  remove: 'removed',
}

// =============================================================================
// Gateway
// =============================================================================

/**
 * Issues writes to the remote store and tracks their echoes.
 *
 * @example
 * ```typescript
 * const gateway = new MutationGateway({ store, timeoutMs: 10000 })
 *
 * const id = await gateway.create('clients', { name: 'Acme' })
 * await gateway.update('clients', id, { name: 'Acme Ltd' })
 * await gateway.remove('clients', id)
 * ```
 */
export class MutationGateway {
  private readonly store: RemoteStore
  private readonly timeoutMs: number
  private readonly clock: () => Date
  private readonly schemas: Record<CollectionName, ZodSchema>
  private readonly generateId: () => DocumentId
  private readonly logger: Logger
  private readonly entries = new Map<string, PendingEntry>()

  constructor(options: MutationGatewayOptions) {
    this.store = options.store
    this.timeoutMs = options.timeoutMs
    this.clock = options.clock ?? (() => new Date())
    this.schemas = options.schemas ?? {}
    this.generateId = options.generateId ?? randomUUID
    this.logger = options.logger ?? silentLogger
  }

  // ===========================================================================
  // Mutations
  // ===========================================================================

  /**
   * Creates a document. Missing system timestamps are set to now.
   *
   * @returns The id of the new document
   * @throws {InvalidCollectionError} If the collection name is invalid
   * @throws {InvalidDocumentError} If the document is malformed
   * @throws {RemoteWriteError} If the store rejects the write
   */
  async create(
    collection: CollectionName,
    document: Document,
    options: CreateOptions = {}
  ): Promise<DocumentId> {
    assertCollectionName(collection)
    this.validate(collection, document, { documentId: options.id })

    const now = this.clock()
    const stamped: Document = {
      ...cloneDocument(document),
      createdAt: document.createdAt ?? now,
      updatedAt: document.updatedAt ?? now,
    }
    this.validate(collection, stamped, { documentId: options.id, applySchema: true })

    const id = options.id ?? this.generateId()
    const pending = this.register('create', collection, id)

    try {
      return await this.store.writeDocument(collection, id, stamped)
    } catch (error) {
      throw this.fail(pending, 'create', error)
    }
  }

  /**
   * Merges fields into an existing document and sets `updatedAt` to now.
   *
   * @throws {InvalidCollectionError} If the collection name is invalid
   * @throws {InvalidDocumentError} If the fields are malformed
   * @throws {RemoteWriteError} If the store rejects the write
   */
  async update(collection: CollectionName, id: DocumentId, fields: Partial<Document>): Promise<void> {
    assertCollectionName(collection)
    this.assertId(collection, id)

    const stamped: Document = { ...fields, updatedAt: this.clock() }
    this.validate(collection, stamped, { documentId: id, applySchema: true, partial: true })

    const pending = this.register('update', collection, id)
    try {
      await this.store.writeDocument(collection, id, cloneDocument(stamped), { merge: true })
    } catch (error) {
      throw this.fail(pending, 'update', error)
    }
  }

  /**
   * Deletes a document.
   *
   * @throws {InvalidCollectionError} If the collection name is invalid
   * @throws {RemoteWriteError} If the store rejects the delete
   */
  async remove(collection: CollectionName, id: DocumentId): Promise<void> {
    assertCollectionName(collection)
    this.assertId(collection, id)

    const pending = this.register('remove', collection, id)
    try {
      await this.store.deleteDocument(collection, id)
    } catch (error) {
      throw this.fail(pending, 'remove', error)
    }
  }

  // ===========================================================================
  // Echo Tracking
  // ===========================================================================

  /**
   * Clears the oldest pending mutation matching a reconciled event by
   * collection, id and kind.
   *
   * @returns The cleared mutation, if any
   */
  observe(event: ChangeEvent): PendingMutation | undefined {
    for (const [correlationId, entry] of this.entries) {
      const { mutation } = entry
      if (
        mutation.collection === event.collection &&
        mutation.id === event.id &&
        mutation.expectedKind === event.kind
      ) {
        clearTimeout(entry.timer)
        this.entries.delete(correlationId)
        this.logger.debug('Echo observed', {
          collection: event.collection,
          id: event.id,
          correlationId,
          sequence: event.sequence,
        })
        return mutation
      }
    }
    return undefined
  }

  /**
   * Mutations still waiting for their echo, oldest first.
   */
  pending(collection?: CollectionName): PendingMutation[] {
    const mutations = [...this.entries.values()].map((entry) => entry.mutation)
    return collection === undefined
      ? mutations
      : mutations.filter((mutation) => mutation.collection === collection)
  }

  /**
   * Drops every pending mutation and clears its timer.
   */
  clear(): void {
    for (const entry of this.entries.values()) {
      clearTimeout(entry.timer)
    }
    this.entries.clear()
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private register(operation: WriteOperation, collection: CollectionName, id: DocumentId): PendingMutation {
    const mutation: PendingMutation = Object.freeze({
      correlationId: randomUUID(),
      collection,
      id,
      expectedKind: EXPECTED_KIND[operation],
      issuedAt: this.clock().getTime(),
    })

    const timer = setTimeout(() => {
      if (!this.entries.delete(mutation.correlationId)) {
        return
      }
      this.logger.warn('Pending mutation timed out without echo', {
        collection,
        id,
        operation,
        correlationId: mutation.correlationId,
        timeoutMs: this.timeoutMs,
      })
    }, this.timeoutMs)

    this.entries.set(mutation.correlationId, { mutation, timer })
    return mutation
  }

  private fail(mutation: PendingMutation, operation: WriteOperation, error: unknown): RemoteWriteError {
    const entry = this.entries.get(mutation.correlationId)
    if (entry) {
      clearTimeout(entry.timer)
      this.entries.delete(mutation.correlationId)
    }

    const failure = new RemoteWriteError(operation, mutation.collection, toError(error), {
      documentId: mutation.id,
    })
    this.logger.error(failure.message, {
      collection: mutation.collection,
      id: mutation.id,
      operation,
      retryable: failure.retryable,
    })
    return failure
  }

  private assertId(collection: CollectionName, id: DocumentId): void {
    if (typeof id !== 'string' || id.length === 0) {
      throw new InvalidDocumentError(collection, ['id: must be a non-empty string'])
    }
  }

  private validate(
    collection: CollectionName,
    document: unknown,
    options: { documentId?: DocumentId; applySchema?: boolean; partial?: boolean }
  ): void {
    const base = documentSchema.safeParse(document)
    if (!base.success) {
      throw new InvalidDocumentError(collection, formatIssues(base.error), {
        documentId: options.documentId,
        cause: base.error,
      })
    }

    const schema = this.schemas[collection]
    if (!options.applySchema || !schema) {
      return
    }

    const target = options.partial && schema instanceof z.ZodObject ? schema.partial() : schema
    const result = target.safeParse(document)
    if (!result.success) {
      throw new InvalidDocumentError(collection, formatIssues(result.error), {
        documentId: options.documentId,
        cause: result.error,
      })
    }
  }
}
