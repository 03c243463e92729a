/**
 * @file Remote Store Contract
 *
 * The capability the engine consumes from a remote document store. An
 * implementation is constructed once by the application and passed to
 * `createSyncEngine`; nothing in the engine reaches for a global client.
 *
 * @module @docsync/collection-sync/store/remote-store
 */

import type { CollectionName, Document, DocumentId, StoredDocument } from '../types/document.js'
import type { RemoteChange } from '../types/events.js'

/**
 * Options for {@link RemoteStore.writeDocument}.
 */
export interface WriteOptions {
  /**
   * Merge the given fields into an existing document instead of replacing it.
   * @default false
   */
  merge?: boolean
}

/**
 * Function that cancels a live stream. Calling it more than once is allowed.
 */
export type CancelStream = () => void

/**
 * A remote document store with a live-query primitive.
 *
 * @example
 * ```typescript
 * const cancel = store.streamCollection(
 *   'projects',
 *   (change) => console.log(change.kind, change.id),
 *   (error) => console.warn('stream dropped', error)
 * )
 * ```
 */
export interface RemoteStore {
  /**
   * Opens a live stream of changes to a collection.
   *
   * `onEvent` receives every add, modify and remove from the moment the
   * stream is open. `onError` is called at most once when the stream fails;
   * no further events are delivered after it.
   */
  streamCollection(
    collection: CollectionName,
    onEvent: (change: RemoteChange) => void,
    onError: (error: Error) => void
  ): CancelStream

  /**
   * Returns every document currently in a collection.
   */
  listCollection(collection: CollectionName): Promise<StoredDocument[]>

  /**
   * Writes a document. When `id` is omitted the store assigns one.
   *
   * @returns The id of the written document
   */
  writeDocument(
    collection: CollectionName,
    id: DocumentId | undefined,
    document: Document,
    options?: WriteOptions
  ): Promise<DocumentId>

  /**
   * Deletes a document. Deleting an absent document succeeds.
   */
  deleteDocument(collection: CollectionName, id: DocumentId): Promise<void>
}
