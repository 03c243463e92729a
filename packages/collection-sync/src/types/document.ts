/**
 * @fileoverview Document Value Types
 *
 * Documents are treated opaquely: a mapping from field name to a dynamically
 * typed {@link FieldValue}. The only fields the engine interprets are the two
 * system timestamps, `createdAt` and `updatedAt`.
 *
 * @packageDocumentation
 * @module @docsync/collection-sync/types/document
 */

// ============================================================================
// Identifiers
// ============================================================================

/**
 * Opaque identifier of a logical document set (for example `"projects"`).
 *
 * Validated by {@link validateCollectionName} before a subscription or a
 * mutation touches the remote store.
 */
export type CollectionName = string

/**
 * Opaque document identifier, unique within a collection.
 */
export type DocumentId = string

// ============================================================================
// Field Values
// ============================================================================

/**
 * A map of nested field values.
 */
export interface FieldMap {
  [field: string]: FieldValue
}

/**
 * Any value a document field may hold.
 *
 * The union is discriminated at runtime with `typeof`, `instanceof Date` and
 * `Array.isArray`:
 *
 * | Variant   | TypeScript            |
 * |-----------|-----------------------|
 * | string    | `string`              |
 * | number    | `number`              |
 * | boolean   | `boolean`             |
 * | null      | `null`                |
 * | timestamp | `Date`                |
 * | list      | `FieldValue[]`        |
 * | map       | {@link FieldMap}      |
 */
export type FieldValue =
  | string
  | number
  | boolean
  | null
  | Date
  | FieldValue[]
  | FieldMap

/**
 * One record in a collection.
 *
 * @example
 * ```typescript
 * const project: Document = {
 *   name: 'Warehouse fit-out',
 *   status: 'in_progress',
 *   budget: 120000,
 *   createdAt: new Date('2024-03-01T09:00:00Z'),
 *   updatedAt: new Date('2024-03-04T16:30:00Z'),
 * }
 * ```
 */
export interface Document {
  /** When the document was first written. */
  createdAt?: Date
  /** When the document was last written. Drives staleness detection. */
  updatedAt?: Date
  [field: string]: FieldValue | undefined
}

/**
 * A document together with its id, as returned by a full collection listing.
 */
export interface StoredDocument {
  id: DocumentId
  document: Document
}

/**
 * Names of the system-managed timestamp fields.
 */
export const SYSTEM_FIELDS = ['createdAt', 'updatedAt'] as const

export type SystemField = (typeof SYSTEM_FIELDS)[number]
