/**
 * @file Document Value Helpers
 *
 * Structural helpers over {@link FieldValue} trees: type guards, deep copy,
 * deep freeze and deep equality. Dates are compared by instant; `undefined`
 * entries are treated as absent.
 *
 * @module @docsync/collection-sync/document/values
 */

import type { Document, FieldMap, FieldValue } from '../types/document.js'

// =============================================================================
// Guards
// =============================================================================

/**
 * Check if a value is a plain key/value map (not an array, Date or null).
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) {
    return false
  }
  if (Array.isArray(value) || value instanceof Date) {
    return false
  }
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

/**
 * Check if a value is a valid date.
 */
export function isValidDate(value: unknown): value is Date {
  return value instanceof Date && !Number.isNaN(value.getTime())
}

/**
 * Check if a value belongs to the document value union: string, finite
 * number, boolean, null, valid Date, or arrays and maps thereof.
 */
export function isFieldValue(value: unknown): value is FieldValue {
  if (value === null) return true
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true
    case 'number':
      return Number.isFinite(value)
    case 'object':
      if (value instanceof Date) return isValidDate(value)
      if (Array.isArray(value)) return value.every(isFieldValue)
      if (isPlainObject(value)) {
        return Object.values(value).every((entry) => entry === undefined || isFieldValue(entry))
      }
      return false
    default:
      return false
  }
}

// =============================================================================
// Copying
// =============================================================================

/**
 * Deep-copies a field value. Dates are copied by instant.
 */
export function cloneValue(value: FieldValue): FieldValue {
  if (value instanceof Date) {
    return new Date(value.getTime())
  }
  if (Array.isArray(value)) {
    return value.map(cloneValue)
  }
  if (value !== null && typeof value === 'object') {
    return cloneFields(value)
  }
  return value
}

function cloneFields(map: FieldMap): FieldMap {
  const copy: FieldMap = {}
  for (const [key, entry] of Object.entries(map)) {
    if (entry !== undefined) {
      copy[key] = cloneValue(entry)
    }
  }
  return copy
}

/**
 * Deep-copies a document, dropping `undefined` fields.
 */
export function cloneDocument(document: Readonly<Document>): Document {
  const copy: Document = {}
  for (const [key, entry] of Object.entries(document)) {
    if (entry !== undefined) {
      copy[key] = cloneValue(entry)
    }
  }
  return copy
}

/**
 * Recursively freezes an object graph in place and returns it.
 *
 * `Date` instances are frozen too, which stops property writes but not the
 * `setX` methods; consumers receive copies so the live snapshot is unaffected.
 */
export function deepFreeze<T>(value: T): Readonly<T> {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value)
    for (const entry of Object.values(value)) {
      deepFreeze(entry)
    }
  }
  return value
}

/**
 * Returns a frozen deep copy of a document, safe to hand to observers.
 */
export function frozenCopy(document: Readonly<Document>): Readonly<Document> {
  return deepFreeze(cloneDocument(document))
}

// =============================================================================
// Equality
// =============================================================================

/**
 * Structural equality for field values and documents.
 *
 * @example
 * ```typescript
 * deepEqual({ at: new Date(0), tags: ['a'] }, { at: new Date(0), tags: ['a'] }) // true
 * deepEqual({ a: 1, b: undefined }, { a: 1 }) // true
 * ```
 */
export function deepEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true
  if (a === null || b === null || a === undefined || b === undefined) return false

  if (a instanceof Date || b instanceof Date) {
    return a instanceof Date && b instanceof Date && a.getTime() === b.getTime()
  }

  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false
    return a.every((entry, index) => deepEqual(entry, b[index]))
  }

  if (isPlainObject(a) && isPlainObject(b)) {
    const aKeys = Object.keys(a).filter((key) => a[key] !== undefined)
    const bKeys = Object.keys(b).filter((key) => b[key] !== undefined)
    if (aKeys.length !== bKeys.length) return false
    return aKeys.every((key) => Object.prototype.hasOwnProperty.call(b, key) && deepEqual(a[key], b[key]))
  }

  return false
}

// =============================================================================
// Field Access
// =============================================================================

/**
 * Reads a value from a document using a dot-separated path.
 *
 * @example
 * ```typescript
 * getFieldValue({ address: { city: 'Lyon' } }, 'address.city') // 'Lyon'
 * ```
 */
export function getFieldValue(document: Readonly<Document>, path: string): FieldValue | undefined {
  let current: unknown = document
  for (const part of path.split('.')) {
    if (!isPlainObject(current)) {
      return undefined
    }
    current = current[part]
  }
  return isFieldValue(current) ? current : undefined
}
