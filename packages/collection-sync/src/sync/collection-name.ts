/**
 * @file Collection Naming Rules
 *
 * Validation of collection names against the remote store's naming
 * restrictions. Every subscription and mutation checks its collection name
 * here before any I/O.
 *
 * Rules:
 * - not empty or whitespace only
 * - at most {@link MAX_COLLECTION_NAME_BYTES} bytes of UTF-8
 * - no `/` (reserved as the path separator)
 * - not `.` or `..`
 * - not of the reserved form `__name__`
 */

import { InvalidCollectionError } from '../errors.js'

// =============================================================================
// TYPES
// =============================================================================

/**
 * Result of collection name validation.
 */
export interface CollectionNameValidationResult {
  valid: boolean
  errors: string[]
  warnings: string[]
}

/**
 * Options for collection name validation.
 */
export interface CollectionNameValidationOptions {
  /** Override the byte limit. @default 1500 */
  maxBytes?: number
}

// =============================================================================
// CONSTANTS
// =============================================================================

/**
 * Maximum UTF-8 encoded length of a collection name.
 */
export const MAX_COLLECTION_NAME_BYTES = 1500

const RESERVED_PATTERN = /^__.*__$/

// =============================================================================
// VALIDATION
// =============================================================================

/**
 * Validate a collection name against the store's naming restrictions.
 *
 * @example
 * ```typescript
 * validateCollectionName('projects')
 * // { valid: true, errors: [], warnings: [] }
 *
 * validateCollectionName('clients/archived')
 * // { valid: false, errors: ["Collection name cannot contain '/'"], warnings: [] }
 * ```
 */
export function validateCollectionName(
  name: unknown,
  options: CollectionNameValidationOptions = {}
): CollectionNameValidationResult {
  const { maxBytes = MAX_COLLECTION_NAME_BYTES } = options
  const errors: string[] = []
  const warnings: string[] = []

  if (typeof name !== 'string') {
    errors.push('Collection name must be a string')
    return { valid: false, errors, warnings }
  }

  if (name.trim() === '') {
    errors.push('Collection name cannot be empty or whitespace only')
    return { valid: false, errors, warnings }
  }

  if (Buffer.byteLength(name, 'utf8') > maxBytes) {
    errors.push(`Collection name exceeds ${maxBytes} bytes`)
  }

  if (name.includes('/')) {
    errors.push("Collection name cannot contain '/'")
  }

  if (name === '.' || name === '..') {
    errors.push("Collection name cannot be '.' or '..'")
  }

  if (RESERVED_PATTERN.test(name)) {
    errors.push('Collection names of the form __name__ are reserved')
  }

  if (name !== name.trim()) {
    warnings.push('Collection name has leading or trailing whitespace')
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  }
}

/**
 * Throws {@link InvalidCollectionError} unless the name is valid.
 */
export function assertCollectionName(name: unknown): asserts name is string {
  const result = validateCollectionName(name)
  if (!result.valid) {
    throw new InvalidCollectionError(String(name), result.errors)
  }
}
