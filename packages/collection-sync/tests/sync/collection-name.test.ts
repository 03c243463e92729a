/**
 * Collection Name Validation Tests
 */

import { describe, it, expect } from 'vitest'
import {
  validateCollectionName,
  assertCollectionName,
  MAX_COLLECTION_NAME_BYTES,
} from '../../src/sync/collection-name.js'
import { InvalidCollectionError } from '../../src/errors.js'

describe('validateCollectionName', () => {
  it('should accept ordinary names', () => {
    expect(validateCollectionName('projects')).toEqual({ valid: true, errors: [], warnings: [] })
    expect(validateCollectionName('client-leads_2024')).toEqual({ valid: true, errors: [], warnings: [] })
  })

  it('should reject non-strings', () => {
    expect(validateCollectionName(42).errors).toEqual(['Collection name must be a string'])
  })

  it('should reject empty and whitespace-only names', () => {
    expect(validateCollectionName('').errors).toEqual([
      'Collection name cannot be empty or whitespace only',
    ])
    expect(validateCollectionName('   ').valid).toBe(false)
  })

  it('should reject names containing a slash', () => {
    expect(validateCollectionName('clients/archived').errors).toEqual([
      "Collection name cannot contain '/'",
    ])
  })

  it('should reject dot names', () => {
    expect(validateCollectionName('.').errors).toEqual(["Collection name cannot be '.' or '..'"])
    expect(validateCollectionName('..').valid).toBe(false)
  })

  it('should reject reserved names', () => {
    expect(validateCollectionName('__internal__').errors).toEqual([
      'Collection names of the form __name__ are reserved',
    ])
    expect(validateCollectionName('__partial').valid).toBe(true)
  })

  it('should measure length in UTF-8 bytes', () => {
    expect(validateCollectionName('a'.repeat(MAX_COLLECTION_NAME_BYTES)).valid).toBe(true)
    expect(validateCollectionName('a'.repeat(MAX_COLLECTION_NAME_BYTES + 1)).errors).toEqual([
      'Collection name exceeds 1500 bytes',
    ])
    // 'é' is two bytes
    expect(validateCollectionName('é'.repeat(3), { maxBytes: 5 }).valid).toBe(false)
  })

  it('should collect every violation', () => {
    expect(validateCollectionName('__a/b__').errors).toEqual([
      "Collection name cannot contain '/'",
      'Collection names of the form __name__ are reserved',
    ])
  })

  it('should warn about surrounding whitespace', () => {
    const result = validateCollectionName(' projects ')

    expect(result.valid).toBe(true)
    expect(result.warnings).toEqual(['Collection name has leading or trailing whitespace'])
  })
})

describe('assertCollectionName', () => {
  it('should throw InvalidCollectionError with the reasons', () => {
    let caught: unknown
    try {
      assertCollectionName('a/b')
    } catch (error) {
      caught = error
    }

    expect(caught).toBeInstanceOf(InvalidCollectionError)
    expect(caught).toMatchObject({ collection: 'a/b', reasons: ["Collection name cannot contain '/'"] })
  })

  it('should pass valid names', () => {
    expect(() => assertCollectionName('projects')).not.toThrow()
  })
})
