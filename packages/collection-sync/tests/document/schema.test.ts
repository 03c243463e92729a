/**
 * Document Schema Tests
 */

import { describe, it, expect } from 'vitest'
import {
  documentSchema,
  fieldValueSchema,
  wireDocumentSchema,
  wireStoredDocumentSchema,
  wireTimestampSchema,
} from '../../src/document/schema.js'
import { formatIssues } from '../../src/config.js'

describe('fieldValueSchema', () => {
  it('should accept nested field values', () => {
    const value = { tags: ['a', 1, false, null], at: new Date(0), nested: { deep: [{ x: 1 }] } }

    expect(fieldValueSchema.safeParse(value).success).toBe(true)
  })

  it('should reject non-finite numbers', () => {
    expect(fieldValueSchema.safeParse(Number.POSITIVE_INFINITY).success).toBe(false)
  })

  it('should reject functions', () => {
    expect(fieldValueSchema.safeParse(() => 1).success).toBe(false)
  })
})

describe('documentSchema', () => {
  it('should accept a document with system timestamps', () => {
    const result = documentSchema.safeParse({
      name: 'Acme',
      createdAt: new Date(1000),
      updatedAt: new Date(2000),
    })

    expect(result.success).toBe(true)
  })

  it('should reject an invalid updatedAt', () => {
    const result = documentSchema.safeParse({ updatedAt: new Date('nope') })

    expect(result.success).toBe(false)
    if (!result.success) {
      expect(result.error.issues[0]?.path).toEqual(['updatedAt'])
    }
  })

  it('should reject a string createdAt', () => {
    const result = documentSchema.safeParse({ createdAt: '2024-01-01T00:00:00Z' })

    expect(result.success).toBe(false)
    if (!result.success) {
      expect(result.error.issues[0]?.path).toEqual(['createdAt'])
    }
  })

  it('should reject updatedAt earlier than createdAt', () => {
    const result = documentSchema.safeParse({
      createdAt: new Date(2000),
      updatedAt: new Date(1000),
    })

    expect(result.success).toBe(false)
    if (!result.success) {
      expect(formatIssues(result.error)).toEqual(['updatedAt: updatedAt must not be earlier than createdAt'])
    }
  })

  it('should keep unknown fields', () => {
    const result = documentSchema.safeParse({ name: 'Acme', tier: 2 })

    expect(result.success && result.data).toEqual({ name: 'Acme', tier: 2 })
  })
})

describe('wire schemas', () => {
  it('should convert ISO strings and epoch milliseconds to dates', () => {
    expect(wireTimestampSchema.parse('2024-01-01T00:00:00.000Z')).toEqual(
      new Date('2024-01-01T00:00:00.000Z')
    )
    expect(wireTimestampSchema.parse(1000)).toEqual(new Date(1000))
  })

  it('should reject non-ISO strings', () => {
    expect(wireTimestampSchema.safeParse('yesterday').success).toBe(false)
  })

  it('should parse system timestamps of a wire document and leave other strings alone', () => {
    const document = wireDocumentSchema.parse({
      name: 'Acme',
      due: '2024-02-01T00:00:00.000Z',
      updatedAt: '2024-01-01T00:00:00.000Z',
    })

    expect(document.updatedAt).toEqual(new Date('2024-01-01T00:00:00.000Z'))
    expect(document.due).toBe('2024-02-01T00:00:00.000Z')
  })

  it('should require a non-empty id on stored documents', () => {
    expect(wireStoredDocumentSchema.safeParse({ id: '', document: {} }).success).toBe(false)
    expect(wireStoredDocumentSchema.safeParse({ id: 'c1', document: { name: 'x' } }).success).toBe(true)
  })
})
