/**
 * @file Document Schemas
 *
 * Zod schemas for document values, used to validate documents before writes
 * and to parse documents received over the wire.
 *
 * @module @docsync/collection-sync/document/schema
 */

import { z } from 'zod'
import type { FieldValue } from '../types/document.js'
import { isValidDate } from './values.js'

// =============================================================================
// Field Values
// =============================================================================

/**
 * Any value a document field may hold (see {@link FieldValue}).
 */
export const fieldValueSchema: z.ZodType<FieldValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.date(),
    z.array(fieldValueSchema),
    z.record(fieldValueSchema),
  ])
)

// =============================================================================
// Documents
// =============================================================================

/**
 * A document as accepted by the mutation gateway: system timestamps must be
 * valid `Date`s, `updatedAt` may not precede `createdAt`, every other field
 * must be a field value.
 */
export const documentSchema = z
  .object({
    createdAt: z.date().optional(),
    updatedAt: z.date().optional(),
  })
  .catchall(fieldValueSchema.optional())
  .superRefine((document, ctx) => {
    const { createdAt, updatedAt } = document
    if (createdAt && updatedAt && updatedAt.getTime() < createdAt.getTime()) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['updatedAt'],
        message: 'updatedAt must not be earlier than createdAt',
      })
    }
  })

/**
 * A timestamp as it may travel over the wire: a `Date`, an ISO 8601 string or
 * epoch milliseconds.
 */
export const wireTimestampSchema = z
  .union([z.date(), z.string().datetime({ offset: true }), z.number().int()])
  .transform((value) => new Date(value))
  .refine(isValidDate, { message: 'Invalid timestamp' })

/**
 * A document received over the wire, with system timestamps converted to
 * `Date`s.
 */
export const wireDocumentSchema = z
  .object({
    createdAt: wireTimestampSchema.optional(),
    updatedAt: wireTimestampSchema.optional(),
  })
  .catchall(fieldValueSchema)

/**
 * A listing row received over the wire.
 */
export const wireStoredDocumentSchema = z.object({
  id: z.string().min(1),
  document: wireDocumentSchema,
})
