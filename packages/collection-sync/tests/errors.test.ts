/**
 * Sync Error Tests
 *
 * Verifies the error hierarchy, messages and the transient-failure heuristic
 * used to flag retryable writes.
 */

import { describe, it, expect } from 'vitest'
import {
  SyncError,
  InvalidCollectionError,
  InvalidDocumentError,
  EngineDisposedError,
  RemoteWriteError,
  StreamDisconnectedError,
  ObserverFailureError,
  toError,
  isTransientFailure,
  isSyncError,
  isRetryableWriteError,
} from '../src/errors.js'

describe('SyncError', () => {
  it('should carry collection and cause', () => {
    const cause = new Error('boom')
    const error = new SyncError('failed', { collection: 'projects', cause })

    expect(error).toBeInstanceOf(Error)
    expect(error.name).toBe('SyncError')
    expect(error.message).toBe('failed')
    expect(error.collection).toBe('projects')
    expect(error.cause).toBe(cause)
  })

  it('should leave collection and cause undefined when omitted', () => {
    const error = new SyncError('failed')

    expect(error.collection).toBeUndefined()
    expect(error.cause).toBeUndefined()
  })
})

describe('caller errors', () => {
  it('should list every reason of an InvalidCollectionError', () => {
    const error = new InvalidCollectionError('a/b', ["Collection name cannot contain '/'"])

    expect(error).toBeInstanceOf(SyncError)
    expect(error.name).toBe('InvalidCollectionError')
    expect(error.collection).toBe('a/b')
    expect(error.reasons).toEqual(["Collection name cannot contain '/'"])
    expect(error.message).toBe(`Invalid collection name "a/b": Collection name cannot contain '/'`)
  })

  it('should join issues of an InvalidDocumentError', () => {
    const error = new InvalidDocumentError('projects', ['name: Required', 'updatedAt: Invalid date'], {
      documentId: 'p1',
    })

    expect(error.name).toBe('InvalidDocumentError')
    expect(error.documentId).toBe('p1')
    expect(error.issues).toHaveLength(2)
    expect(error.message).toBe('Invalid document for "projects": name: Required; updatedAt: Invalid date')
  })

  it('should name the operation in EngineDisposedError', () => {
    expect(new EngineDisposedError('subscribe').message).toBe(
      'Cannot call subscribe() on a disposed sync engine'
    )
  })
})

describe('RemoteWriteError', () => {
  it('should wrap the cause message', () => {
    const error = new RemoteWriteError('update', 'projects', new Error('permission denied'), {
      documentId: 'p1',
    })

    expect(error.name).toBe('RemoteWriteError')
    expect(error.operation).toBe('update')
    expect(error.documentId).toBe('p1')
    expect(error.message).toBe('Remote update failed for "projects": permission denied')
    expect(error.retryable).toBe(false)
  })

  it('should be retryable when the cause has a transient code', () => {
    const cause = Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' })

    expect(new RemoteWriteError('create', 'projects', cause).retryable).toBe(true)
  })
})

describe('StreamDisconnectedError', () => {
  it('should include the reason when given', () => {
    expect(new StreamDisconnectedError('projects', { reason: 'idle timeout' }).message).toBe(
      'Stream for "projects" disconnected: idle timeout'
    )
  })

  it('should omit the reason when not given', () => {
    expect(new StreamDisconnectedError('projects').message).toBe('Stream for "projects" disconnected')
  })
})

describe('ObserverFailureError', () => {
  it('should identify the observer', () => {
    const error = new ObserverFailureError('clients', 3, new Error('render failed'))

    expect(error.observerId).toBe(3)
    expect(error.message).toBe('Observer 3 on "clients" failed: render failed')
  })
})

describe('helpers', () => {
  it('toError should pass errors through and wrap other values', () => {
    const original = new Error('x')

    expect(toError(original)).toBe(original)
    expect(toError('plain').message).toBe('plain')
    expect(toError(42).message).toBe('42')
  })

  it('isTransientFailure should prefer an explicit retryable flag', () => {
    const flagged = Object.assign(new Error('x'), { retryable: false, code: 'ETIMEDOUT' })

    expect(isTransientFailure(flagged)).toBe(false)
    expect(isTransientFailure(Object.assign(new Error('x'), { retryable: true }))).toBe(true)
  })

  it('isTransientFailure should recognize store status codes', () => {
    expect(isTransientFailure(Object.assign(new Error('x'), { code: 'unavailable' }))).toBe(true)
    expect(isTransientFailure(Object.assign(new Error('x'), { code: 'permission-denied' }))).toBe(false)
    expect(isTransientFailure(new Error('x'))).toBe(false)
  })

  it('isSyncError should narrow package errors', () => {
    expect(isSyncError(new EngineDisposedError('get'))).toBe(true)
    expect(isSyncError(new Error('x'))).toBe(false)
  })

  it('isRetryableWriteError should require a transient RemoteWriteError', () => {
    const transient = new RemoteWriteError('remove', 'p', Object.assign(new Error('x'), { code: 'aborted' }))
    const permanent = new RemoteWriteError('remove', 'p', new Error('x'))

    expect(isRetryableWriteError(transient)).toBe(true)
    expect(isRetryableWriteError(permanent)).toBe(false)
    expect(isRetryableWriteError(new Error('x'))).toBe(false)
  })
})
