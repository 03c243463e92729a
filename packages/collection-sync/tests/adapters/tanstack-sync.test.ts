/**
 * TanStack DB Sync Adapter Tests
 *
 * Drives the sync function with recording callbacks and checks how deltas
 * and status changes map onto begin/write/commit/markReady.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import {
  createDocumentCollectionSync,
  createLiveCollectionSync,
  deltaToChangeMessage,
  toSyncedRow,
} from '../../src/adapters/tanstack-sync.js'
import type { SyncedRow } from '../../src/adapters/tanstack-sync.js'
import { createSyncEngine } from '../../src/sync/engine.js'
import type { SyncEngine } from '../../src/sync/engine.js'
import { InMemoryRemoteStore } from '../../src/store/memory-store.js'
import { silentLogger } from '../../src/logger.js'
import type { ChangeMessage, Delta, SyncCallbacks } from '../../src/types/index.js'

const T0 = new Date('2024-01-01T00:00:00.000Z')
const NOW = new Date('2024-06-01T00:00:00.000Z')

function createParams<T extends object>() {
  const log: string[] = []
  const messages: ChangeMessage<T>[] = []
  const params: SyncCallbacks<T> = {
    begin: () => {
      log.push('begin')
    },
    write: (message) => {
      messages.push(message)
      log.push(`${message.type}:${message.key}`)
    },
    commit: () => {
      log.push('commit')
    },
    markReady: () => {
      log.push('markReady')
    },
  }
  return { params, log, messages }
}

describe('deltaToChangeMessage', () => {
  it('should map added deltas to inserts', () => {
    const delta: Delta = { collection: 'clients', kind: 'added', id: 'c1', after: { name: 'Acme' }, sequence: 4 }

    expect(deltaToChangeMessage(delta, toSyncedRow)).toEqual({
      type: 'insert',
      key: 'c1',
      value: { name: 'Acme', id: 'c1' },
      metadata: { sequence: 4 },
    })
  })

  it('should map modified deltas to updates with the previous value', () => {
    const delta: Delta = {
      collection: 'clients',
      kind: 'modified',
      id: 'c1',
      before: { name: 'Acme' },
      after: { name: 'Acme Ltd' },
      sequence: 5,
    }

    expect(deltaToChangeMessage(delta, toSyncedRow)).toEqual({
      type: 'update',
      key: 'c1',
      value: { name: 'Acme Ltd', id: 'c1' },
      previousValue: { name: 'Acme', id: 'c1' },
      metadata: { sequence: 5 },
    })
  })

  it('should map removed deltas to deletes carrying the last value', () => {
    const delta: Delta = { collection: 'clients', kind: 'removed', id: 'c1', before: { name: 'Acme' }, sequence: 6 }

    expect(deltaToChangeMessage(delta, toSyncedRow)).toEqual({
      type: 'delete',
      key: 'c1',
      value: { name: 'Acme', id: 'c1' },
      metadata: { sequence: 6 },
    })
  })

  it('should skip deltas missing their document', () => {
    expect(deltaToChangeMessage({ collection: 'c', kind: 'added', id: 'x', sequence: 1 }, toSyncedRow)).toBeUndefined()
    expect(deltaToChangeMessage({ collection: 'c', kind: 'removed', id: 'x', sequence: 1 }, toSyncedRow)).toBeUndefined()
  })
})

describe('createLiveCollectionSync', () => {
  let store: InMemoryRemoteStore
  let engine: SyncEngine

  beforeEach(() => {
    vi.useFakeTimers()
    store = new InMemoryRemoteStore({
      initialData: {
        clients: [
          { id: 'c1', document: { name: 'Acme', updatedAt: T0 } },
          { id: 'c2', document: { name: 'Globex', updatedAt: T0 } },
        ],
      },
    })
    engine = createSyncEngine({
      store,
      logger: silentLogger,
      clock: () => new Date(NOW),
      random: () => 0.5,
    })
  })

  afterEach(() => {
    engine.dispose()
    vi.useRealTimers()
  })

  it('should load the initial listing in one transaction and then mark ready', async () => {
    const { params, log, messages } = createParams<SyncedRow>()

    createDocumentCollectionSync(engine, 'clients')(params)
    await engine.ready('clients')
    await engine.idle()

    expect(log).toEqual(['begin', 'insert:c1', 'insert:c2', 'commit', 'markReady'])
    expect(messages[0]).toEqual({
      type: 'insert',
      key: 'c1',
      value: { id: 'c1', name: 'Acme', updatedAt: T0 },
      metadata: { sequence: 1 },
    })
  })

  it('should commit each live change on its own', async () => {
    const { params, log, messages } = createParams<SyncedRow>()
    createDocumentCollectionSync(engine, 'clients')(params)
    await engine.ready('clients')
    await engine.idle()
    log.length = 0

    await engine.update('clients', 'c1', { tier: 2 })
    await engine.remove('clients', 'c2')
    await engine.idle()

    expect(log).toEqual(['begin', 'update:c1', 'commit', 'begin', 'delete:c2', 'commit'])
    expect(messages[2]).toEqual({
      type: 'update',
      key: 'c1',
      value: { id: 'c1', name: 'Acme', tier: 2, updatedAt: NOW },
      previousValue: { id: 'c1', name: 'Acme', updatedAt: T0 },
      metadata: { sequence: 3 },
    })
  })

  it('should batch the changes of a resync after reconnecting', async () => {
    const { params, log } = createParams<SyncedRow>()
    createDocumentCollectionSync(engine, 'clients')(params)
    await engine.ready('clients')
    await engine.idle()
    log.length = 0

    store.failStreams('clients')
    await store.writeDocument('clients', 'c3', { name: 'Initech', updatedAt: T0 })
    await store.deleteDocument('clients', 'c2')
    await vi.advanceTimersByTimeAsync(1000)
    await engine.idle()

    expect(engine.subscriptionState('clients')).toBe('active')
    expect(log).toEqual(['begin', 'insert:c3', 'delete:c2', 'commit'])
  })

  it('should load synchronously from a subscription that is already active', async () => {
    engine.subscribe('clients', () => {})
    await engine.ready('clients')
    const { params, log } = createParams<SyncedRow>()

    createDocumentCollectionSync(engine, 'clients')(params)

    expect(log).toEqual(['begin', 'insert:c1', 'insert:c2', 'commit', 'markReady'])
    await engine.idle()
    expect(log).toHaveLength(5)
  })

  it('should convert documents with a custom row mapper', async () => {
    interface ClientRow {
      id: string
      label: string
    }
    const { params, messages } = createParams<ClientRow>()

    createLiveCollectionSync<ClientRow>(engine, 'clients', {
      toRow: (id, document) => ({ id, label: String(document.name) }),
    })(params)
    await engine.ready('clients')
    await engine.idle()

    expect(messages.map((message) => message.value)).toEqual([
      { id: 'c1', label: 'Acme' },
      { id: 'c2', label: 'Globex' },
    ])
  })

  it('should stop syncing on cleanup', async () => {
    const { params, log } = createParams<SyncedRow>()
    const { cleanup } = createDocumentCollectionSync(engine, 'clients')(params)
    await engine.ready('clients')
    await engine.idle()

    cleanup()
    cleanup()

    expect(engine.subscriptionState('clients')).toBe('closed')
    expect(store.streamCount('clients')).toBe(0)
    expect(log).toHaveLength(5)
  })
})
