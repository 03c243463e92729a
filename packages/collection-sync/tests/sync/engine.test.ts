/**
 * Sync Engine Tests
 *
 * End-to-end behavior of the engine facade over the in-memory store:
 * subscriptions, echoes, replay, ordering, reconnection and lifecycle.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { createSyncEngine } from '../../src/sync/engine.js'
import type { SyncEngine } from '../../src/sync/engine.js'
import { InMemoryRemoteStore } from '../../src/store/memory-store.js'
import { silentLogger } from '../../src/logger.js'
import {
  EngineDisposedError,
  InvalidCollectionError,
  ObserverFailureError,
  RemoteWriteError,
} from '../../src/errors.js'
import type { Delta } from '../../src/types/events.js'
import type { StatusChange, SubscriptionStatus } from '../../src/types/index.js'

const T0 = new Date('2024-01-01T00:00:00.000Z')
const T1 = new Date('2024-02-01T00:00:00.000Z')
const T2 = new Date('2024-03-01T00:00:00.000Z')
const NOW = new Date('2024-06-01T00:00:00.000Z')

function createEngine(store: InMemoryRemoteStore): SyncEngine {
  return createSyncEngine({
    store,
    logger: silentLogger,
    clock: () => new Date(NOW),
    random: () => 0.5,
  })
}

function collect(): { deltas: Delta[]; observer: (delta: Delta) => void } {
  const deltas: Delta[] = []
  return {
    deltas,
    observer: (delta) => {
      deltas.push(delta)
    },
  }
}

describe('SyncEngine', () => {
  let store: InMemoryRemoteStore
  let engine: SyncEngine

  beforeEach(() => {
    store = new InMemoryRemoteStore()
    engine = createEngine(store)
  })

  afterEach(() => {
    engine.dispose()
  })

  // ===========================================================================
  // Echoes
  // ===========================================================================

  describe('mutations', () => {
    it('should deliver the echo of a create exactly once to every observer', async () => {
      const first = collect()
      const second = collect()
      engine.subscribe('clients', first.observer)
      engine.subscribe('clients', second.observer)
      await engine.ready('clients')

      const id = await engine.create('clients', { name: 'Acme' }, { id: 'c1' })
      await engine.idle()

      expect(id).toBe('c1')
      expect(first.deltas).toEqual([
        {
          collection: 'clients',
          kind: 'added',
          id: 'c1',
          after: { name: 'Acme', createdAt: NOW, updatedAt: NOW },
          sequence: 1,
        },
      ])
      expect(second.deltas).toEqual(first.deltas)
      expect(engine.pendingMutations()).toEqual([])
    })

    it('should apply update and remove echoes to the snapshot', async () => {
      store.seed('clients', [{ id: 'c1', document: { name: 'Acme', updatedAt: T0 } }])
      const { deltas, observer } = collect()
      engine.subscribe('clients', observer)
      await engine.ready('clients')

      await engine.update('clients', 'c1', { name: 'Acme Ltd' })
      expect(engine.get('clients', 'c1')).toEqual({ name: 'Acme Ltd', updatedAt: NOW })

      await engine.remove('clients', 'c1')
      await engine.idle()

      expect(engine.get('clients', 'c1')).toBeUndefined()
      expect(deltas.map((delta) => `${delta.kind}:${delta.id}:${delta.sequence}`)).toEqual([
        'added:c1:1',
        'modified:c1:2',
        'removed:c1:3',
      ])
      expect(deltas[2].before).toEqual({ name: 'Acme Ltd', updatedAt: NOW })
      expect(engine.pendingMutations('clients')).toEqual([])
    })

    it('should reject failed writes without leaving a pending mutation', async () => {
      engine.subscribe('clients', () => {})
      await engine.ready('clients')
      store.failNextWrite(new Error('offline'))

      await expect(engine.create('clients', { name: 'Acme' }, { id: 'c1' })).rejects.toBeInstanceOf(
        RemoteWriteError
      )
      expect(engine.pendingMutations()).toEqual([])
      expect(engine.get('clients', 'c1')).toBeUndefined()
    })
  })

  // ===========================================================================
  // Subscriptions
  // ===========================================================================

  describe('subscriptions', () => {
    beforeEach(() => {
      store.seed('clients', [
        { id: 'c1', document: { name: 'Acme', updatedAt: T0 } },
        { id: 'c2', document: { name: 'Globex', updatedAt: T0 } },
      ])
    })

    it('should deliver the initial listing as sequenced added deltas', async () => {
      const { deltas, observer } = collect()
      engine.subscribe('clients', observer)

      expect(engine.subscriptionState('clients')).toBe('pending')
      await engine.ready('clients')
      await engine.idle()

      expect(engine.subscriptionState('clients')).toBe('active')
      expect(deltas.map((delta) => [delta.id, delta.sequence])).toEqual([
        ['c1', 1],
        ['c2', 2],
      ])
    })

    it('should replay held documents to a late subscriber', async () => {
      engine.subscribe('clients', () => {})
      await engine.ready('clients')

      const late = collect()
      const quiet = collect()
      engine.subscribe('clients', late.observer)
      engine.subscribe('clients', quiet.observer, { replay: false })
      await engine.idle()

      expect(late.deltas).toEqual([
        { collection: 'clients', kind: 'added', id: 'c1', after: { name: 'Acme', updatedAt: T0 }, sequence: 2 },
        { collection: 'clients', kind: 'added', id: 'c2', after: { name: 'Globex', updatedAt: T0 }, sequence: 2 },
      ])
      expect(quiet.deltas).toEqual([])
      expect(store.streamCount('clients')).toBe(1)
    })

    it('should close the subscription when the last observer leaves', async () => {
      const first = engine.subscribe('clients', () => {})
      const second = engine.subscribe('clients', () => {})
      await engine.ready('clients')

      engine.unsubscribe(first)
      expect(engine.subscriptionState('clients')).toBe('active')

      engine.unsubscribe(second)
      engine.unsubscribe(second)

      expect(engine.subscriptionState('clients')).toBe('closed')
      expect(engine.collections()).toEqual([])
      expect(store.streamCount('clients')).toBe(0)
      expect(engine.snapshot('clients').documents.size).toBe(0)
      expect(engine.snapshot('clients').lastSequence).toBe(0)
    })

    it('should reject ready without an open subscription', async () => {
      await expect(engine.ready('clients')).rejects.toThrow('No open subscription for "clients"')
    })

    it('should reject ready when the subscription closes first', async () => {
      const handle = engine.subscribe('clients', () => {})
      const assertion = expect(engine.ready('clients')).rejects.toThrow(
        'Subscription for "clients" closed before it became active'
      )

      engine.unsubscribe(handle)

      await assertion
    })

    it('should reject invalid collection names', () => {
      expect(() => engine.subscribe('', () => {})).toThrow(InvalidCollectionError)
      expect(() => engine.snapshot('clients/archived')).toThrow(InvalidCollectionError)
    })

    it('should hand out frozen documents', async () => {
      engine.subscribe('clients', () => {})
      await engine.ready('clients')

      expect(Object.isFrozen(engine.get('clients', 'c1'))).toBe(true)
      expect(engine.snapshot('clients').documents.get('c2')).toEqual({ name: 'Globex', updatedAt: T0 })
    })
  })

  // ===========================================================================
  // Ordering and Conflicts
  // ===========================================================================

  describe('stream ordering', () => {
    it('should discard stale and duplicate deliveries', async () => {
      store.seed('projects', [{ id: 'p1', document: { name: 'Fit-out', updatedAt: T1 } }])
      const { deltas, observer } = collect()
      engine.subscribe('projects', observer)
      await engine.ready('projects')

      store.emitRaw('projects', { kind: 'modified', id: 'p1', document: { name: 'Old', updatedAt: T0 } })
      store.emitRaw('projects', { kind: 'modified', id: 'p1', document: { name: 'Fit-out', updatedAt: T1 } })
      store.emitRaw('projects', {
        kind: 'modified',
        id: 'p1',
        document: { name: 'Fit-out', stage: 'build', updatedAt: T2 },
      })
      store.emitRaw('projects', { kind: 'removed', id: 'p1' })
      store.emitRaw('projects', { kind: 'added', id: 'p1', document: { name: 'Fit-out', updatedAt: T1 } })
      await engine.idle()

      expect(deltas.map((delta) => `${delta.kind}:${delta.sequence}`)).toEqual([
        'added:1',
        'modified:4',
        'removed:5',
      ])
      expect(deltas[1].before).toEqual({ name: 'Fit-out', updatedAt: T1 })
      expect(deltas[1].after).toEqual({ name: 'Fit-out', stage: 'build', updatedAt: T2 })
      expect(engine.snapshot('projects').documents.size).toBe(0)
      expect(engine.snapshot('projects').lastSequence).toBe(6)
    })

    it('should not apply buffered changes after a listener closes the subscription', async () => {
      store.seed('projects', [{ id: 'p1', document: { name: 'Fit-out', updatedAt: T0 } }])
      const handle = engine.subscribe('projects', () => {})
      const closeOnFirstDelta = (delta: Delta): void => {
        engine.off('delta', closeOnFirstDelta)
        if (delta.id === 'p1') {
          engine.unsubscribe(handle)
        }
      }
      engine.on('delta', closeOnFirstDelta)
      await store.writeDocument('projects', 'p2', { name: 'Signage', updatedAt: T1 })

      await vi.waitFor(() => expect(engine.subscriptionState('projects')).toBe('closed'))
      expect(engine.snapshot('projects').documents.size).toBe(0)

      await store.deleteDocument('projects', 'p2')
      const { deltas, observer } = collect()
      engine.subscribe('projects', observer)
      await engine.ready('projects')
      await engine.idle()

      expect(deltas.map((delta) => `${delta.kind}:${delta.id}:${delta.sequence}`)).toEqual(['added:p1:1'])
    })

    it('should emit a delta event for every delta', async () => {
      store.seed('projects', [{ id: 'p1', document: { name: 'Fit-out', updatedAt: T1 } }])
      const emitted: Delta[] = []
      engine.on('delta', (delta: Delta) => emitted.push(delta))

      engine.subscribe('projects', () => {})
      await engine.ready('projects')

      expect(emitted.map((delta) => delta.id)).toEqual(['p1'])
    })

    it('should report a throwing observer without affecting the others', async () => {
      store.seed('clients', [{ id: 'c1', document: { name: 'Acme', updatedAt: T0 } }])
      const errors: ObserverFailureError[] = []
      engine.on('observerError', (error: ObserverFailureError) => errors.push(error))
      const healthy = collect()

      engine.subscribe('clients', () => {
        throw new Error('boom')
      })
      engine.subscribe('clients', healthy.observer)
      await engine.ready('clients')
      await engine.idle()

      expect(errors).toHaveLength(1)
      expect(errors[0].message).toBe('Observer 1 on "clients" failed: boom')
      expect(healthy.deltas.map((delta) => delta.id)).toEqual(['c1'])
    })
  })

  // ===========================================================================
  // Reconnection
  // ===========================================================================

  describe('reconnection', () => {
    beforeEach(() => {
      vi.useFakeTimers()
    })

    afterEach(() => {
      vi.useRealTimers()
    })

    it('should converge on the remote state after a dropped stream', async () => {
      store.seed('projects', [{ id: 'p1', document: { name: 'Fit-out', updatedAt: T0 } }])
      const deltas: Delta[] = []
      const statuses: SubscriptionStatus[] = []
      engine.subscribe('projects', {
        onDelta: (delta) => {
          deltas.push(delta)
        },
        onStatusChange: (change: StatusChange) => {
          statuses.push(change.status)
        },
      })
      await engine.ready('projects')
      await engine.idle()

      store.failStreams('projects')
      await store.writeDocument('projects', 'p2', { name: 'Signage', updatedAt: T1 })
      await store.deleteDocument('projects', 'p1')
      expect(engine.subscriptionState('projects')).toBe('reconnecting')

      await vi.advanceTimersByTimeAsync(1000)
      await engine.idle()

      expect(engine.subscriptionState('projects')).toBe('active')
      expect(deltas.map((delta) => `${delta.kind}:${delta.id}:${delta.sequence}`)).toEqual([
        'added:p1:1',
        'added:p2:2',
        'removed:p1:3',
      ])
      expect(statuses).toEqual(['active', 'reconnecting', 'resyncing', 'active'])
      expect([...engine.snapshot('projects').documents.keys()]).toEqual(['p2'])
    })

    it('should pick up out-of-band changes on a forced resync', async () => {
      store.seed('projects', [{ id: 'p1', document: { name: 'Fit-out', updatedAt: T0 } }])
      const { deltas, observer } = collect()
      engine.subscribe('projects', observer)
      await engine.ready('projects')

      store.seed('projects', [{ id: 'p1', document: { name: 'Fit-out', updatedAt: T1 } }])
      await engine.resync('projects')
      await engine.idle()

      expect(deltas.map((delta) => `${delta.kind}:${delta.sequence}`)).toEqual(['added:1', 'modified:2'])
      expect(engine.get('projects', 'p1')).toEqual({ name: 'Fit-out', updatedAt: T1 })
    })
  })

  // ===========================================================================
  // Queries and Lifecycle
  // ===========================================================================

  describe('query', () => {
    it('should filter, order and limit the local snapshot', async () => {
      store.seed('projects', [
        { id: 'p1', document: { status: 'open', createdAt: T0, updatedAt: T0 } },
        { id: 'p2', document: { status: 'done', createdAt: T1, updatedAt: T1 } },
        { id: 'p3', document: { status: 'open', createdAt: T2, updatedAt: T2 } },
      ])
      engine.subscribe('projects', () => {})
      await engine.ready('projects')

      const results = engine.query('projects', {
        where: { status: 'open' },
        orderBy: { field: 'createdAt', direction: 'desc' },
        limit: 1,
      })

      expect(results.map((result) => result.id)).toEqual(['p3'])
      expect(engine.query('tasks')).toEqual([])
    })
  })

  describe('dispose', () => {
    it('should deliver the closed status to registered observers', async () => {
      const statuses: SubscriptionStatus[] = []
      engine.subscribe('clients', {
        onDelta: () => {},
        onStatusChange: (change) => {
          statuses.push(change.status)
        },
      })
      await engine.ready('clients')

      engine.dispose()
      await engine.idle()

      expect(statuses).toEqual(['active', 'closed'])
    })

    it('should close every subscription and refuse further calls', async () => {
      engine.subscribe('clients', () => {})
      await engine.ready('clients')

      engine.dispose()
      engine.dispose()

      expect(engine.disposed).toBe(true)
      expect(engine.subscriptionState('clients')).toBe('closed')
      expect(store.streamCount('clients')).toBe(0)
      expect(() => engine.subscribe('clients', () => {})).toThrow(EngineDisposedError)
      expect(() => engine.create('clients', { name: 'Acme' })).toThrow(
        'Cannot call create() on a disposed sync engine'
      )
    })
  })
})
