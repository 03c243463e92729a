/**
 * @file Event Buffer
 *
 * Holds live changes that arrive while a listing is in flight, in arrival
 * order. The buffer is bounded: when full, the oldest change is dropped and
 * reported through `onOverflow`.
 *
 * @module @docsync/collection-sync/sync/event-buffer
 */

import { SyncError } from '../errors.js'

/**
 * Options for {@link EventBuffer}.
 */
export interface EventBufferOptions {
  /** Maximum number of changes held */
  maxSize: number
  /** Called after changes were dropped to make room */
  onOverflow?: (info: { droppedCount: number }) => void
}

/**
 * Bounded FIFO of live changes.
 *
 * @example
 * ```typescript
 * const buffer = new EventBuffer<RemoteChange>({ maxSize: 1000 })
 * buffer.add({ kind: 'removed', id: 'p1' })
 *
 * for (const change of buffer.flush()) {
 *   reconciler.apply('projects', change)
 * }
 * buffer.dispose()
 * ```
 */
export class EventBuffer<T> {
  private events: T[] = []
  private disposed = false
  private readonly maxSize: number
  private readonly onOverflow?: (info: { droppedCount: number }) => void

  constructor(options: EventBufferOptions) {
    if (!Number.isInteger(options.maxSize) || options.maxSize <= 0) {
      throw new SyncError(`Buffer size must be a positive integer, got ${options.maxSize}`)
    }
    this.maxSize = options.maxSize
    this.onOverflow = options.onOverflow
  }

  get size(): number {
    return this.events.length
  }

  /**
   * Appends a change. Ignored once disposed.
   */
  add(event: T): void {
    if (this.disposed) {
      return
    }
    if (this.events.length >= this.maxSize) {
      const droppedCount = this.events.length - this.maxSize + 1
      this.events.splice(0, droppedCount)
      this.onOverflow?.({ droppedCount })
    }
    this.events.push(event)
  }

  /**
   * Removes and returns every held change, oldest first.
   */
  flush(): T[] {
    const flushed = this.events
    this.events = []
    return flushed
  }

  dispose(): void {
    this.disposed = true
    this.events = []
  }
}
