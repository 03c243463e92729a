/**
 * @file Reconnection Backoff
 *
 * Capped exponential backoff with proportional jitter.
 *
 * @module @docsync/collection-sync/sync/backoff
 */

import type { BackoffSettings } from '../config.js'

/**
 * Calculates the delay before reconnection attempt `attempt` (1-based).
 *
 * The base delay is `initialDelayMs * multiplier^(attempt - 1)`, capped at
 * `maxDelayMs`. Jitter then moves it by up to `±jitter` of itself, and the
 * result is capped again.
 *
 * @param random - Source of uniform numbers in [0, 1)
 *
 * @example
 * ```typescript
 * const settings = { initialDelayMs: 1000, multiplier: 2, maxDelayMs: 30000, jitter: 0 }
 * calculateBackoffDelay(1, settings) // 1000
 * calculateBackoffDelay(3, settings) // 4000
 * calculateBackoffDelay(10, settings) // 30000
 * ```
 */
export function calculateBackoffDelay(
  attempt: number,
  settings: BackoffSettings,
  random: () => number = Math.random
): number {
  const exponent = Math.max(0, attempt - 1)
  const base = Math.min(
    settings.maxDelayMs,
    settings.initialDelayMs * Math.pow(settings.multiplier, exponent)
  )

  if (settings.jitter <= 0) {
    return Math.round(base)
  }

  const offset = base * settings.jitter * (2 * random() - 1)
  return Math.round(Math.min(settings.maxDelayMs, Math.max(0, base + offset)))
}
