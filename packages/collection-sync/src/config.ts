/**
 * @file Engine Configuration
 *
 * Merges caller options over defaults and validates the numeric settings with
 * zod. Collaborators (store, logger, clock, random source, document schemas)
 * are passed through untouched.
 *
 * @module @docsync/collection-sync/config
 */

import { z } from 'zod'
import type { ZodSchema } from 'zod'
import type { RemoteStore } from './store/remote-store.js'
import type { Logger } from './logger.js'
import type { CollectionName } from './types/document.js'
import { SyncError } from './errors.js'

// =============================================================================
// Settings Schema
// =============================================================================

/**
 * Longest delay `setTimeout` honours; larger values fire after 1 ms.
 */
export const MAX_TIMER_DELAY_MS = 2147483647

const timerDelaySchema = z.number().int().positive().max(MAX_TIMER_DELAY_MS)

/**
 * Zod schema for the backoff applied between reconnection attempts.
 */
export const backoffSettingsSchema = z
  .object({
    initialDelayMs: timerDelaySchema,
    maxDelayMs: timerDelaySchema,
    multiplier: z.number().min(1),
    jitter: z.number().min(0).max(1),
  })
  .refine((value) => value.maxDelayMs >= value.initialDelayMs, {
    message: 'maxDelayMs must be greater than or equal to initialDelayMs',
    path: ['maxDelayMs'],
  })

/**
 * Zod schema for the engine's tunable settings.
 */
export const syncEngineSettingsSchema = z.object({
  backoff: backoffSettingsSchema,
  pendingMutationTimeoutMs: timerDelaySchema,
  resyncBufferSize: z.number().int().positive(),
  replayOnSubscribe: z.boolean(),
  debug: z.boolean(),
})

/**
 * Backoff settings for the reconnection supervisor.
 */
export type BackoffSettings = z.infer<typeof backoffSettingsSchema>

/**
 * Fully resolved engine settings.
 */
export type SyncEngineSettings = z.infer<typeof syncEngineSettingsSchema>

/**
 * Default configuration values.
 *
 * Backoff runs 1s → 2s → 4s … capped at 30s with ±20% jitter; an echo that
 * has not arrived 10s after its write is dropped from the pending list.
 */
export const DEFAULT_SETTINGS: SyncEngineSettings = {
  backoff: {
    initialDelayMs: 1000,
    maxDelayMs: 30000,
    multiplier: 2,
    jitter: 0.2,
  },
  pendingMutationTimeoutMs: 10000,
  resyncBufferSize: 10000,
  replayOnSubscribe: true,
  debug: false,
}

// =============================================================================
// Options
// =============================================================================

/**
 * Options accepted by `createSyncEngine`.
 *
 * @example
 * ```typescript
 * const engine = createSyncEngine({
 *   store: new InMemoryRemoteStore(),
 *   backoff: { maxDelayMs: 10000 },
 *   schemas: { projects: projectSchema },
 * })
 * ```
 */
export interface SyncEngineOptions {
  /** Remote document store the engine reads from and writes to */
  store: RemoteStore
  /** Custom logger; defaults to the console logger */
  logger?: Logger
  /** Emit debug logs from the default logger */
  debug?: boolean
  /** Clock used to stamp system timestamps. @default () => new Date() */
  clock?: () => Date
  /** Random source in [0, 1) used for backoff jitter. @default Math.random */
  random?: () => number
  /** Optional per-collection document schemas checked before writes */
  schemas?: Record<CollectionName, ZodSchema>
  /** Reconnection backoff overrides */
  backoff?: Partial<BackoffSettings>
  /** How long a pending mutation waits for its echo */
  pendingMutationTimeoutMs?: number
  /** Maximum live events buffered while a resync listing is in flight */
  resyncBufferSize?: number
  /** Whether new observers receive the current documents first */
  replayOnSubscribe?: boolean
}

/**
 * Options after defaults were applied and settings validated.
 */
export interface ResolvedSyncEngineOptions extends SyncEngineSettings {
  store: RemoteStore
  logger?: Logger
  clock: () => Date
  random: () => number
  schemas: Record<CollectionName, ZodSchema>
}

// =============================================================================
// Resolution
// =============================================================================

/**
 * Formats zod issues as `path: message` strings.
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  )
}

/**
 * Applies defaults to engine options and validates the result.
 *
 * @throws {SyncError} If any setting is out of range
 *
 * @example
 * ```typescript
 * const resolved = resolveEngineOptions({ store, backoff: { initialDelayMs: 250 } })
 * resolved.backoff // { initialDelayMs: 250, maxDelayMs: 30000, multiplier: 2, jitter: 0.2 }
 * ```
 */
export function resolveEngineOptions(options: SyncEngineOptions): ResolvedSyncEngineOptions {
  if (!options.store) {
    throw new SyncError('store is required in SyncEngineOptions')
  }

  const merged = {
    backoff: { ...DEFAULT_SETTINGS.backoff, ...options.backoff },
    pendingMutationTimeoutMs:
      options.pendingMutationTimeoutMs ?? DEFAULT_SETTINGS.pendingMutationTimeoutMs,
    resyncBufferSize: options.resyncBufferSize ?? DEFAULT_SETTINGS.resyncBufferSize,
    replayOnSubscribe: options.replayOnSubscribe ?? DEFAULT_SETTINGS.replayOnSubscribe,
    debug: options.debug ?? DEFAULT_SETTINGS.debug,
  }

  const parsed = syncEngineSettingsSchema.safeParse(merged)
  if (!parsed.success) {
    throw new SyncError(`Invalid sync engine options: ${formatIssues(parsed.error).join('; ')}`)
  }

  return {
    ...parsed.data,
    store: options.store,
    logger: options.logger,
    clock: options.clock ?? (() => new Date()),
    random: options.random ?? Math.random,
    schemas: options.schemas ?? {},
  }
}
