/**
 * @file Logging
 *
 * A small leveled logger interface. The default implementation writes to the
 * console with a timestamped `[collection-sync]` prefix and only emits debug
 * output when debugging is enabled. Applications can inject their own logger
 * (pino, winston, a test spy) through the engine options.
 *
 * @example
 * ```typescript
 * const engine = createSyncEngine({
 *   store,
 *   logger: {
 *     debug: (msg, data) => pino.debug(data, msg),
 *     info: (msg, data) => pino.info(data, msg),
 *     warn: (msg, data) => pino.warn(data, msg),
 *     error: (msg, data) => pino.error(data, msg),
 *   },
 * })
 * ```
 */

/**
 * Signature shared by every log level.
 */
export type LogFn = (message: string, data?: Record<string, unknown>) => void

/**
 * Leveled logger used throughout the engine.
 */
export interface Logger {
  debug: LogFn
  info: LogFn
  warn: LogFn
  error: LogFn
}

/**
 * Options for {@link createConsoleLogger}.
 */
export interface ConsoleLoggerOptions {
  /** Emit `debug` messages. @default false */
  debug?: boolean
  /** Prefix scope, appended after the package tag */
  scope?: string
}

const noop: LogFn = () => {}

/**
 * A logger that discards everything.
 */
export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
}

/**
 * Creates the default console-backed logger.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const tag = options.scope ? `collection-sync:${options.scope}` : 'collection-sync'

  const write =
    (sink: (...args: unknown[]) => void): LogFn =>
    (message, data) => {
      const prefix = `[${tag} ${new Date().toISOString()}]`
      if (data) {
        sink(prefix, message, data)
      } else {
        sink(prefix, message)
      }
    }

  return {
    debug: options.debug ? write(console.debug) : noop,
    info: write(console.info),
    warn: write(console.warn),
    error: write(console.error),
  }
}

/**
 * Resolves the engine's logger from its options: an injected logger wins,
 * otherwise a console logger honoring the `debug` flag.
 */
export function resolveLogger(logger: Logger | undefined, debug: boolean | undefined): Logger {
  return logger ?? createConsoleLogger({ debug })
}

/**
 * Returns a logger whose messages carry a fixed set of extra fields.
 *
 * @example
 * ```typescript
 * const log = withContext(logger, { collection: 'projects' })
 * log.warn('Stream dropped') // data: { collection: 'projects' }
 * ```
 */
export function withContext(logger: Logger, context: Record<string, unknown>): Logger {
  const wrap =
    (fn: LogFn): LogFn =>
    (message, data) =>
      fn(message, data ? { ...context, ...data } : context)

  return {
    debug: wrap(logger.debug),
    info: wrap(logger.info),
    warn: wrap(logger.warn),
    error: wrap(logger.error),
  }
}
