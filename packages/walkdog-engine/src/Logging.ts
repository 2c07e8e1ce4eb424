import { Effect, Layer, Logger, LogLevel } from 'effect'

export const layer = (level: LogLevel.LogLevel): Layer.Layer<never> =>
  Layer.merge(Logger.pretty, Logger.minimumLogLevel(level))

/**
 * Logs a failure or defect of `self` with its full cause before it propagates.
 */
export const reportDefects = <A, E, R>(self: Effect.Effect<A, E, R>, label: string): Effect.Effect<A, E, R> =>
  self.pipe(Effect.tapErrorCause((cause) => Effect.logError(`${label} stopped`, cause)))
