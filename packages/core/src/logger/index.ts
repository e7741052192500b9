import pino, { type DestinationStream, type Logger } from 'pino'
import type { LoggingConfig } from '../schemas/util-config.js'

export type { Logger, DestinationStream } from 'pino'

/**
 * Create the pino logger used for every diagnostic.
 *
 * An explicit destination bypasses the pino-pretty transport so callers
 * (and tests) can route records themselves.
 */
export function createLogger(
  config: LoggingConfig,
  destination?: DestinationStream,
): Logger {
  if (destination) {
    return pino({ level: config.level }, destination)
  }

  const usePretty =
    config.pretty || process.env.NODE_ENV !== 'production'

  return pino({
    level: config.level,
    ...(usePretty
      ? { transport: { target: 'pino-pretty' } }
      : {}),
  })
}
