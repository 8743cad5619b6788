import pino, { type DestinationStream, type Logger } from 'pino'
import type { LoggingConfig } from '../schemas/portico-config.js'

export type { Logger } from 'pino'

// Endpoint configs and listener options carry secrets and TLS keys
const REDACT_PATHS = [
  'secretKeyBase',
  '*.secretKeyBase',
  'key',
  '*.key',
]

/**
 * Root logger. Writes through pino-pretty unless in production or an
 * explicit destination is given.
 */
export function createLogger(
  config: LoggingConfig,
  name?: string,
  destination?: DestinationStream,
): Logger {
  const options = {
    level: config.level,
    redact: REDACT_PATHS,
    ...(name !== undefined && { name }),
  }
  if (destination) {
    return pino(options, destination)
  }

  const usePretty =
    config.pretty || process.env.NODE_ENV !== 'production'
  return pino({
    ...options,
    ...(usePretty
      ? { transport: { target: 'pino-pretty' } }
      : {}),
  })
}
