import pino, { type Logger } from 'pino'
import type { LoggingConfig } from '../schemas/server-config.js'

export type { Logger } from 'pino'

export interface CreateLoggerOptions {
  /** Value of the `name` field stamped on every line. */
  name?: string
}

export function createLogger(
  config: LoggingConfig,
  options?: CreateLoggerOptions,
): Logger {
  const usePretty =
    config.pretty || process.env.NODE_ENV !== 'production'

  return pino({
    name: options?.name ?? 'filedock',
    level: config.level,
    redact: ['req.headers.authorization', 'req.headers.cookie'],
    ...(usePretty
      ? { transport: { target: 'pino-pretty' } }
      : {}),
  })
}

/** Logger that discards everything; used where no logger is injected. */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' })
}
