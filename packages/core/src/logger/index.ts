import pino, { type Logger } from 'pino'
import type { LoggingConfig } from '../schemas/storage-config.js'

export type { Logger } from 'pino'

export interface CreateLoggerOptions {
  /** File descriptor to write to; the CLI keeps stdout for command output. */
  fd?: 1 | 2
}

export function createLogger(
  config: LoggingConfig,
  options: CreateLoggerOptions = {},
): Logger {
  const fd = options.fd ?? 1
  const usePretty =
    config.pretty || process.env.NODE_ENV !== 'production'

  if (usePretty) {
    return pino({
      level: config.level,
      transport: { target: 'pino-pretty', options: { destination: fd } },
    })
  }
  return pino({ level: config.level }, pino.destination(fd))
}
