import pino, { type Logger } from 'pino'
import type { LoggingConfig } from '../schemas/app-config.js'

export type { Logger } from 'pino'

export function createLogger(config: LoggingConfig): Logger {
  if (config.level === 'silent') {
    return createSilentLogger()
  }
  const usePretty =
    config.pretty || process.env.NODE_ENV !== 'production'

  // Status lines go to stdout, logs to stderr.
  if (usePretty) {
    return pino({
      level: config.level,
      transport: { target: 'pino-pretty', options: { destination: 2 } },
    })
  }

  return pino({ level: config.level }, pino.destination(2))
}

/** Logger that discards everything; used where no logger is supplied. */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' })
}
