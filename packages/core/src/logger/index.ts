import pino, { type Logger } from 'pino'
import type { LoggingConfig } from '../schemas/config.js'

export type { Logger } from 'pino'

export interface LogDestinations {
  /** Minimum level written to stderr (default: the configured level). */
  consoleLevel?: pino.LevelWithSilent
  /** Log file that receives every record at the configured level. */
  file?: string
}

export function createLogger(
  config: LoggingConfig,
  destinations: LogDestinations = {},
): Logger {
  const usePretty =
    config.pretty || process.env.NODE_ENV !== 'production'
  const consoleLevel = destinations.consoleLevel ?? config.level

  const streams: pino.StreamEntry[] = []
  if (consoleLevel !== 'silent') {
    streams.push({
      level: consoleLevel,
      stream: usePretty
        ? pino.transport({ target: 'pino-pretty', options: { destination: 2 } })
        : pino.destination(2),
    })
  }
  if (destinations.file !== undefined) {
    streams.push({
      level: config.level,
      stream: pino.destination({
        dest: destinations.file,
        mkdir: true,
        sync: true,
      }),
    })
  }

  if (streams.length === 0) {
    return pino({ level: 'silent' })
  }

  const lowest = streams.reduce<pino.Level>((min, entry) => {
    const level = entry.level ?? 'info'
    return pino.levels.values[level] < pino.levels.values[min] ? level : min
  }, 'fatal')

  return pino({ level: lowest }, pino.multistream(streams))
}
