import pino, { type Logger } from 'pino'
import type { LoggingConfig } from '../schemas/pipeline-config.js'

export type { Logger } from 'pino'

/**
 * Root pipeline logger. Pretty output outside production or when asked for;
 * raw JSON lines otherwise. Components derive children with their own context.
 */
export function createLogger(
  config: LoggingConfig,
  name = 'neuroshard',
): Logger {
  const usePretty =
    config.pretty || process.env.NODE_ENV !== 'production'

  return pino({
    name,
    level: config.level,
    ...(usePretty
      ? { transport: { target: 'pino-pretty' } }
      : {}),
  })
}
