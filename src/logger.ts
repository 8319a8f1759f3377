/**
 * Logging
 *
 * Library code only ever asks for category loggers; sinks are configured by
 * the embedding application through `configureLogging`. Without it, LogTape
 * drops every record.
 */

import { configure, getConsoleSink, getLogger, type Logger, type LogLevel } from '@logtape/logtape'

export type { Logger, LogLevel } from '@logtape/logtape'

export const ROOT_CATEGORY = 'taskping'

export function getTaskpingLogger(...subcategory: string[]): Logger {
  return getLogger([ROOT_CATEGORY, ...subcategory])
}

export async function configureLogging(lowestLevel: LogLevel = 'info'): Promise<Logger> {
  await configure({
    reset: true,
    sinks: { console: getConsoleSink() },
    loggers: [
      {
        category: [ROOT_CATEGORY],
        lowestLevel,
        sinks: ['console'],
      },
      {
        category: ['logtape', 'meta'],
        lowestLevel: 'warning',
        sinks: ['console'],
      },
    ],
  })

  const logger = getTaskpingLogger()
  logger.debug('Logger configured at {level}', { level: lowestLevel })
  return logger
}
