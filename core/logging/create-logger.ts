import type { Logger } from 'pino'

import { destination, pino } from 'pino'

import type { LogLevel } from '../../types/log-level'

/**
 * Create the diagnostic logger. Output goes to stderr synchronously so that
 * nothing is lost when the CLI exits right after a failure.
 *
 * @param level - Minimum level to emit.
 * @returns Pino logger.
 */
export function createLogger(level: LogLevel = 'error'): Logger {
  return pino({ name: 'release-train', level }, destination(2))
}
