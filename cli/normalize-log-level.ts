import type { LogLevel } from '../types/log-level'

const LOG_LEVELS: LogLevel[] = [
  'trace',
  'debug',
  'info',
  'warn',
  'error',
  'fatal',
  'silent',
]

/**
 * Normalizes the log level option.
 *
 * @param level - Raw `--log` option.
 * @returns Normalized log level, `error` when not given.
 */
export function normalizeLogLevel(level: undefined | string): LogLevel {
  let normalized = (level ?? 'error').toLowerCase()
  let match = LOG_LEVELS.find(candidate => candidate === normalized)
  if (match) {
    return match
  }
  throw new Error(
    `Invalid log level "${level}". Expected one of: ${LOG_LEVELS.join(', ')}.`,
  )
}
