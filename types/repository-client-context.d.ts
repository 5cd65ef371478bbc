import type { Logger } from 'pino'

/**
 * Internal client context shared by all API functions.
 *
 * Stores auth, rate-limit state, the repository base URL and the logger.
 */
export interface RepositoryClientContext {
  /** Remaining requests available per current rate-limit window. */
  rateLimitRemaining: number

  /** Precomputed `Authorization` header value. */
  authorization: string

  /** Scheduled time when rate limit resets. */
  rateLimitReset: Date

  /** Repository base URL, ending with a slash. */
  baseUrl: string

  /** Diagnostic logger. */
  logger: Logger
}
