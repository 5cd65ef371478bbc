import type { RepositoryClientContext } from '../../types/repository-client-context'

/**
 * Update rate limit information from response headers.
 *
 * @param context - Client context with mutable rate limit fields.
 * @param headers - Response headers map.
 */
export function updateRateLimitInfo(
  context: RepositoryClientContext,
  headers: Record<string, string>,
): void {
  let remaining = Number.parseInt(headers['x-ratelimit-remaining'] ?? '', 10)
  if (!Number.isNaN(remaining)) {
    context.rateLimitRemaining = remaining
  }

  let reset = Number.parseInt(headers['x-ratelimit-reset'] ?? '', 10)
  if (!Number.isNaN(reset)) {
    context.rateLimitReset = new Date(reset * 1000)
  }
}
