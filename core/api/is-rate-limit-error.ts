import type { ReleaseError } from '../errors/release-error'

import { isReleaseError } from '../errors/release-error'

/**
 * Check whether an error is GitHub refusing a request over the rate limit.
 *
 * @param error - Caught value.
 * @returns True for a 403 `remote` error whose body mentions the rate limit.
 */
export function isRateLimitError(error: unknown): error is ReleaseError {
  return (
    isReleaseError(error, 'remote') &&
    error.status === 403 &&
    /rate limit/iu.test(error.body ?? '')
  )
}
