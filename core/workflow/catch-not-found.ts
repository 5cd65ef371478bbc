import { isReleaseError } from '../errors/release-error'

/**
 * Resolve a lookup to null when the resource does not exist.
 *
 * Only `not-found` is absorbed; every other failure propagates.
 *
 * @param lookup - Pending lookup.
 * @returns Lookup result or null.
 */
export async function catchNotFound<T>(lookup: Promise<T>): Promise<T | null> {
  try {
    return await lookup
  } catch (error) {
    if (isReleaseError(error, 'not-found')) {
      return null
    }
    throw error
  }
}
