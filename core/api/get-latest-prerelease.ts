import type { RepositoryClientContext } from '../../types/repository-client-context'
import type { ReleaseInfo } from '../../types/release-info'

import { ReleaseError } from '../errors/release-error'
import { listPrereleases } from './list-prereleases'

/**
 * Fetch the most recent prerelease.
 *
 * @param context - Client context.
 * @returns First prerelease in API order.
 * @throws {ReleaseError} `not-found` when there are no prereleases.
 */
export async function getLatestPrerelease(
  context: RepositoryClientContext,
): Promise<ReleaseInfo> {
  let [latest] = await listPrereleases(context)
  if (!latest) {
    throw new ReleaseError('not-found', 'No prereleases found')
  }
  return latest
}
