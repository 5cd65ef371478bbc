import type { components } from '@octokit/openapi-types'

import type { RepositoryClientContext } from '../../types/repository-client-context'
import type { ReleaseInfo } from '../../types/release-info'

import { normalizeRelease } from './normalize-release'
import { makeRequest } from './make-request'

/**
 * List prereleases from the first page of releases.
 *
 * Order is kept as the API returns it (newest first).
 *
 * @param context - Client context.
 * @param limit - Page size of the releases request (default 30).
 * @returns Prereleases only.
 */
export async function listPrereleases(
  context: RepositoryClientContext,
  limit: number = 30,
): Promise<ReleaseInfo[]> {
  let { data } = await makeRequest(context, `releases?per_page=${limit}`)
  let releases = data as components['schemas']['release'][]

  return releases
    .filter(release => release.prerelease)
    .map(release => normalizeRelease(release))
}
