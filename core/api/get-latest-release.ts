import type { components } from '@octokit/openapi-types'

import type { RepositoryClientContext } from '../../types/repository-client-context'
import type { ReleaseInfo } from '../../types/release-info'

import { normalizeRelease } from './normalize-release'
import { makeRequest } from './make-request'

/**
 * Fetch the latest production release.
 *
 * GitHub defines "latest" as the most recent release that is neither a draft
 * nor a prerelease.
 *
 * @param context - Client context.
 * @returns Latest release.
 * @throws {ReleaseError} `not-found` when the repository has no release yet.
 */
export async function getLatestRelease(
  context: RepositoryClientContext,
): Promise<ReleaseInfo> {
  let { data } = await makeRequest(context, 'releases/latest')
  return normalizeRelease(data as components['schemas']['release'])
}
