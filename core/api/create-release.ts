import type { components } from '@octokit/openapi-types'

import type { RepositoryClientContext } from '../../types/repository-client-context'
import type { ReleaseInfo } from '../../types/release-info'
import type { NewRelease } from '../../types/new-release'

import { normalizeRelease } from './normalize-release'
import { makeRequest } from './make-request'

/**
 * Create a published release with an empty body.
 *
 * @param context - Client context.
 * @param release - Tag, target commit, name and prerelease flag.
 * @returns Created release.
 */
export async function createRelease(
  context: RepositoryClientContext,
  release: NewRelease,
): Promise<ReleaseInfo> {
  let { data } = await makeRequest(context, 'releases', {
    body: JSON.stringify({
      target_commitish: release.targetSha,
      prerelease: release.prerelease,
      tag_name: release.tagName,
      name: release.name,
      draft: false,
      body: '',
    }),
    method: 'POST',
  })
  return normalizeRelease(data as components['schemas']['release'])
}
