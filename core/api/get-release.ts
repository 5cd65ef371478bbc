import type { components } from '@octokit/openapi-types'

import type { RepositoryClientContext } from '../../types/repository-client-context'
import type { ReleaseInfo } from '../../types/release-info'

import { normalizeRelease } from './normalize-release'
import { encodeRefPath } from './encode-ref-path'
import { makeRequest } from './make-request'

/**
 * Fetch a release by its tag name.
 *
 * @param context - Client context.
 * @param tag - Tag name.
 * @returns Release information.
 * @throws {ReleaseError} `not-found` when no release has this tag.
 */
export async function getRelease(
  context: RepositoryClientContext,
  tag: string,
): Promise<ReleaseInfo> {
  let path = `releases/tags/${encodeRefPath(tag)}`
  let { data } = await makeRequest(context, path)
  return normalizeRelease(data as components['schemas']['release'])
}
