import type { components } from '@octokit/openapi-types'

import type { ReleaseInfo } from '../../types/release-info'

/**
 * Convert a release payload into ReleaseInfo.
 *
 * @param release - Release as returned by the REST API.
 * @returns Normalized release.
 */
export function normalizeRelease(
  release: components['schemas']['release'],
): ReleaseInfo {
  return {
    publishedAt: release.published_at ? new Date(release.published_at) : null,
    name: release.name ?? release.tag_name,
    description: release.body ?? null,
    isPrerelease: release.prerelease,
    target: release.target_commitish,
    tagName: release.tag_name,
    isDraft: release.draft,
    url: release.html_url,
    id: release.id,
  }
}
