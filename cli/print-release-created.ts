import pc from 'picocolors'

import type { ReleaseInfo } from '../types/release-info'

/**
 * Prints the created release or prerelease.
 *
 * @param release - Created release.
 */
export function printReleaseCreated(release: ReleaseInfo): void {
  let label = release.isPrerelease ? 'Pre-release' : 'Release'
  console.info(pc.green(`\n✓ ${label} ${release.tagName} created`))
  console.info(pc.gray(`${release.url}\n`))
}
