import type { ReleaseWorkflowContext } from '../../types/release-workflow-context'
import type { ReleaseInfo } from '../../types/release-info'

import { extractMajorVersion } from '../versions/extract-major-version'
import { releaseBranchName } from '../versions/release-branch-name'
import { validateVersion } from '../versions/validate-version'
import { ReleaseError } from '../errors/release-error'
import { catchNotFound } from './catch-not-found'

/**
 * Cut a QA prerelease from the tip of the release branch.
 *
 * @param context - Workflow dependencies.
 * @param version - Version to tag.
 * @returns Created prerelease.
 * @throws {ReleaseError} `base-branch-missing` or `already-exists`.
 */
export async function createPreRelease(
  context: ReleaseWorkflowContext,
  version: string,
): Promise<ReleaseInfo> {
  let { client, logger } = context
  validateVersion(version)

  let branchName = releaseBranchName(extractMajorVersion(version))
  let branch = await catchNotFound(client.getBranch(branchName))
  if (!branch) {
    throw new ReleaseError(
      'base-branch-missing',
      `Release branch ${branchName} does not exist`,
    )
  }

  let existing = await catchNotFound(client.getRelease(version))
  if (existing) {
    throw new ReleaseError('already-exists', 'Release already created.')
  }

  let release = await client.createRelease({
    name: `release-${version}`,
    targetSha: branch.sha,
    tagName: version,
    prerelease: true,
  })
  logger.info({ tag: release.tagName, sha: branch.sha }, 'Prerelease created')
  return release
}
