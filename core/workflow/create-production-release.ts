import type { ReleaseWorkflowContext } from '../../types/release-workflow-context'
import type { ReleaseInfo } from '../../types/release-info'

import { extractMajorVersion } from '../versions/extract-major-version'
import { releaseBranchName } from '../versions/release-branch-name'
import { validateVersion } from '../versions/validate-version'
import { ReleaseError } from '../errors/release-error'
import { isMergeRequired } from './is-merge-required'
import { catchNotFound } from './catch-not-found'
import { MAINLINE_BRANCH } from './constants'

/**
 * Promote `master` to a production release.
 *
 * The release branch must already be merged: comparing `master` (base) with
 * `release-<major>` (head) must not report `ahead` or `diverged`. This check
 * is independent of `checkMergeStatus`, which compares the production tag
 * with the resolved base branch instead.
 *
 * @param context - Workflow dependencies.
 * @param version - Version to tag.
 * @returns Created release.
 * @throws {ReleaseError} `merge-required`, `already-exists` or
 *   `base-branch-missing`.
 */
export async function createProductionRelease(
  context: ReleaseWorkflowContext,
  version: string,
): Promise<ReleaseInfo> {
  let { client, logger } = context
  validateVersion(version)

  let branchName = releaseBranchName(extractMajorVersion(version))
  let comparison = await client.compare(MAINLINE_BRANCH, branchName)
  logger.debug({ status: comparison.status, branchName }, 'Merge status')

  if (isMergeRequired(comparison.status)) {
    throw new ReleaseError(
      'merge-required',
      'Release must be merged into master before release',
    )
  }

  let existing = await catchNotFound(client.getRelease(version))
  if (existing) {
    throw new ReleaseError('already-exists', 'Release already created.')
  }

  let mainline = await catchNotFound(client.getBranch(MAINLINE_BRANCH))
  if (!mainline) {
    throw new ReleaseError(
      'base-branch-missing',
      `Base branch ${MAINLINE_BRANCH} does not exist`,
    )
  }

  let release = await client.createRelease({
    name: `release-${version}`,
    targetSha: mainline.sha,
    tagName: version,
    prerelease: false,
  })
  logger.info({ tag: release.tagName, sha: mainline.sha }, 'Release created')
  return release
}
