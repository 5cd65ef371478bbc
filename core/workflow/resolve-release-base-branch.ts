import type { ReleaseWorkflowContext } from '../../types/release-workflow-context'

import { extractMajorVersion } from '../versions/extract-major-version'
import { releaseBranchName } from '../versions/release-branch-name'
import { ReleaseError } from '../errors/release-error'
import { catchNotFound } from './catch-not-found'
import { MAINLINE_BRANCH } from './constants'

/**
 * Determine the branch a release is cut from.
 *
 * A version sharing its major version with the production release is a hotfix
 * and is based on `master`. A version sharing it with the latest prerelease is
 * based on that release branch. Nothing else has a base yet.
 *
 * @param context - Workflow dependencies.
 * @param version - Requested version.
 * @returns `master` or `release-<major>`.
 * @throws {ReleaseError} `base-branch-unresolved` when neither matches.
 */
export async function resolveReleaseBaseBranch(
  context: ReleaseWorkflowContext,
  version: string,
): Promise<string> {
  let { client, logger } = context
  let releaseMajor = extractMajorVersion(version)

  let production = await catchNotFound(client.latestRelease())
  if (production && extractMajorVersion(production.tagName) === releaseMajor) {
    logger.debug(
      { production: production.tagName, version },
      'Release targets the production major version',
    )
    return MAINLINE_BRANCH
  }

  let prerelease = await catchNotFound(client.latestPrerelease())
  if (prerelease && extractMajorVersion(prerelease.tagName) === releaseMajor) {
    logger.debug(
      { prerelease: prerelease.tagName, version },
      'Release targets the prerelease major version',
    )
    return releaseBranchName(releaseMajor)
  }

  throw new ReleaseError(
    'base-branch-unresolved',
    `Could not determine the base branch for ${version}: it matches neither ` +
      `the production release (${production?.tagName ?? 'none'}) nor the ` +
      `latest prerelease (${prerelease?.tagName ?? 'none'})`,
  )
}
