import type { ReleaseWorkflowContext } from '../../types/release-workflow-context'
import type { BranchRef } from '../../types/branch-ref'

import { extractMajorVersion } from '../versions/extract-major-version'
import { releaseBranchName } from '../versions/release-branch-name'
import { validateVersion } from '../versions/validate-version'
import { DEVELOP_BRANCH } from './constants'
import { startBranch } from './start-branch'

/**
 * Start the release branch for a version from `develop`.
 *
 * @param context - Workflow dependencies.
 * @param version - Version the branch is started for.
 * @returns Created `release-<major>` branch.
 */
export async function createReleaseBranch(
  context: ReleaseWorkflowContext,
  version: string,
): Promise<BranchRef> {
  validateVersion(version)
  let name = releaseBranchName(extractMajorVersion(version))
  return startBranch(context, name, DEVELOP_BRANCH)
}
