import type { ReleaseWorkflowContext } from '../../types/release-workflow-context'
import type { ReleaseWorkflow } from '../../types/release-workflow'

import { resolveReleaseBaseBranch } from './resolve-release-base-branch'
import { createProductionRelease } from './create-production-release'
import { createReleaseBranch } from './create-release-branch'
import { createHotfixBranch } from './create-hotfix-branch'
import { checkMergeStatus } from './check-merge-status'
import { createPreRelease } from './create-pre-release'

/**
 * Bind the release operations to a client and logger.
 *
 * @param context - Workflow dependencies.
 * @returns Workflow with bound methods.
 */
export function createReleaseWorkflow(
  context: ReleaseWorkflowContext,
): ReleaseWorkflow {
  return {
    resolveReleaseBaseBranch: version =>
      resolveReleaseBaseBranch(context, version),
    createReleaseBranch: version => createReleaseBranch(context, version),
    createRelease: version => createProductionRelease(context, version),
    checkMergeStatus: version => checkMergeStatus(context, version),
    createPreRelease: version => createPreRelease(context, version),
    createHotfixBranch: ticket => createHotfixBranch(context, ticket),
  }
}
