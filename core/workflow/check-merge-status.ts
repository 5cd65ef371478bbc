import type { ReleaseWorkflowContext } from '../../types/release-workflow-context'
import type { MergeStatus } from '../../types/merge-status'

import { resolveReleaseBaseBranch } from './resolve-release-base-branch'
import { ReleaseError } from '../errors/release-error'
import { isMergeRequired } from './is-merge-required'
import { catchNotFound } from './catch-not-found'

/**
 * Verify the production release is not behind the release base branch.
 *
 * Compares the production tag (base) with the resolved base branch (head). A
 * head that is `ahead` or `diverged` still has unreleased, unmerged work.
 *
 * @param context - Workflow dependencies.
 * @param version - Version about to be promoted.
 * @returns Base branch, production tag and the comparison.
 * @throws {ReleaseError} `no-production-release` or `merge-required`.
 */
export async function checkMergeStatus(
  context: ReleaseWorkflowContext,
  version: string,
): Promise<MergeStatus> {
  let { client, logger } = context
  let baseBranch = await resolveReleaseBaseBranch(context, version)

  let production = await catchNotFound(client.latestRelease())
  if (!production) {
    throw new ReleaseError(
      'no-production-release',
      'Production release tag not found!',
    )
  }

  let comparison = await client.compare(production.tagName, baseBranch)
  logger.debug(
    { production: production.tagName, status: comparison.status, baseBranch },
    'Merge status',
  )

  if (isMergeRequired(comparison.status)) {
    throw new ReleaseError(
      'merge-required',
      'Release must be merged into master before being released',
    )
  }

  return { productionTag: production.tagName, comparison, baseBranch }
}
