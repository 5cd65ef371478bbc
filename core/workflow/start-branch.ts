import type { ReleaseWorkflowContext } from '../../types/release-workflow-context'
import type { BranchRef } from '../../types/branch-ref'

import { ReleaseError } from '../errors/release-error'
import { catchNotFound } from './catch-not-found'

/**
 * Create a branch from the current tip of a base branch, refusing to touch a
 * branch that already exists.
 *
 * @param context - Workflow dependencies.
 * @param name - Branch to create.
 * @param baseName - Branch to start from.
 * @returns Created branch.
 * @throws {ReleaseError} `already-exists` or `base-branch-missing`.
 */
export async function startBranch(
  context: ReleaseWorkflowContext,
  name: string,
  baseName: string,
): Promise<BranchRef> {
  let { client, logger } = context

  let existing = await catchNotFound(client.getBranch(name))
  if (existing) {
    throw new ReleaseError(
      'already-exists',
      `Branch already started. Run\n\tgit fetch --all && git checkout ${name}`,
    )
  }

  let base = await catchNotFound(client.getBranch(baseName))
  if (!base) {
    throw new ReleaseError(
      'base-branch-missing',
      `Base branch ${baseName} does not exist`,
    )
  }

  logger.debug({ base: baseName, sha: base.sha, name }, 'Starting branch')
  let branch = await client.createBranch(name, base.sha)
  logger.info({ sha: branch.sha, name }, 'Branch created')
  return branch
}
