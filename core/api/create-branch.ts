import type { RepositoryClientContext } from '../../types/repository-client-context'
import type { BranchRef } from '../../types/branch-ref'

import { ReleaseError, isReleaseError } from '../errors/release-error'
import { normalizeBranchRef } from './normalize-branch-ref'
import { makeRequest } from './make-request'

/**
 * Create a branch pointing at a commit.
 *
 * @param context - Client context.
 * @param name - New branch name.
 * @param sha - Commit the branch starts at.
 * @returns Created branch reference.
 * @throws {ReleaseError} `already-exists` when GitHub reports the ref exists.
 */
export async function createBranch(
  context: RepositoryClientContext,
  name: string,
  sha: string,
): Promise<BranchRef> {
  try {
    let { data } = await makeRequest(context, 'git/refs', {
      body: JSON.stringify({ ref: `refs/heads/${name}`, sha }),
      method: 'POST',
    })
    return normalizeBranchRef(name, data)
  } catch (error) {
    if (
      isReleaseError(error, 'remote') &&
      error.status === 422 &&
      /already exists/iu.test(error.body ?? '')
    ) {
      throw new ReleaseError('already-exists', `Branch ${name} already exists`, {
        status: error.status,
        body: error.body ?? undefined,
        cause: error,
      })
    }
    throw error
  }
}
