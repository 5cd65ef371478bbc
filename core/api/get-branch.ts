import type { RepositoryClientContext } from '../../types/repository-client-context'
import type { BranchRef } from '../../types/branch-ref'

import { normalizeBranchRef } from './normalize-branch-ref'
import { encodeRefPath } from './encode-ref-path'
import { makeRequest } from './make-request'

/**
 * Fetch a branch and the SHA of its tip.
 *
 * @param context - Client context.
 * @param name - Branch name.
 * @returns Branch reference.
 * @throws {ReleaseError} `not-found` when the branch does not exist.
 */
export async function getBranch(
  context: RepositoryClientContext,
  name: string,
): Promise<BranchRef> {
  let path = `git/refs/heads/${encodeRefPath(name)}`
  let { data } = await makeRequest(context, path)
  return normalizeBranchRef(name, data)
}
