import type { components } from '@octokit/openapi-types'

import type { RepositoryClientContext } from '../../types/repository-client-context'
import type { Comparison } from '../../types/comparison'

import { encodeRefPath } from './encode-ref-path'
import { makeRequest } from './make-request'

/**
 * Compare two refs.
 *
 * Status is `ahead` when head has commits base lacks, `behind` in the
 * opposite case, `diverged` when both do and `identical` otherwise.
 *
 * @param context - Client context.
 * @param base - Base ref (branch, tag or SHA).
 * @param head - Head ref.
 * @returns Comparison of head against base.
 * @throws {ReleaseError} `not-found` when either ref does not exist.
 */
export async function compareRefs(
  context: RepositoryClientContext,
  base: string,
  head: string,
): Promise<Comparison> {
  let { data } = await makeRequest(
    context,
    `compare/${encodeRefPath(base)}...${encodeRefPath(head)}`,
  )
  let comparison = data as components['schemas']['commit-comparison']

  return {
    totalCommits: comparison.total_commits,
    behindBy: comparison.behind_by,
    aheadBy: comparison.ahead_by,
    status: comparison.status,
    url: comparison.html_url,
    base,
    head,
  }
}
