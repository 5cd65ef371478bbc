import type { components } from '@octokit/openapi-types'

import type { BranchRef } from '../../types/branch-ref'

import { ReleaseError } from '../errors/release-error'

type GitRef = Partial<components['schemas']['git-ref']>

/**
 * Convert a `git/refs/heads/<name>` payload into a BranchRef.
 *
 * When no ref matches the name exactly, the API answers with an array of refs
 * that start with it. That case means the branch does not exist, and so does
 * a single ref for some other name.
 *
 * @param name - Requested branch name.
 * @param data - Parsed response body.
 * @returns Branch reference.
 * @throws {ReleaseError} `not-found` for a ref of another name, `remote` when
 *   the payload carries no SHA.
 */
export function normalizeBranchRef(name: string, data: unknown): BranchRef {
  let expected = `refs/heads/${name}`
  let candidates = (Array.isArray(data) ? data : [data]) as GitRef[]
  let reference = candidates.find(item => item.ref === expected)
  if (!reference) {
    throw new ReleaseError('not-found', `Branch ${name} not found`)
  }

  let sha = reference.object?.sha
  if (typeof sha !== 'string' || sha === '') {
    throw new ReleaseError(
      'remote',
      `Could not locate the current SHA for ${name}`,
    )
  }

  return { url: reference.url ?? '', name, sha }
}
