import type { ReleaseInfo } from './release-info'
import type { Comparison } from './comparison'
import type { NewRelease } from './new-release'
import type { BranchRef } from './branch-ref'

/**
 * Branch, release and comparison access for one repository.
 *
 * Lookups reject with a `not-found` ReleaseError when the resource does not
 * exist. Writes are plain creates; nothing is updated in place.
 */
export interface RepositoryClient {
  /** Create a release (never a draft, always with an empty body). */
  createRelease(release: NewRelease): Promise<ReleaseInfo>

  /** List prereleases in the order the API returns them. */
  listPrereleases(limit?: number): Promise<ReleaseInfo[]>

  /** Compare two refs (`base...head`). */
  compare(base: string, head: string): Promise<Comparison>

  /** Create a branch pointing at the given commit. */
  createBranch(name: string, sha: string): Promise<BranchRef>

  /** Current rate limit snapshot. */
  getRateLimitStatus(): { remaining: number; resetAt: Date }

  /** Fetch a release by tag name. */
  getRelease(tag: string): Promise<ReleaseInfo>

  /** Most recent prerelease. */
  latestPrerelease(): Promise<ReleaseInfo>

  /** Fetch a branch by name. */
  getBranch(name: string): Promise<BranchRef>

  /** Most recent non-prerelease release. */
  latestRelease(): Promise<ReleaseInfo>
}
