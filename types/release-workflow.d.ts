import type { ReleaseInfo } from './release-info'
import type { MergeStatus } from './merge-status'
import type { BranchRef } from './branch-ref'

/** Release operations bound to one repository. */
export interface ReleaseWorkflow {
  /** Decide which branch a release of this version is cut from. */
  resolveReleaseBaseBranch(version: string): Promise<string>

  /** Check that the release base is merged relative to production. */
  checkMergeStatus(version: string): Promise<MergeStatus>

  /** Start `release-<major>` from `develop`. */
  createReleaseBranch(version: string): Promise<BranchRef>

  /** Cut a QA prerelease from the release branch. */
  createPreRelease(version: string): Promise<ReleaseInfo>

  /** Start `hotfix-<ticket>` from `master`. */
  createHotfixBranch(ticket: string): Promise<BranchRef>

  /** Promote `master` to a production release. */
  createRelease(version: string): Promise<ReleaseInfo>
}
