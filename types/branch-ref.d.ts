/** A remote branch and the commit it currently points to. */
export interface BranchRef {
  /** Branch name without the `refs/heads/` prefix. */
  name: string

  /** API URL of the git reference. */
  url: string

  /** SHA of the branch tip. */
  sha: string
}
