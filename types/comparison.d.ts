/** Position of the head ref relative to the base ref. */
export type ComparisonStatus = 'identical' | 'diverged' | 'behind' | 'ahead'

/** Result of comparing two refs. */
export interface Comparison {
  /** Relationship of head to base. */
  status: ComparisonStatus

  /** Number of commits in the comparison. */
  totalCommits: number

  /** Commits head has that base does not. */
  aheadBy: number

  /** Commits base has that head does not. */
  behindBy: number

  /** HTML URL of the comparison page. */
  url: string

  /** Head ref. */
  head: string

  /** Base ref. */
  base: string
}
