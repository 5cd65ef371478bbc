import type { Comparison } from './comparison'

/** Outcome of a successful merge status check. */
export interface MergeStatus {
  /** Comparison of the production tag against the base branch. */
  comparison: Comparison

  /** Tag of the current production release. */
  productionTag: string

  /** Branch the release is cut from. */
  baseBranch: string
}
