import pc from 'picocolors'

import type { BranchRef } from '../types/branch-ref'

/**
 * Prints the created branch and how to check it out.
 *
 * @param branch - Created branch.
 */
export function printBranchCreated(branch: BranchRef): void {
  console.info(pc.green(`\n✓ Branch: ${branch.name} created`))
  if (branch.url) {
    console.info(pc.gray(branch.url))
  }
  console.info(`\n\tgit fetch --all && git checkout ${branch.name}\n`)
}
