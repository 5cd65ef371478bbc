import pc from 'picocolors'

import type { MergeStatus } from '../types/merge-status'

/**
 * Prints the outcome of a passing merge status check.
 *
 * @param status - Merge status.
 */
export function printMergeStatus(status: MergeStatus): void {
  let { comparison } = status

  console.info(pc.green('\n✓ Ready to release'))
  console.info(`   Base branch: ${pc.cyan(status.baseBranch)}`)
  console.info(`   Production release: ${pc.cyan(status.productionTag)}`)
  console.info(
    `   Status: ${pc.yellow(comparison.status)} ` +
      pc.gray(`(${comparison.aheadBy} ahead, ${comparison.behindBy} behind)`),
  )
  console.info('')
}
