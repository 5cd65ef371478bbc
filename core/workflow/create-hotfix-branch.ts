import type { ReleaseWorkflowContext } from '../../types/release-workflow-context'
import type { BranchRef } from '../../types/branch-ref'

import { validateTicketName } from '../versions/validate-ticket-name'
import { hotfixBranchName } from '../versions/hotfix-branch-name'
import { MAINLINE_BRANCH } from './constants'
import { startBranch } from './start-branch'

/**
 * Start a hotfix branch for a ticket from `master`.
 *
 * @param context - Workflow dependencies.
 * @param ticket - Ticket name, e.g. `EB-123`.
 * @returns Created `hotfix-<ticket>` branch.
 */
export async function createHotfixBranch(
  context: ReleaseWorkflowContext,
  ticket: string,
): Promise<BranchRef> {
  validateTicketName(ticket)
  return startBranch(context, hotfixBranchName(ticket), MAINLINE_BRANCH)
}
