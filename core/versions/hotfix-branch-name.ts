/**
 * Name of the hotfix branch for a ticket.
 *
 * @param ticket - Ticket name or major version.
 * @returns Branch name, e.g. `hotfix-EB-123`.
 */
export function hotfixBranchName(ticket: string): string {
  return `hotfix-${ticket}`
}
