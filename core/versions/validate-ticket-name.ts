import { ReleaseError } from '../errors/release-error'

/**
 * Validate a ticket name used for hotfix branches (`EB-123`,
 * `EB-123-short-summary`).
 *
 * @param name - Ticket name.
 * @returns Always true; invalid input throws.
 * @throws {ReleaseError} With kind `invalid-format`.
 */
export function validateTicketName(name: string): true {
  if (/^EB-\d+(?:-.+)?$/u.test(name)) {
    return true
  }

  throw new ReleaseError('invalid-format', `Invalid ticket name ${name}`)
}
