import semver from 'semver'

import { ReleaseError } from '../errors/release-error'

/**
 * Dotted numeric versions with four or five groups (`17.11.01.02`). The dots
 * are optional, so `17.11.01` also passes as `17.11.0.1`.
 */
const LEGACY_VERSION_PATTERN = /^(?:\.?\d+){4,5}$/u

/**
 * Validate a release version.
 *
 * Accepts legacy dotted numeric versions and strict semantic versions
 * (`1.2.3`, `1.2.3-rc.1+build.5`). A `v` prefix or surrounding whitespace is
 * rejected even though semver would tolerate it, and so is a numeric component
 * above `Number.MAX_SAFE_INTEGER`.
 *
 * @param version - Version to validate.
 * @returns Always true; invalid input throws.
 * @throws {ReleaseError} With kind `invalid-format`.
 */
export function validateVersion(version: string): true {
  if (LEGACY_VERSION_PATTERN.test(version)) {
    return true
  }

  if (
    version === version.trim() &&
    !version.startsWith('v') &&
    semver.valid(version) !== null
  ) {
    return true
  }

  throw new ReleaseError('invalid-format', `Invalid version number ${version}`)
}
